import type { WebhookPermission } from "../domain/types.js";

export interface StoredWebhookRecord {
  id: string;
  room_id: string;
  label: string;
  permissions: WebhookPermission[];
  paused: boolean;
  secret: string;
  created_at: string;
  created_by: string;
  last_used_at?: string;
}

export interface CreateWebhookRecordInput {
  roomId: string;
  label: string;
  permissions: WebhookPermission[];
  secret: string;
  createdAt: string;
  createdBy: string;
}

export interface UpdateWebhookRecordInput {
  label?: string;
  permissions?: WebhookPermission[];
  paused?: boolean;
}

export interface WebhookRepositoryPort {
  createWebhook(input: CreateWebhookRecordInput): Promise<StoredWebhookRecord>;
  getWebhook(roomId: string, webhookId: string): Promise<StoredWebhookRecord>;
  listWebhooks(roomId: string): Promise<StoredWebhookRecord[]>;
  countWebhooks(roomId: string): Promise<number>;
  updateWebhook(roomId: string, webhookId: string, input: UpdateWebhookRecordInput): Promise<StoredWebhookRecord>;
  rotateSecret(roomId: string, webhookId: string, secret: string): Promise<StoredWebhookRecord>;
  markUsed(roomId: string, webhookId: string, usedAt: string): Promise<void>;
  deleteWebhook(roomId: string, webhookId: string): Promise<void>;
}
