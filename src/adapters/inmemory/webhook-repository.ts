import { randomUUID } from "node:crypto";
import type {
  CreateWebhookRecordInput,
  StoredWebhookRecord,
  UpdateWebhookRecordInput,
  WebhookRepositoryPort,
} from "../../ports/webhook-repository.js";
import { AppError } from "../../testing/app-error.js";

export class InMemoryWebhookRepository implements WebhookRepositoryPort {
  private readonly webhooks = new Map<string, StoredWebhookRecord>();

  async createWebhook(input: CreateWebhookRecordInput): Promise<StoredWebhookRecord> {
    const webhook: StoredWebhookRecord = {
      id: `wh_${randomUUID().replace(/-/g, "").slice(0, 16)}`,
      room_id: input.roomId,
      label: input.label,
      permissions: [...input.permissions],
      paused: false,
      secret: input.secret,
      created_at: input.createdAt,
      created_by: input.createdBy,
    };

    this.webhooks.set(this.key(webhook.room_id, webhook.id), webhook);
    return webhook;
  }

  async getWebhook(roomId: string, webhookId: string): Promise<StoredWebhookRecord> {
    return this.require(roomId, webhookId);
  }

  async listWebhooks(roomId: string): Promise<StoredWebhookRecord[]> {
    return [...this.webhooks.values()]
      .filter((webhook) => webhook.room_id === roomId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  async countWebhooks(roomId: string): Promise<number> {
    return (await this.listWebhooks(roomId)).length;
  }

  async updateWebhook(
    roomId: string,
    webhookId: string,
    input: UpdateWebhookRecordInput,
  ): Promise<StoredWebhookRecord> {
    const current = this.require(roomId, webhookId);
    const updated: StoredWebhookRecord = {
      ...current,
      ...(input.label !== undefined ? { label: input.label } : {}),
      ...(input.permissions !== undefined ? { permissions: [...input.permissions] } : {}),
      ...(input.paused !== undefined ? { paused: input.paused } : {}),
    };
    this.webhooks.set(this.key(roomId, webhookId), updated);
    return updated;
  }

  async rotateSecret(roomId: string, webhookId: string, secret: string): Promise<StoredWebhookRecord> {
    const current = this.require(roomId, webhookId);
    const updated: StoredWebhookRecord = { ...current, secret };
    this.webhooks.set(this.key(roomId, webhookId), updated);
    return updated;
  }

  async markUsed(roomId: string, webhookId: string, usedAt: string): Promise<void> {
    const current = this.require(roomId, webhookId);
    this.webhooks.set(this.key(roomId, webhookId), { ...current, last_used_at: usedAt });
  }

  async deleteWebhook(roomId: string, webhookId: string): Promise<void> {
    this.require(roomId, webhookId);
    this.webhooks.delete(this.key(roomId, webhookId));
  }

  private key(roomId: string, webhookId: string): string {
    return `${roomId}\u0000${webhookId}`;
  }

  private require(roomId: string, webhookId: string): StoredWebhookRecord {
    const webhook = this.webhooks.get(this.key(roomId, webhookId));
    if (!webhook) {
      throw new AppError(404, "resource_not_found", "Webhook not found.");
    }
    return webhook;
  }
}
