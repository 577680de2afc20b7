import type {
  PermittedActions,
  RoomWebhookListing,
  Webhook,
  WebhookBundle,
  WebhookPermission,
} from "../domain/types.js";
import {
  decodePermittedActions,
  decodeRoomWebhookListing,
  decodeWebhook,
  decodeWebhookBundle,
  isObject,
  normalizePermissions,
  requireResourceId,
  requireText,
} from "../api/validators.js";
import { ValidationError } from "../infra/errors.js";
import type { Logger } from "../infra/logger.js";
import { webhookSecretKeyId } from "../infra/webhook-secret.js";
import type { HttpTransportPort } from "../ports/http-transport.js";

export interface CreateWebhookInput {
  label: string;
  permissions?: readonly string[];
}

export interface UpdateWebhookInput {
  label?: string;
  /** Replaces the webhook's full permission set. */
  permissions?: readonly string[];
  paused?: boolean;
}

function roomPath(roomId: string): string {
  return `/webhooks/${encodeURIComponent(requireResourceId(roomId, "room_id"))}`;
}

function webhookPath(roomId: string, webhookId: string): string {
  return `${roomPath(roomId)}/${encodeURIComponent(requireResourceId(webhookId, "webhook_id"))}`;
}

/** Owner-token operations over a room's webhook credentials. */
export class WebhookManagementService {
  constructor(
    private readonly transport: HttpTransportPort,
    private readonly logger: Logger,
  ) {}

  async getRoomWebhooks(roomId: string): Promise<RoomWebhookListing> {
    const data = await this.transport.request("GET", roomPath(roomId), { auth: { type: "owner" } });
    return decodeRoomWebhookListing(data, roomId.trim());
  }

  async listWebhooks(roomId: string): Promise<Webhook[]> {
    const listing = await this.getRoomWebhooks(roomId);
    return listing.webhooks;
  }

  async createWebhook(roomId: string, input: CreateWebhookInput): Promise<WebhookBundle> {
    const path = roomPath(roomId);
    const body: { label: string; permissions: WebhookPermission[] } = {
      label: requireText(input.label, "invalid_label", "Webhook label must be provided."),
      permissions: normalizePermissions(input.permissions),
    };
    const data = await this.transport.request("POST", path, { body, auth: { type: "owner" } });
    const bundle = decodeWebhookBundle(data, roomId.trim());
    this.logger.info(
      { roomId: bundle.webhook.roomId, webhookId: bundle.webhook.id, keyId: webhookSecretKeyId(bundle.secret) },
      "webhook created",
    );
    return bundle;
  }

  async updateWebhook(roomId: string, webhookId: string, input: UpdateWebhookInput): Promise<Webhook> {
    const path = webhookPath(roomId, webhookId);
    const body: { label?: string; permissions?: WebhookPermission[]; paused?: boolean } = {
      ...(input.label !== undefined
        ? { label: requireText(input.label, "invalid_label", "Webhook label cannot be empty.") }
        : {}),
      ...(input.permissions !== undefined ? { permissions: normalizePermissions(input.permissions) } : {}),
      ...(input.paused !== undefined ? { paused: input.paused } : {}),
    };
    if (Object.keys(body).length === 0) {
      throw new ValidationError("empty_update", "updateWebhook needs at least one of label, permissions or paused.");
    }

    const data = await this.transport.request("PATCH", path, { body, auth: { type: "owner" } });
    return decodeWebhook(isObject(data.webhook) ? data.webhook : data, roomId.trim());
  }

  async rotateSecret(roomId: string, webhookId: string): Promise<WebhookBundle> {
    const data = await this.transport.request("POST", `${webhookPath(roomId, webhookId)}/rotate`, {
      auth: { type: "owner" },
    });
    const bundle = decodeWebhookBundle(data, roomId.trim());
    this.logger.info(
      { roomId: bundle.webhook.roomId, webhookId: bundle.webhook.id, keyId: webhookSecretKeyId(bundle.secret) },
      "webhook secret rotated",
    );
    return bundle;
  }

  async deleteWebhook(roomId: string, webhookId: string): Promise<void> {
    await this.transport.request("DELETE", webhookPath(roomId, webhookId), { auth: { type: "owner" } });
    this.logger.info({ roomId, webhookId }, "webhook deleted");
  }

  async getPermittedActions(roomId: string): Promise<PermittedActions> {
    const data = await this.transport.request("GET", `${roomPath(roomId)}/meta/permitted-actions`, {
      auth: { type: "owner" },
    });
    return decodePermittedActions(data);
  }
}
