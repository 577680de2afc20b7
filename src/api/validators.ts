import type {
  InvokeResult,
  PayloadLimits,
  PermittedActions,
  RoomWebhookListing,
  Webhook,
  WebhookBundle,
  WebhookPermission,
} from "../domain/types.js";
import { WEBHOOK_PERMISSIONS } from "../domain/types.js";
import { InvalidResponseError, ValidationError } from "../infra/errors.js";

export const DEFAULT_PAYLOAD_LIMITS: PayloadLimits = {
  maxPollOptions: 8,
  maxEmbedNotes: 10,
  maxMessageLength: 2000,
};

const webhookPermissions: ReadonlySet<string> = new Set(WEBHOOK_PERMISSIONS);

export function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isWebhookPermission(value: unknown): value is WebhookPermission {
  return typeof value === "string" && webhookPermissions.has(value);
}

export function requireText(value: string | undefined, code: string, message: string): string {
  const trimmed = (value ?? "").trim();
  if (!trimmed) {
    throw new ValidationError(code, message);
  }
  return trimmed;
}

export function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function requireResourceId(value: string | undefined, name: "room_id" | "webhook_id"): string {
  return requireText(value, `invalid_${name}`, `${name} is required.`);
}

export function isHttpUrl(value: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return parsed.protocol === "http:" || parsed.protocol === "https:";
}

/**
 * Trims, lower-cases and de-duplicates a caller permission list, keeping first
 * occurrence order. `undefined` selects every known permission.
 */
export function normalizePermissions(permissions: readonly string[] | undefined): WebhookPermission[] {
  if (permissions === undefined) {
    return [...WEBHOOK_PERMISSIONS];
  }
  const cleaned: WebhookPermission[] = [];
  for (const permission of permissions) {
    const key = permission.trim().toLowerCase();
    if (!isWebhookPermission(key)) {
      throw new ValidationError(
        "invalid_permissions",
        `Unknown webhook permission '${permission}'. Allowed: ${WEBHOOK_PERMISSIONS.join(", ")}.`,
      );
    }
    if (!cleaned.includes(key)) {
      cleaned.push(key);
    }
  }
  if (cleaned.length === 0) {
    throw new ValidationError("invalid_permissions", "At least one webhook permission is required.");
  }
  return cleaned;
}

function malformed(message: string): InvalidResponseError {
  return new InvalidResponseError("malformed_response", message);
}

function optionalString(value: unknown): string | undefined {
  return isString(value) ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function decodePermissions(value: unknown): WebhookPermission[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isWebhookPermission);
}

export function decodeWebhook(value: unknown, roomId: string): Webhook {
  if (!isObject(value) || !isString(value.id)) {
    throw malformed("Webhook object is missing an id.");
  }
  const createdBy = optionalString(value.createdBy);
  const lastUsedAt = optionalString(value.lastUsedAt);
  const secretPreview = optionalString(value.secretPreview);
  const invokeUrl = optionalString(value.invokeUrl);
  const exampleCurl = optionalString(value.exampleCurl);

  return {
    id: value.id,
    roomId: optionalString(value.roomId) ?? roomId,
    label: typeof value.label === "string" ? value.label : "",
    permissions: decodePermissions(value.permissions),
    paused: value.paused === true,
    createdAt: optionalString(value.createdAt) ?? null,
    ...(createdBy ? { createdBy } : {}),
    ...(lastUsedAt ? { lastUsedAt } : {}),
    ...(secretPreview ? { secretPreview } : {}),
    ...(invokeUrl ? { invokeUrl } : {}),
    ...(exampleCurl ? { exampleCurl } : {}),
  };
}

export function decodeWebhookBundle(value: Record<string, unknown>, roomId: string): WebhookBundle {
  if (!isString(value.secret)) {
    throw malformed("Webhook secret missing from create/rotate response.");
  }
  const webhook = decodeWebhook(value.webhook, roomId);
  const invokeUrl = optionalString(value.invokeUrl) ?? webhook.invokeUrl;
  const exampleCurl = optionalString(value.exampleCurl) ?? webhook.exampleCurl;

  return {
    webhook,
    secret: value.secret,
    ...(invokeUrl ? { invokeUrl } : {}),
    ...(exampleCurl ? { exampleCurl } : {}),
  };
}

export function decodeRoomWebhookListing(value: Record<string, unknown>, roomId: string): RoomWebhookListing {
  const resolvedRoomId = optionalString(value.roomId) ?? roomId;
  const items = Array.isArray(value.webhooks) ? value.webhooks : [];
  return {
    roomId: resolvedRoomId,
    limit: optionalNumber(value.limit) ?? null,
    webhooks: items.map((item) => decodeWebhook(item, resolvedRoomId)),
  };
}

export function decodePermittedActions(value: Record<string, unknown>): PermittedActions {
  const limits = isObject(value.limits) ? value.limits : {};
  return {
    actions: decodePermissions(value.actions),
    limit: optionalNumber(value.limit) ?? 0,
    limits: {
      maxPollOptions: optionalNumber(limits.maxPollOptions) ?? DEFAULT_PAYLOAD_LIMITS.maxPollOptions,
      maxEmbedNotes: optionalNumber(limits.maxEmbedNotes) ?? DEFAULT_PAYLOAD_LIMITS.maxEmbedNotes,
      maxMessageLength: optionalNumber(limits.maxMessageLength) ?? DEFAULT_PAYLOAD_LIMITS.maxMessageLength,
    },
  };
}

export function decodeInvokeResult(value: Record<string, unknown>): InvokeResult {
  const { ok, kind, messageId, pollId, ...extra } = value;
  const kindValue = optionalString(kind);
  const messageIdValue = optionalString(messageId);
  const pollIdValue = optionalString(pollId);
  return {
    ok: ok === true,
    ...(kindValue ? { kind: kindValue } : {}),
    ...(messageIdValue ? { messageId: messageIdValue } : {}),
    ...(pollIdValue ? { pollId: pollIdValue } : {}),
    extra,
  };
}
