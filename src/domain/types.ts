export const WEBHOOK_PERMISSIONS = ["message", "embed", "poll", "image"] as const;

export type WebhookPermission = (typeof WEBHOOK_PERMISSIONS)[number];

export type PayloadKind = WebhookPermission;

export interface ClientConfig {
  readonly baseUrl: string;
  readonly apiPrefix: string;
  readonly token?: string;
  readonly defaultRoomId?: string;
  readonly defaultWebhookId?: string;
  readonly defaultSecret?: string;
  readonly defaultAlias?: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface Webhook {
  id: string;
  roomId: string;
  label: string;
  permissions: WebhookPermission[];
  paused: boolean;
  createdAt: string | null;
  createdBy?: string;
  lastUsedAt?: string;
  secretPreview?: string;
  invokeUrl?: string;
  exampleCurl?: string;
}

/**
 * The only shape that ever carries a webhook secret. Returned by create and
 * rotate; list and update responses decode to plain {@link Webhook}s.
 */
export interface WebhookBundle {
  readonly webhook: Webhook;
  readonly secret: string;
  readonly invokeUrl?: string;
  readonly exampleCurl?: string;
}

export interface RoomWebhookListing {
  roomId: string;
  limit: number | null;
  webhooks: Webhook[];
}

export interface PayloadLimits {
  maxPollOptions: number;
  maxEmbedNotes: number;
  maxMessageLength: number;
}

export interface PermittedActions {
  actions: WebhookPermission[];
  limit: number;
  limits: PayloadLimits;
}

export interface MessagePayload {
  kind: "message";
  text: string;
  alias?: string;
  extra?: Record<string, unknown>;
}

export interface EmbedPayload {
  kind: "embed";
  title: string;
  description?: string;
  notes: string[];
  color?: string;
  url?: string;
  image?: string;
  footer?: string;
  text?: string;
  alias?: string;
  fields?: Record<string, unknown>;
}

export interface PollPayload {
  kind: "poll";
  question: string;
  options: string[];
  multipleChoice: boolean;
  endsInMinutes?: number;
}

export interface ImagePayload {
  kind: "image";
  url: string;
  width?: number;
  height?: number;
  x?: number;
  y?: number;
}

export type WebhookPayload = MessagePayload | EmbedPayload | PollPayload | ImagePayload;

/** Wire body of an invoke call. */
export interface InvokeRequestBody {
  action: string;
  payload: Record<string, unknown>;
}

export type InvokeTarget =
  | { type: "room"; roomId: string; webhookId: string; secret: string }
  | { type: "url"; invokeUrl: string; secret: string };

export interface InvokeResult {
  ok: boolean;
  kind?: string;
  messageId?: string;
  pollId?: string;
  extra: Record<string, unknown>;
}
