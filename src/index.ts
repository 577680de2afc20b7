export { StayHereWebhookClient, type StayHereClientOptions } from "./client.js";
export {
  AuthError,
  HttpError,
  InvalidResponseError,
  NetworkError,
  StayHereError,
  ValidationError,
  classifyHttpFailure,
  isStayHereError,
  type NetworkFailureReason,
  type RequestContext,
  type StayHereErrorKind,
} from "./infra/errors.js";
export {
  DEFAULT_API_PREFIX,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  createClientConfig,
  loadClientConfig,
  type ClientConfigOptions,
} from "./infra/config.js";
export { SystemClock, FixedClock, type ClockPort } from "./infra/clock.js";
export { createLogger, rootLogger, type Logger, type LogContext } from "./infra/logger.js";
export { WEBHOOK_SECRET_HEADER, webhookSecretKeyId } from "./infra/webhook-secret.js";
export {
  MAX_POLL_OPTIONS,
  MIN_POLL_OPTIONS,
  buildEmbedPayload,
  buildImagePayload,
  buildMessagePayload,
  buildPollPayload,
  encodeInvokeBody,
  type EmbedInput,
  type ImageInput,
  type MessageInput,
  type PayloadBuildContext,
  type PollInput,
} from "./application/payload-builders.js";
export { assertPayloadPermitted } from "./application/permitted-actions.js";
export { resolveInvokeTarget, type InvokeTargetOverrides } from "./application/target-resolution.js";
export type {
  InvokeOptions,
  SendEmbedInput,
  SendImageInput,
  SendMessageInput,
  SendPollInput,
} from "./application/invocation.js";
export type { CreateWebhookInput, UpdateWebhookInput } from "./application/webhook-management.js";
export { FetchHttpTransport, type FetchHttpTransportOptions } from "./adapters/fetch/http-transport.js";
export type {
  FetchLike,
  FetchRequestInit,
  FetchResponseLike,
  HttpMethod,
  HttpTransportPort,
  RequestAuth,
  TransportRequestOptions,
} from "./ports/http-transport.js";
export { DEFAULT_PAYLOAD_LIMITS } from "./api/validators.js";
export {
  WEBHOOK_PERMISSIONS,
  type ClientConfig,
  type EmbedPayload,
  type ImagePayload,
  type InvokeRequestBody,
  type InvokeResult,
  type InvokeTarget,
  type MessagePayload,
  type PayloadKind,
  type PayloadLimits,
  type PermittedActions,
  type PollPayload,
  type RoomWebhookListing,
  type Webhook,
  type WebhookBundle,
  type WebhookPayload,
  type WebhookPermission,
} from "./domain/types.js";
