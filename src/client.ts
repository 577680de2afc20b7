import { FetchHttpTransport } from "./adapters/fetch/http-transport.js";
import {
  InvocationService,
  type InvokeOptions,
  type SendEmbedInput,
  type SendImageInput,
  type SendMessageInput,
  type SendPollInput,
} from "./application/invocation.js";
import {
  WebhookManagementService,
  type CreateWebhookInput,
  type UpdateWebhookInput,
} from "./application/webhook-management.js";
import type {
  ClientConfig,
  InvokeRequestBody,
  InvokeResult,
  PermittedActions,
  RoomWebhookListing,
  Webhook,
  WebhookBundle,
  WebhookPayload,
} from "./domain/types.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { createClientConfig, type ClientConfigOptions } from "./infra/config.js";
import { createLogger, rootLogger, type Logger } from "./infra/logger.js";
import type { FetchLike, HttpTransportPort } from "./ports/http-transport.js";

export interface StayHereClientOptions extends ClientConfigOptions {
  /** A prepared config; takes precedence over the individual option fields. */
  config?: ClientConfig;
  fetch?: FetchLike;
  transport?: HttpTransportPort;
  logger?: Logger;
  clock?: ClockPort;
}

/**
 * Manages StayHere room webhooks with an owner token and delivers payloads
 * through them with per-webhook secrets. Each method issues at most one request.
 */
export class StayHereWebhookClient {
  readonly config: ClientConfig;
  private readonly management: WebhookManagementService;
  private readonly invocation: InvocationService;

  constructor(options: StayHereClientOptions = {}) {
    const { config, fetch, transport, logger, clock, ...configOptions } = options;
    this.config = config ?? createClientConfig(configOptions);

    const baseLogger = logger ?? rootLogger;
    const httpTransport =
      transport
      ?? new FetchHttpTransport(this.config, {
        logger: createLogger({ component: "transport" }, baseLogger),
        ...(fetch ? { fetch } : {}),
      });

    this.management = new WebhookManagementService(
      httpTransport,
      createLogger({ component: "webhook-management" }, baseLogger),
    );
    this.invocation = new InvocationService(
      httpTransport,
      this.config,
      clock ?? new SystemClock(),
      createLogger({ component: "invocation" }, baseLogger),
    );
  }

  listWebhooks(roomId: string): Promise<Webhook[]> {
    return this.management.listWebhooks(roomId);
  }

  getRoomWebhooks(roomId: string): Promise<RoomWebhookListing> {
    return this.management.getRoomWebhooks(roomId);
  }

  createWebhook(roomId: string, input: CreateWebhookInput): Promise<WebhookBundle> {
    return this.management.createWebhook(roomId, input);
  }

  updateWebhook(roomId: string, webhookId: string, input: UpdateWebhookInput): Promise<Webhook> {
    return this.management.updateWebhook(roomId, webhookId, input);
  }

  rotateSecret(roomId: string, webhookId: string): Promise<WebhookBundle> {
    return this.management.rotateSecret(roomId, webhookId);
  }

  deleteWebhook(roomId: string, webhookId: string): Promise<void> {
    return this.management.deleteWebhook(roomId, webhookId);
  }

  getPermittedActions(roomId: string): Promise<PermittedActions> {
    return this.management.getPermittedActions(roomId);
  }

  sendMessage(input: SendMessageInput): Promise<InvokeResult> {
    return this.invocation.sendMessage(input);
  }

  sendEmbed(input: SendEmbedInput): Promise<InvokeResult> {
    return this.invocation.sendEmbed(input);
  }

  sendPoll(input: SendPollInput): Promise<InvokeResult> {
    return this.invocation.sendPoll(input);
  }

  sendImage(input: SendImageInput): Promise<InvokeResult> {
    return this.invocation.sendImage(input);
  }

  sendPayload(payload: WebhookPayload, options?: InvokeOptions): Promise<InvokeResult> {
    return this.invocation.dispatch(payload, options);
  }

  invokeWebhook(invokeUrl: string, secret: string, body: InvokeRequestBody): Promise<InvokeResult> {
    return this.invocation.invokeWebhook(invokeUrl, secret, body);
  }
}
