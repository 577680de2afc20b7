import type {
  ClientConfig,
  InvokeRequestBody,
  InvokeResult,
  InvokeTarget,
  PermittedActions,
  WebhookPayload,
} from "../domain/types.js";
import { decodeInvokeResult, isHttpUrl, optionalText } from "../api/validators.js";
import type { ClockPort } from "../infra/clock.js";
import { ValidationError } from "../infra/errors.js";
import type { Logger } from "../infra/logger.js";
import { webhookSecretKeyId } from "../infra/webhook-secret.js";
import type { HttpTransportPort } from "../ports/http-transport.js";
import {
  buildEmbedPayload,
  buildImagePayload,
  buildMessagePayload,
  buildPollPayload,
  encodeInvokeBody,
  validatePayload,
  type EmbedInput,
  type ImageInput,
  type MessageInput,
  type PayloadBuildContext,
  type PollInput,
} from "./payload-builders.js";
import { assertPayloadPermitted } from "./permitted-actions.js";
import { invokeLocation, resolveInvokeTarget, type InvokeTargetOverrides } from "./target-resolution.js";

export interface InvokeOptions extends InvokeTargetOverrides {
  /** When given, the payload is checked against the room's limits before sending. */
  precheck?: PermittedActions;
}

export type SendMessageInput = MessageInput & InvokeOptions;
export type SendEmbedInput = EmbedInput & InvokeOptions;
export type SendPollInput = PollInput & InvokeOptions;
export type SendImageInput = ImageInput & InvokeOptions;

/** Delivers payloads with a webhook's shared secret; never sends the owner token. */
export class InvocationService {
  private readonly buildContext: PayloadBuildContext;

  constructor(
    private readonly transport: HttpTransportPort,
    private readonly config: ClientConfig,
    clock: ClockPort,
    private readonly logger: Logger,
  ) {
    this.buildContext = {
      clock,
      ...(config.defaultAlias ? { defaultAlias: config.defaultAlias } : {}),
    };
  }

  async sendMessage(input: SendMessageInput): Promise<InvokeResult> {
    return this.deliver(buildMessagePayload(input, this.buildContext), input);
  }

  async sendEmbed(input: SendEmbedInput): Promise<InvokeResult> {
    return this.deliver(buildEmbedPayload(input, this.buildContext), input);
  }

  async sendPoll(input: SendPollInput): Promise<InvokeResult> {
    return this.deliver(buildPollPayload(input, this.buildContext), input);
  }

  async sendImage(input: SendImageInput): Promise<InvokeResult> {
    return this.deliver(buildImagePayload(input), input);
  }

  /** Sends a pre-built body as-is; the server does all validation. */
  async invokeWebhook(invokeUrl: string, secret: string, body: InvokeRequestBody): Promise<InvokeResult> {
    const url = optionalText(invokeUrl);
    if (!url || !isHttpUrl(url)) {
      throw new ValidationError("unresolved_invoke_target", "invokeUrl must be an http/https URL.");
    }
    const resolvedSecret = optionalText(secret);
    if (!resolvedSecret) {
      throw new ValidationError("unresolved_invoke_target", "A webhook secret is required to invoke a webhook.");
    }
    return this.send({ type: "url", invokeUrl: url, secret: resolvedSecret }, body);
  }

  /** Sends a payload built elsewhere; it is re-validated by the builder for its kind first. */
  async dispatch(payload: WebhookPayload, options: InvokeOptions = {}): Promise<InvokeResult> {
    return this.deliver(validatePayload(payload, this.buildContext), options);
  }

  private async deliver(payload: WebhookPayload, options: InvokeOptions): Promise<InvokeResult> {
    const target = resolveInvokeTarget(options, this.config);
    if (options.precheck) {
      assertPayloadPermitted(payload, options.precheck);
    }
    return this.send(target, encodeInvokeBody(payload));
  }

  private async send(target: InvokeTarget, body: InvokeRequestBody): Promise<InvokeResult> {
    const data = await this.transport.request("POST", invokeLocation(target), {
      body,
      auth: { type: "secret", secret: target.secret },
    });
    const result = decodeInvokeResult(data);
    this.logger.debug(
      {
        action: body.action,
        keyId: webhookSecretKeyId(target.secret),
        ...(target.type === "room" ? { roomId: target.roomId, webhookId: target.webhookId } : {}),
        ok: result.ok,
      },
      "webhook invoked",
    );
    return result;
  }
}
