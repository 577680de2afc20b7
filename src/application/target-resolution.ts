import type { ClientConfig, InvokeTarget } from "../domain/types.js";
import { isHttpUrl, optionalText } from "../api/validators.js";
import { ValidationError } from "../infra/errors.js";

export interface InvokeTargetOverrides {
  roomId?: string;
  webhookId?: string;
  secret?: string;
  invokeUrl?: string;
}

type TargetDefaults = Pick<ClientConfig, "defaultRoomId" | "defaultWebhookId" | "defaultSecret">;

/**
 * Resolves where an invoke call goes. Each explicit field beats the client
 * default; an explicit invoke URL selects the URL form outright.
 */
export function resolveInvokeTarget(overrides: InvokeTargetOverrides, defaults: TargetDefaults): InvokeTarget {
  const secret = optionalText(overrides.secret) ?? optionalText(defaults.defaultSecret);
  if (!secret) {
    throw new ValidationError("unresolved_invoke_target", "A webhook secret is required to invoke a webhook.");
  }

  const invokeUrl = optionalText(overrides.invokeUrl);
  if (invokeUrl) {
    if (!isHttpUrl(invokeUrl)) {
      throw new ValidationError("unresolved_invoke_target", "invokeUrl must be an http/https URL.");
    }
    return { type: "url", invokeUrl, secret };
  }

  const roomId = optionalText(overrides.roomId) ?? optionalText(defaults.defaultRoomId);
  const webhookId = optionalText(overrides.webhookId) ?? optionalText(defaults.defaultWebhookId);
  if (!roomId || !webhookId) {
    throw new ValidationError(
      "unresolved_invoke_target",
      "roomId and webhookId are required when invokeUrl is missing.",
    );
  }
  return { type: "room", roomId, webhookId, secret };
}

export function invokePath(roomId: string, webhookId: string): string {
  return `/webhooks/${encodeURIComponent(roomId)}/${encodeURIComponent(webhookId)}/invoke`;
}

/** Path (relative to the API root) or absolute URL the transport should call. */
export function invokeLocation(target: InvokeTarget): string {
  return target.type === "url" ? target.invokeUrl : invokePath(target.roomId, target.webhookId);
}
