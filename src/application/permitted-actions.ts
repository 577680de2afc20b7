import type { PermittedActions, WebhookPayload } from "../domain/types.js";
import { ValidationError } from "../infra/errors.js";

/**
 * Checks a built payload against a room's declared capabilities so oversize
 * or disallowed payloads fail locally instead of at the server.
 */
export function assertPayloadPermitted(payload: WebhookPayload, permitted: PermittedActions): void {
  if (!permitted.actions.includes(payload.kind)) {
    throw new ValidationError(
      "action_not_permitted",
      `Room does not permit '${payload.kind}' payloads (allowed: ${permitted.actions.join(", ") || "none"}).`,
    );
  }

  const { limits } = permitted;
  switch (payload.kind) {
    case "message":
      if (payload.text.length > limits.maxMessageLength) {
        throw new ValidationError(
          "payload_limit_exceeded",
          `Message text exceeds ${limits.maxMessageLength} characters.`,
        );
      }
      return;
    case "embed":
      if (payload.notes.length > limits.maxEmbedNotes) {
        throw new ValidationError(
          "payload_limit_exceeded",
          `Embed has ${payload.notes.length} notes; the room allows at most ${limits.maxEmbedNotes}.`,
        );
      }
      return;
    case "poll":
      if (payload.options.length > limits.maxPollOptions) {
        throw new ValidationError(
          "payload_limit_exceeded",
          `Poll has ${payload.options.length} options; the room allows at most ${limits.maxPollOptions}.`,
        );
      }
      return;
    case "image":
      return;
  }
}
