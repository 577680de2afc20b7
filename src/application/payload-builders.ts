import type {
  EmbedPayload,
  ImagePayload,
  InvokeRequestBody,
  MessagePayload,
  PollPayload,
  WebhookPayload,
} from "../domain/types.js";
import { isHttpUrl, optionalText, requireText } from "../api/validators.js";
import type { ClockPort } from "../infra/clock.js";
import { ValidationError } from "../infra/errors.js";

export const MIN_POLL_OPTIONS = 2;
export const MAX_POLL_OPTIONS = 8;

const HEX_COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;

export interface PayloadBuildContext {
  defaultAlias?: string;
  clock: ClockPort;
}

export interface MessageInput {
  text: string;
  alias?: string;
  extra?: Record<string, unknown>;
}

export interface EmbedInput {
  title: string;
  description?: string;
  notes?: readonly string[];
  color?: string;
  url?: string;
  image?: string;
  footer?: string;
  text?: string;
  alias?: string;
  /** Extra embed keys, merged after the known ones. */
  fields?: Record<string, unknown>;
}

export interface PollInput {
  question: string;
  options: readonly string[];
  multipleChoice?: boolean;
  endsAt?: Date | string;
  endsInMinutes?: number;
}

export interface ImageInput {
  url: string;
  width?: number;
  height?: number;
  x?: number;
  y?: number;
}

function resolveAlias(alias: string | undefined, context: PayloadBuildContext): string | undefined {
  return optionalText(alias) ?? optionalText(context.defaultAlias);
}

function assertHttpUrl(value: string, code: string, field: string): void {
  if (!isHttpUrl(value)) {
    throw new ValidationError(code, `${field} must be an http/https URL.`);
  }
}

export function buildMessagePayload(input: MessageInput, context: PayloadBuildContext): MessagePayload {
  const text = requireText(input.text, "invalid_message_text", "Message text must be provided.");
  const alias = resolveAlias(input.alias, context);
  return {
    kind: "message",
    text,
    ...(alias ? { alias } : {}),
    ...(input.extra ? { extra: input.extra } : {}),
  };
}

export function buildEmbedPayload(input: EmbedInput, context: PayloadBuildContext): EmbedPayload {
  const title = requireText(input.title, "invalid_embed_title", "Embed title must be provided.");

  const notes = (input.notes ?? []).map((note) => {
    const trimmed = note.trim();
    if (!trimmed) {
      throw new ValidationError("invalid_embed_note", "Embed notes must be non-empty strings.");
    }
    return trimmed;
  });

  if (input.color !== undefined && !HEX_COLOR_PATTERN.test(input.color)) {
    throw new ValidationError("invalid_embed_color", `Embed color '${input.color}' must match #RRGGBB.`);
  }

  const url = optionalText(input.url);
  if (url) {
    assertHttpUrl(url, "invalid_embed_url", "Embed url");
  }
  const image = optionalText(input.image);
  if (image) {
    assertHttpUrl(image, "invalid_embed_image", "Embed image");
  }

  const description = optionalText(input.description);
  const footer = optionalText(input.footer);
  const text = optionalText(input.text);
  const alias = resolveAlias(input.alias, context);

  return {
    kind: "embed",
    title,
    notes,
    ...(description ? { description } : {}),
    ...(input.color !== undefined ? { color: input.color } : {}),
    ...(url ? { url } : {}),
    ...(image ? { image } : {}),
    ...(footer ? { footer } : {}),
    ...(text ? { text } : {}),
    ...(alias ? { alias } : {}),
    ...(input.fields ? { fields: input.fields } : {}),
  };
}

function minutesUntil(endsAt: Date | string, clock: ClockPort): number {
  const endsAtMs = endsAt instanceof Date ? endsAt.getTime() : Date.parse(endsAt);
  if (Number.isNaN(endsAtMs)) {
    throw new ValidationError("invalid_poll_end", "Poll end time is not a valid date.");
  }
  const remainingMs = endsAtMs - clock.nowMs();
  if (remainingMs <= 0) {
    throw new ValidationError("invalid_poll_end", "Poll end time must be in the future.");
  }
  return Math.ceil(remainingMs / 60_000);
}

export function buildPollPayload(input: PollInput, context: PayloadBuildContext): PollPayload {
  const question = requireText(input.question, "invalid_poll_question", "Poll question cannot be empty.");

  if (input.options.length < MIN_POLL_OPTIONS || input.options.length > MAX_POLL_OPTIONS) {
    throw new ValidationError(
      "invalid_poll_options",
      `A poll needs between ${MIN_POLL_OPTIONS} and ${MAX_POLL_OPTIONS} options, got ${input.options.length}.`,
    );
  }
  const options: string[] = [];
  for (const option of input.options) {
    const trimmed = option.trim();
    if (!trimmed) {
      throw new ValidationError("invalid_poll_options", "Poll options must be non-empty strings.");
    }
    if (options.includes(trimmed)) {
      throw new ValidationError("invalid_poll_options", `Duplicate poll option '${trimmed}'.`);
    }
    options.push(trimmed);
  }

  if (input.endsAt !== undefined && input.endsInMinutes !== undefined) {
    throw new ValidationError("invalid_poll_end", "Pass either endsAt or endsInMinutes, not both.");
  }
  let endsInMinutes: number | undefined;
  if (input.endsInMinutes !== undefined) {
    if (!Number.isInteger(input.endsInMinutes) || input.endsInMinutes <= 0) {
      throw new ValidationError("invalid_poll_end", "endsInMinutes must be a positive integer.");
    }
    endsInMinutes = input.endsInMinutes;
  } else if (input.endsAt !== undefined) {
    endsInMinutes = minutesUntil(input.endsAt, context.clock);
  }

  return {
    kind: "poll",
    question,
    options,
    multipleChoice: input.multipleChoice ?? false,
    ...(endsInMinutes !== undefined ? { endsInMinutes } : {}),
  };
}

export function buildImagePayload(input: ImageInput): ImagePayload {
  const url = requireText(input.url, "invalid_image_url", "Image URL must be provided.");
  assertHttpUrl(url, "invalid_image_url", "Image URL");

  if ((input.width === undefined) !== (input.height === undefined)) {
    throw new ValidationError("invalid_image_size", "Image size needs both width and height.");
  }
  for (const [name, value] of [["width", input.width], ["height", input.height]] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
      throw new ValidationError("invalid_image_size", `Image ${name} must be a positive integer.`);
    }
  }
  for (const [name, value] of [["x", input.x], ["y", input.y]] as const) {
    if (value !== undefined && !Number.isInteger(value)) {
      throw new ValidationError("invalid_image_position", `Image position ${name} must be an integer.`);
    }
  }

  return {
    kind: "image",
    url,
    ...(input.width !== undefined ? { width: input.width } : {}),
    ...(input.height !== undefined ? { height: input.height } : {}),
    ...(input.x !== undefined ? { x: input.x } : {}),
    ...(input.y !== undefined ? { y: input.y } : {}),
  };
}

/**
 * Runs a payload assembled outside the builders back through the builder for
 * its kind, so it is held to the same rules before anything is sent.
 */
export function validatePayload(payload: WebhookPayload, context: PayloadBuildContext): WebhookPayload {
  switch (payload.kind) {
    case "message":
      return buildMessagePayload(payload, context);
    case "embed":
      return buildEmbedPayload(payload, context);
    case "poll":
      return buildPollPayload(payload, context);
    case "image":
      return buildImagePayload(payload);
  }
}

function renderEmbedDescription(payload: EmbedPayload): string | undefined {
  if (payload.notes.length === 0) {
    return payload.description;
  }
  const bullets = payload.notes.map((note) => `• ${note}`).join("\n");
  return payload.description ? `${payload.description}\n\n${bullets}` : bullets;
}

function encodePayload(payload: WebhookPayload): Record<string, unknown> {
  switch (payload.kind) {
    case "message":
      return {
        text: payload.text,
        ...(payload.alias ? { alias: payload.alias } : {}),
        ...(payload.extra ? { extra: payload.extra } : {}),
      };
    case "embed": {
      const description = renderEmbedDescription(payload);
      const embed: Record<string, unknown> = {
        title: payload.title,
        ...(description ? { description } : {}),
        ...(payload.color ? { color: payload.color } : {}),
        ...(payload.url ? { url: payload.url } : {}),
        ...(payload.image ? { image: payload.image } : {}),
        ...(payload.footer ? { footer: payload.footer } : {}),
        ...(payload.fields ?? {}),
      };
      return {
        embed,
        ...(payload.text ? { text: payload.text } : {}),
        ...(payload.alias ? { alias: payload.alias } : {}),
      };
    }
    case "poll":
      return {
        question: payload.question,
        options: payload.options,
        multipleChoice: payload.multipleChoice,
        ...(payload.endsInMinutes !== undefined ? { endsInMinutes: payload.endsInMinutes } : {}),
      };
    case "image":
      return {
        url: payload.url,
        ...(payload.width !== undefined ? { w: payload.width } : {}),
        ...(payload.height !== undefined ? { h: payload.height } : {}),
        ...(payload.x !== undefined ? { x: payload.x } : {}),
        ...(payload.y !== undefined ? { y: payload.y } : {}),
      };
  }
}

export function encodeInvokeBody(payload: WebhookPayload): InvokeRequestBody {
  return { action: payload.kind, payload: encodePayload(payload) };
}
