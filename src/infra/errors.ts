export type StayHereErrorKind = "validation" | "auth" | "http" | "network" | "invalid_response";

export interface RequestContext {
  method: string;
  url: string;
}

/**
 * Base failure for every error this package throws. Catch it for coarse
 * handling, or one of the subclasses (or switch on `kind`) for targeted recovery.
 */
export class StayHereError extends Error {
  readonly kind: StayHereErrorKind;
  readonly code: string;

  constructor(kind: StayHereErrorKind, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StayHereError";
    this.kind = kind;
    this.code = code;
  }
}

/** Raised before any request when caller input cannot produce a valid call. */
export class ValidationError extends StayHereError {
  constructor(code: string, message: string) {
    super("validation", code, message);
    this.name = "ValidationError";
  }
}

export class HttpError extends StayHereError {
  readonly statusCode: number;
  readonly body: unknown;
  readonly request: RequestContext | undefined;

  constructor(
    statusCode: number,
    code: string,
    message: string,
    details: { body?: unknown; request?: RequestContext; kind?: "http" | "auth" } = {},
  ) {
    super(details.kind ?? "http", code, `${message} (status=${statusCode})`);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.body = details.body;
    this.request = details.request;
  }
}

/** 401/403: the owner token or webhook secret was missing, wrong or revoked. */
export class AuthError extends HttpError {
  constructor(
    statusCode: number,
    code: string,
    message: string,
    details: { body?: unknown; request?: RequestContext } = {},
  ) {
    super(statusCode, code, message, { ...details, kind: "auth" });
    this.name = "AuthError";
  }
}

export type NetworkFailureReason = "timeout" | "connection";

export class NetworkError extends StayHereError {
  readonly reason: NetworkFailureReason;
  readonly request: RequestContext;

  constructor(reason: NetworkFailureReason, message: string, request: RequestContext, cause?: unknown) {
    super("network", reason === "timeout" ? "request_timeout" : "connection_failed", message, { cause });
    this.name = "NetworkError";
    this.reason = reason;
    this.request = request;
  }
}

/**
 * A 2xx response the client cannot use: a body that is not a JSON object
 * (`invalid_response_body`), or one missing fields it needs (`malformed_response`).
 */
export class InvalidResponseError extends StayHereError {
  readonly statusCode: number | undefined;
  readonly raw: string | undefined;
  readonly request: RequestContext | undefined;

  constructor(
    code: string,
    message: string,
    details: { statusCode?: number; raw?: string; request?: RequestContext } = {},
  ) {
    super("invalid_response", code, message);
    this.name = "InvalidResponseError";
    this.statusCode = details.statusCode;
    this.raw = details.raw;
    this.request = details.request;
  }
}

export function isStayHereError(value: unknown): value is StayHereError {
  return value instanceof StayHereError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function describeFailureBody(body: unknown): { code?: string; message?: string } {
  if (typeof body === "string") {
    const trimmed = body.trim();
    return trimmed ? { message: trimmed.slice(0, 500) } : {};
  }
  if (!isRecord(body)) {
    return {};
  }
  const { error, message, code } = body;
  if (typeof error === "string" && error.length > 0) {
    return {
      message: error,
      ...(typeof code === "string" ? { code } : {}),
    };
  }
  if (isRecord(error)) {
    return {
      ...(typeof error.message === "string" ? { message: error.message } : {}),
      ...(typeof error.code === "string" ? { code: error.code } : {}),
    };
  }
  return {
    ...(typeof message === "string" ? { message } : {}),
    ...(typeof code === "string" ? { code } : {}),
  };
}

export function classifyHttpFailure(statusCode: number, body: unknown, request: RequestContext): HttpError {
  const described = describeFailureBody(body);
  const message = described.message ?? `HTTP ${statusCode}`;

  if (statusCode === 401 || statusCode === 403) {
    return new AuthError(statusCode, described.code ?? (statusCode === 401 ? "unauthorized" : "forbidden"), message, {
      body,
      request,
    });
  }
  return new HttpError(statusCode, described.code ?? "http_error", message, { body, request });
}
