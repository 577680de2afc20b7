import { performance } from "node:perf_hooks";
import type { ClientConfig } from "../../domain/types.js";
import {
  AuthError,
  InvalidResponseError,
  NetworkError,
  classifyHttpFailure,
  type RequestContext,
} from "../../infra/errors.js";
import { createLogger, type Logger } from "../../infra/logger.js";
import { WEBHOOK_SECRET_HEADER, webhookSecretKeyId } from "../../infra/webhook-secret.js";
import type {
  FetchLike,
  HttpMethod,
  HttpTransportPort,
  TransportRequestOptions,
} from "../../ports/http-transport.js";

const ABSOLUTE_URL_PATTERN = /^https?:\/\//i;

export interface FetchHttpTransportOptions {
  fetch?: FetchLike;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export class FetchHttpTransport implements HttpTransportPort {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(
    private readonly config: ClientConfig,
    options: FetchHttpTransportOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger({ component: "transport" });
  }

  resolveUrl(path: string): string {
    if (ABSOLUTE_URL_PATTERN.test(path)) {
      return path;
    }
    const normalizedPath = path.startsWith("/") ? path : `/${path}`;
    return `${this.config.baseUrl}${this.config.apiPrefix}${normalizedPath}`;
  }

  async request(
    method: HttpMethod,
    path: string,
    options: TransportRequestOptions,
  ): Promise<Record<string, unknown>> {
    const url = this.resolveUrl(path);
    const context: RequestContext = { method, url };
    const headers = this.buildHeaders(options, context);

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers["Content-Type"] = "application/json";
    }

    const startedAt = performance.now();
    const { statusCode, raw } = await this.exchange(url, { method, headers, body }, context);

    const durationMs = Math.round(performance.now() - startedAt);
    if (statusCode >= 200 && statusCode < 300) {
      this.logger.debug({ method, url, statusCode, durationMs }, "request completed");
      return this.decodeSuccess(statusCode, raw, context);
    }

    const parsed = raw.trim() ? parseJson(raw) : { ok: false as const };
    const failureBody = parsed.ok ? parsed.value : raw || undefined;
    const failure = classifyHttpFailure(statusCode, failureBody, context);
    this.logger.warn({ method, url, statusCode, durationMs, code: failure.code }, "request rejected");
    throw failure;
  }

  private async exchange(
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body: string | undefined },
    context: RequestContext,
  ): Promise<{ statusCode: number; raw: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: init.method,
        headers: init.headers,
        signal: controller.signal,
        ...(init.body !== undefined ? { body: init.body } : {}),
      });
      return { statusCode: response.status, raw: await response.text() };
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.warn({ method: init.method, url, timeoutMs: this.config.timeoutMs }, "request timed out");
        throw new NetworkError(
          "timeout",
          `Request ${init.method} ${url} timed out after ${this.config.timeoutMs}ms.`,
          context,
          error,
        );
      }
      this.logger.warn({ method: init.method, url, err: errorMessage(error) }, "request failed before a response");
      throw new NetworkError(
        "connection",
        `Failed to reach StayHere server: ${errorMessage(error)}`,
        context,
        error,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private buildHeaders(options: TransportRequestOptions, context: RequestContext): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": this.config.userAgent,
    };

    if (options.auth.type === "owner") {
      if (!this.config.token) {
        throw new AuthError(401, "missing_token", "Missing API token for this request.", { request: context });
      }
      headers.Authorization = `Bearer ${this.config.token}`;
      return headers;
    }

    this.logger.trace({ keyId: webhookSecretKeyId(options.auth.secret) }, "using webhook secret");
    headers[WEBHOOK_SECRET_HEADER] = options.auth.secret;
    return headers;
  }

  private decodeSuccess(statusCode: number, raw: string, context: RequestContext): Record<string, unknown> {
    if (!raw.trim()) {
      return {};
    }
    const parsed = parseJson(raw);
    if (!parsed.ok || !isRecord(parsed.value)) {
      throw new InvalidResponseError("invalid_response_body", "Server response was not a valid JSON object.", {
        statusCode,
        raw,
        request: context,
      });
    }
    return parsed.value;
  }
}
