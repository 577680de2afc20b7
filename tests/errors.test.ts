import { describe, expect, it } from "vitest";
import {
  AuthError,
  HttpError,
  InvalidResponseError,
  NetworkError,
  StayHereError,
  ValidationError,
  classifyHttpFailure,
  isStayHereError,
} from "../src/infra/errors.js";

const request = { method: "POST", url: "https://stay.test/api/webhooks/room-1" };

describe("error hierarchy", () => {
  it("keeps every failure under the package base class", () => {
    const failures = [
      new ValidationError("invalid_message_text", "text is required"),
      new HttpError(500, "http_error", "boom"),
      new AuthError(401, "unauthorized", "nope"),
      new NetworkError("timeout", "slow", request),
      new InvalidResponseError("invalid_response_body", "bad body", { statusCode: 200, raw: "<html>", request }),
    ];
    for (const failure of failures) {
      expect(failure).toBeInstanceOf(StayHereError);
      expect(isStayHereError(failure)).toBe(true);
    }
    expect(isStayHereError(new Error("plain"))).toBe(false);
  });

  it("treats auth failures as http failures with their own kind", () => {
    const failure = new AuthError(403, "token_revoked", "Token revoked.");
    expect(failure).toBeInstanceOf(HttpError);
    expect(failure.kind).toBe("auth");
    expect(failure.statusCode).toBe(403);
    expect(failure.message).toBe("Token revoked. (status=403)");
  });

  it("derives network codes from the failure reason", () => {
    expect(new NetworkError("timeout", "slow", request).code).toBe("request_timeout");
    const cause = new Error("ECONNREFUSED");
    const connection = new NetworkError("connection", "down", request, cause);
    expect(connection.code).toBe("connection_failed");
    expect(connection.cause).toBe(cause);
  });

  it("keeps the raw body of an unreadable success response", () => {
    const failure = new InvalidResponseError("invalid_response_body", "Server response was not a valid JSON object.", {
      statusCode: 200,
      raw: "not json",
      request,
    });
    expect(failure.kind).toBe("invalid_response");
    expect(failure.code).toBe("invalid_response_body");
    expect(failure.raw).toBe("not json");
    expect(failure.request).toEqual(request);
  });

  it("reports decoded bodies with missing fields under the same class", () => {
    const failure = new InvalidResponseError("malformed_response", "Webhook object is missing an id.");
    expect(failure).toBeInstanceOf(StayHereError);
    expect(failure.kind).toBe("invalid_response");
    expect(failure.code).toBe("malformed_response");
    expect(failure.statusCode).toBeUndefined();
  });
});

describe("classifyHttpFailure", () => {
  it("reads a nested error object", () => {
    const failure = classifyHttpFailure(
      422,
      { error: { code: "action_not_permitted", message: "Webhook may not send embed payloads." } },
      request,
    );
    expect(failure).not.toBeInstanceOf(AuthError);
    expect(failure.kind).toBe("http");
    expect(failure.code).toBe("action_not_permitted");
    expect(failure.message).toBe("Webhook may not send embed payloads. (status=422)");
    expect(failure.request).toEqual(request);
  });

  it("reads a flat error string with a sibling code", () => {
    const failure = classifyHttpFailure(409, { error: "Webhook is paused.", code: "webhook_paused" }, request);
    expect(failure.code).toBe("webhook_paused");
    expect(failure.message).toBe("Webhook is paused. (status=409)");
  });

  it("reads a top-level message", () => {
    const failure = classifyHttpFailure(400, { message: "Bad label" }, request);
    expect(failure.code).toBe("http_error");
    expect(failure.message).toBe("Bad label (status=400)");
  });

  it("uses a plain-text body as the message", () => {
    const failure = classifyHttpFailure(502, "  Bad Gateway  ", request);
    expect(failure.message).toBe("Bad Gateway (status=502)");
    expect(failure.body).toBe("  Bad Gateway  ");
  });

  it("caps long text bodies", () => {
    const failure = classifyHttpFailure(500, "x".repeat(800), request);
    expect(failure.message).toBe(`${"x".repeat(500)} (status=500)`);
  });

  it("falls back to the status when the body says nothing", () => {
    expect(classifyHttpFailure(500, undefined, request).message).toBe("HTTP 500 (status=500)");
    expect(classifyHttpFailure(500, [1, 2], request).message).toBe("HTTP 500 (status=500)");
  });

  it("maps 401 and 403 to auth failures", () => {
    const unauthorized = classifyHttpFailure(401, undefined, request);
    expect(unauthorized).toBeInstanceOf(AuthError);
    expect(unauthorized.code).toBe("unauthorized");

    const forbidden = classifyHttpFailure(403, "", request);
    expect(forbidden).toBeInstanceOf(AuthError);
    expect(forbidden.code).toBe("forbidden");
    expect(forbidden.message).toBe("HTTP 403 (status=403)");
  });
});
