import { describe, expect, it } from "vitest";
import { invokeLocation, invokePath, resolveInvokeTarget } from "../src/application/target-resolution.js";
import { ValidationError } from "../src/infra/errors.js";

const defaults = { defaultRoomId: "room-1", defaultWebhookId: "wh_default", defaultSecret: "test-secret" };

describe("resolveInvokeTarget", () => {
  it("falls back to client defaults", () => {
    expect(resolveInvokeTarget({}, defaults)).toEqual({
      type: "room",
      roomId: "room-1",
      webhookId: "wh_default",
      secret: "test-secret",
    });
  });

  it("resolves each field independently", () => {
    expect(resolveInvokeTarget({ webhookId: "wh_other" }, defaults)).toEqual({
      type: "room",
      roomId: "room-1",
      webhookId: "wh_other",
      secret: "test-secret",
    });
  });

  it("prefers an explicit invoke URL", () => {
    const target = resolveInvokeTarget(
      { invokeUrl: "https://stay.test/api/webhooks/room-9/wh_9/invoke", secret: "other-secret" },
      defaults,
    );
    expect(target).toEqual({
      type: "url",
      invokeUrl: "https://stay.test/api/webhooks/room-9/wh_9/invoke",
      secret: "other-secret",
    });
    expect(invokeLocation(target)).toBe("https://stay.test/api/webhooks/room-9/wh_9/invoke");
  });

  it("requires a secret", () => {
    expect(() => resolveInvokeTarget({ roomId: "room-1", webhookId: "wh_1" }, {})).toThrowError(
      "A webhook secret is required to invoke a webhook.",
    );
  });

  it("requires room and webhook without a URL", () => {
    expect(() => resolveInvokeTarget({ roomId: "room-1", secret: "test-secret" }, {})).toThrowError(ValidationError);
  });

  it("rejects a non-http invoke URL", () => {
    expect(() => resolveInvokeTarget({ invokeUrl: "ws://stay.test/x", secret: "test-secret" }, {})).toThrowError(
      "invokeUrl must be an http/https URL.",
    );
  });
});

describe("invokePath", () => {
  it("encodes path segments", () => {
    expect(invokePath("lobby room", "wh/1")).toBe("/webhooks/lobby%20room/wh%2F1/invoke");
  });
});
