import { describe, expect, it } from "vitest";
import { DEFAULT_PAYLOAD_LIMITS } from "../src/api/validators.js";
import { InvocationService } from "../src/application/invocation.js";
import type { WebhookPayload } from "../src/domain/types.js";
import { ValidationError } from "../src/infra/errors.js";
import { captureRejection, fixedClock, recordingTransport, silentLogger, testConfig } from "./support.js";

function service(options: Parameters<typeof testConfig>[0] = {}, response: Record<string, unknown> = { ok: true }) {
  const { transport, calls } = recordingTransport(response);
  const config = testConfig({ defaultRoomId: "room-1", defaultWebhookId: "wh_1", defaultSecret: "test-secret", ...options });
  return { invocation: new InvocationService(transport, config, fixedClock(), silentLogger), calls };
}

describe("InvocationService", () => {
  it("sends a message through the default webhook", async () => {
    const { invocation, calls } = service({ defaultAlias: "Deploy Bot" }, { ok: true, kind: "message", messageId: "m_1" });

    const result = await invocation.sendMessage({ text: "deploy finished" });

    expect(calls).toEqual([
      {
        method: "POST",
        path: "/webhooks/room-1/wh_1/invoke",
        options: {
          body: { action: "message", payload: { text: "deploy finished", alias: "Deploy Bot" } },
          auth: { type: "secret", secret: "test-secret" },
        },
      },
    ]);
    expect(result).toEqual({ ok: true, kind: "message", messageId: "m_1", extra: {} });
  });

  it("keeps unknown response keys under extra", async () => {
    const { invocation } = service({}, { ok: true, kind: "poll", pollId: "p_1", messageId: "m_2", queued: false });
    const result = await invocation.sendPoll({ question: "Ship?", options: ["Yes", "No"] });
    expect(result).toEqual({ ok: true, kind: "poll", pollId: "p_1", messageId: "m_2", extra: { queued: false } });
  });

  it("uses per-call overrides", async () => {
    const { invocation, calls } = service();

    await invocation.sendImage({
      url: "https://cdn.stay.test/cat.jpeg",
      roomId: "room-2",
      webhookId: "wh_2",
      secret: "other-secret",
    });

    expect(calls[0]?.path).toBe("/webhooks/room-2/wh_2/invoke");
    expect(calls[0]?.options.auth).toEqual({ type: "secret", secret: "other-secret" });
    expect(calls[0]?.options.body).toEqual({ action: "image", payload: { url: "https://cdn.stay.test/cat.jpeg" } });
  });

  it("posts to an explicit invoke URL", async () => {
    const { invocation, calls } = service();

    await invocation.sendEmbed({
      title: "Release",
      notes: ["a", "b"],
      invokeUrl: "https://hooks.stay.test/api/webhooks/room-9/wh_9/invoke",
    });

    expect(calls[0]?.path).toBe("https://hooks.stay.test/api/webhooks/room-9/wh_9/invoke");
    expect(calls[0]?.options.body).toEqual({
      action: "embed",
      payload: { embed: { title: "Release", description: "• a\n• b" } },
    });
  });

  it("validates the payload before resolving the target", async () => {
    const { invocation, calls } = service({ defaultSecret: "" });
    await expect(invocation.sendPoll({ question: "Q", options: ["A"] })).rejects.toThrowError(
      "A poll needs between 2 and 8 options, got 1.",
    );
    await expect(invocation.sendMessage({ text: "hi" })).rejects.toThrowError(
      "A webhook secret is required to invoke a webhook.",
    );
    expect(calls).toHaveLength(0);
  });

  const invalidPayloads: Array<[WebhookPayload, string]> = [
    [{ kind: "poll", question: "Q", options: ["A"], multipleChoice: false }, "invalid_poll_options"],
    [{ kind: "poll", question: "Q", options: ["A", "A"], multipleChoice: false }, "invalid_poll_options"],
    [{ kind: "embed", title: "", notes: [], color: "red" }, "invalid_embed_title"],
    [{ kind: "embed", title: "Release", notes: [], color: "red" }, "invalid_embed_color"],
    [{ kind: "message", text: "  " }, "invalid_message_text"],
  ];

  it.each(invalidPayloads)("rejects dispatched payload %j before any request", async (payload, code) => {
    const { invocation, calls } = service();

    const error = await captureRejection(invocation.dispatch(payload));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.code).toBe(code);
    }
    expect(calls).toHaveLength(0);
  });

  it("dispatches a valid payload in its built form", async () => {
    const { invocation, calls } = service({ defaultAlias: "Deploy Bot" });

    await invocation.dispatch({ kind: "poll", question: " Ship? ", options: [" Yes", "No "], multipleChoice: false });
    await invocation.dispatch({ kind: "message", text: "hi" });

    expect(calls.map((call) => call.options.body)).toEqual([
      { action: "poll", payload: { question: "Ship?", options: ["Yes", "No"], multipleChoice: false } },
      { action: "message", payload: { text: "hi", alias: "Deploy Bot" } },
    ]);
  });

  it("applies a permitted-actions precheck locally", async () => {
    const { invocation, calls } = service();
    const precheck = { actions: ["message" as const], limit: 10, limits: DEFAULT_PAYLOAD_LIMITS };

    const error = await captureRejection(invocation.sendEmbed({ title: "Release", precheck }));

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.code).toBe("action_not_permitted");
    }
    expect(calls).toHaveLength(0);

    await invocation.sendMessage({ text: "allowed", precheck });
    expect(calls).toHaveLength(1);
  });

  it("sends a raw body through invokeWebhook", async () => {
    const { invocation, calls } = service();
    const body = { action: "sticker", payload: { id: 7 } };

    await invocation.invokeWebhook(" https://stay.test/api/webhooks/room-1/wh_1/invoke ", "test-secret", body);

    expect(calls[0]).toEqual({
      method: "POST",
      path: "https://stay.test/api/webhooks/room-1/wh_1/invoke",
      options: { body, auth: { type: "secret", secret: "test-secret" } },
    });
  });

  it("rejects invokeWebhook without a usable url or secret", async () => {
    const { invocation, calls } = service();
    const body = { action: "message", payload: { text: "hi" } };
    await expect(invocation.invokeWebhook("/relative", "test-secret", body)).rejects.toThrowError(
      "invokeUrl must be an http/https URL.",
    );
    await expect(invocation.invokeWebhook("https://stay.test/x", " ", body)).rejects.toThrowError(
      "A webhook secret is required to invoke a webhook.",
    );
    expect(calls).toHaveLength(0);
  });
});
