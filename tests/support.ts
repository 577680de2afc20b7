import { pino } from "pino";
import { FixedClock } from "../src/infra/clock.js";
import { createClientConfig, type ClientConfigOptions } from "../src/infra/config.js";
import type { ClientConfig } from "../src/domain/types.js";
import type {
  FetchLike,
  FetchRequestInit,
  FetchResponseLike,
  HttpMethod,
  HttpTransportPort,
  TransportRequestOptions,
} from "../src/ports/http-transport.js";

export const silentLogger = pino({ level: "silent" });

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject.");
}

export const FIXED_NOW = "2026-03-01T12:00:00.000Z";

export function fixedClock(): FixedClock {
  return new FixedClock(FIXED_NOW);
}

export function testConfig(options: ClientConfigOptions = {}): ClientConfig {
  return createClientConfig({ baseUrl: "https://stay.test", token: "test-token", ...options });
}

export function respond(status: number, body = ""): FetchResponseLike {
  return {
    status,
    text: async () => body,
  };
}

export interface RecordedFetchCall {
  url: string;
  init: FetchRequestInit;
}

export function recordingFetch(
  responder: (url: string, init: FetchRequestInit) => FetchResponseLike | Promise<FetchResponseLike>,
): { fetch: FetchLike; calls: RecordedFetchCall[] } {
  const calls: RecordedFetchCall[] = [];
  return {
    calls,
    fetch: async (url, init) => {
      calls.push({ url, init });
      return responder(url, init);
    },
  };
}

export interface RecordedTransportCall {
  method: HttpMethod;
  path: string;
  options: TransportRequestOptions;
}

export function recordingTransport(
  response: Record<string, unknown> = {},
): { transport: HttpTransportPort; calls: RecordedTransportCall[] } {
  const calls: RecordedTransportCall[] = [];
  return {
    calls,
    transport: {
      async request(method, path, options) {
        calls.push({ method, path, options });
        return response;
      },
    },
  };
}
