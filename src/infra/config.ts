import type { ClientConfig } from "../domain/types.js";
import { ValidationError } from "./errors.js";

export const DEFAULT_BASE_URL = "http://localhost:3000";
export const DEFAULT_API_PREFIX = "/api";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "stayhooks/0.1";

const MIN_TIMEOUT_MS = 100;
const MAX_TIMEOUT_MS = 120_000;

export interface ClientConfigOptions {
  baseUrl?: string;
  apiPrefix?: string;
  token?: string;
  defaultRoomId?: string;
  defaultWebhookId?: string;
  defaultSecret?: string;
  defaultAlias?: string;
  timeoutMs?: number;
  userAgent?: string;
}

type Env = Record<string, string | undefined>;

function invalidConfig(name: string, expectation: string): ValidationError {
  return new ValidationError("invalid_client_config", `Configuration '${name}' ${expectation}.`);
}

function normalizeBaseUrl(raw: string, name: string): string {
  const value = raw.trim().replace(/\/+$/, "");
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw invalidConfig(name, "must be an absolute URL");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw invalidConfig(name, "must use http or https");
  }
  return value;
}

export function normalizeApiPrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+|\/+$/g, "");
  return trimmed ? `/${trimmed}` : "";
}

function normalizeTimeout(value: number, name: string): number {
  if (!Number.isInteger(value)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (value < MIN_TIMEOUT_MS || value > MAX_TIMEOUT_MS) {
    throw invalidConfig(name, `must be between ${MIN_TIMEOUT_MS} and ${MAX_TIMEOUT_MS}`);
  }
  return value;
}

function optionalValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Normalizes caller options into a frozen config; every request reads from it. */
export function createClientConfig(options: ClientConfigOptions = {}): ClientConfig {
  const token = optionalValue(options.token);
  const defaultRoomId = optionalValue(options.defaultRoomId);
  const defaultWebhookId = optionalValue(options.defaultWebhookId);
  const defaultSecret = optionalValue(options.defaultSecret);
  const defaultAlias = optionalValue(options.defaultAlias);
  const userAgent = optionalValue(options.userAgent) ?? DEFAULT_USER_AGENT;

  return Object.freeze({
    baseUrl: normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL, "baseUrl"),
    apiPrefix: normalizeApiPrefix(options.apiPrefix ?? DEFAULT_API_PREFIX),
    timeoutMs: normalizeTimeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, "timeoutMs"),
    userAgent,
    ...(token ? { token } : {}),
    ...(defaultRoomId ? { defaultRoomId } : {}),
    ...(defaultWebhookId ? { defaultWebhookId } : {}),
    ...(defaultSecret ? { defaultSecret } : {}),
    ...(defaultAlias ? { defaultAlias } : {}),
  });
}

function parseIntegerEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  return normalizeTimeout(parsed, name);
}

function parseUrlEnv(env: Env, name: string): string | undefined {
  const raw = optionalValue(env[name]);
  return raw === undefined ? undefined : normalizeBaseUrl(raw, name);
}

/**
 * Reads STAYHERE_* variables. Explicit `overrides` win over the environment,
 * which wins over the built-in defaults.
 */
export function loadClientConfig(env: Env = process.env, overrides: ClientConfigOptions = {}): ClientConfig {
  return createClientConfig({
    baseUrl: overrides.baseUrl ?? parseUrlEnv(env, "STAYHERE_BASE_URL"),
    apiPrefix: overrides.apiPrefix ?? env.STAYHERE_API_PREFIX,
    token: overrides.token ?? env.STAYHERE_TOKEN,
    defaultRoomId: overrides.defaultRoomId ?? env.STAYHERE_ROOM,
    defaultWebhookId: overrides.defaultWebhookId ?? env.STAYHERE_WEBHOOK,
    defaultSecret: overrides.defaultSecret ?? env.STAYHERE_SECRET,
    defaultAlias: overrides.defaultAlias ?? env.STAYHERE_ALIAS,
    timeoutMs: overrides.timeoutMs ?? parseIntegerEnv(env, "STAYHERE_TIMEOUT_MS"),
    userAgent: overrides.userAgent ?? env.STAYHERE_USER_AGENT,
  });
}
