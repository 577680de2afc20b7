import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

export const WEBHOOK_SECRET_HEADER = "x-stay-webhook-secret";

export function generateWebhookSecret(): string {
  return `whk_secret_${randomBytes(18).toString("base64url")}`;
}

/** Stable, non-reversible identifier for a secret; safe to log. */
export function webhookSecretKeyId(secret: string): string {
  const digest = createHash("sha256").update(secret).digest("hex");
  return `whk_${digest.slice(0, 12)}`;
}

export function webhookSecretPreview(secret: string): string {
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

export function secretsMatch(expected: string, provided: string): boolean {
  const a = createHash("sha256").update(expected).digest();
  const b = createHash("sha256").update(provided).digest();
  return timingSafeEqual(a, b);
}
