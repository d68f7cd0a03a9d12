/**
 * wa-ticket-bridge configuration
 *
 * All settings from environment. Services receive what they need through
 * constructor options; nothing below src/services reads process.env.
 * dotenv must load here (not in index.ts) because ESM import hoisting
 * evaluates this module before any code in index.ts runs.
 */

import { config as dotenvConfig } from "dotenv";
dotenvConfig();

const DEV_JWT_SECRET = "change-me-in-production";
const DEV_ENCRYPTION_KEY = "dev-only-encryption-key";

const nodeEnv = process.env.NODE_ENV || "development";

// Reject insecure secrets in production
if (nodeEnv === "production") {
  if (!process.env.JWT_SECRET || process.env.JWT_SECRET === DEV_JWT_SECRET) {
    throw new Error(
      "FATAL: JWT_SECRET must be set to a secure value in production. " +
      `Do not use the default '${DEV_JWT_SECRET}'.`
    );
  }
  if (!process.env.ENCRYPTION_KEY || process.env.ENCRYPTION_KEY === DEV_ENCRYPTION_KEY) {
    throw new Error(
      "FATAL: ENCRYPTION_KEY must be set to a secure value in production. " +
      `Do not use the default '${DEV_ENCRYPTION_KEY}'.`
    );
  }
}

export type WebhookFormat = "json" | "form";

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseWebhookFormat(value: string | undefined): WebhookFormat {
  return value === "json" ? "json" : "form";
}

export const config = {
  port: parseInteger(process.env.PORT, 3002),
  nodeEnv,

  // Auth — bearer JWTs whose sub claim is the tenant id
  jwtSecret: process.env.JWT_SECRET || DEV_JWT_SECRET,
  jwtIssuer: process.env.JWT_ISSUER || "wa-ticket-bridge",

  // Used to build the webhook URL handed to the ticketing platform.
  // Unset = derive from the incoming request (X-Forwarded-* aware).
  publicBaseUrl: process.env.PUBLIC_BASE_URL || undefined,

  // Comma-separated; unset = allow all (dev default)
  corsOrigins: process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(",").map((s) => s.trim())
    : undefined,

  databaseUrl: process.env.DATABASE_URL || "file:./wa-ticket-bridge.db",

  // Credential Vault
  encryptionKey: process.env.ENCRYPTION_KEY || DEV_ENCRYPTION_KEY,

  // Bridge
  defaultInboxName: process.env.BRIDGE_INBOX_NAME || "WhatsApp Inbox",

  // Delivery engine
  webhookFormat: parseWebhookFormat(process.env.WEBHOOK_FORMAT),
  webhookRetryEnabled: process.env.WEBHOOK_RETRY_ENABLED === "true",
  webhookRetryCount: parseInteger(process.env.WEBHOOK_RETRY_COUNT, 3),
  webhookRetryDelaySeconds: parseInteger(process.env.WEBHOOK_RETRY_DELAY_SECONDS, 5),
  webhookErrorQueue: process.env.WEBHOOK_ERROR_QUEUE || "webhook_errors",

  // Shared queue (optional)
  redisUrl: process.env.REDIS_URL || undefined,
  eventQueue: process.env.EVENT_QUEUE || "whatsapp_events",
} as const;
