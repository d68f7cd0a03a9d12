/**
 * Express app factory. Everything stateful is passed in, so tests can
 * build an app against an in-memory database and fake collaborators.
 */

import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import { authenticate } from "./middleware/auth.js";
import { rateLimit } from "./middleware/rateLimit.js";
import { bridgeConfigRoutes } from "./routes/bridgeConfig.js";
import { bridgeWebhookRoutes } from "./routes/bridgeWebhook.js";
import type { AuditRecorder } from "./services/audit.js";
import type { BridgeService } from "./services/bridge/bridgeService.js";
import type { BridgeStore } from "./services/bridge/store.js";

export const SERVICE_NAME = "wa-ticket-bridge";

export interface AppDeps {
  store: BridgeStore;
  bridge: BridgeService;
  audit: AuditRecorder;
  jwtSecret: string;
  jwtIssuer?: string;
  defaultInboxName: string;
  publicBaseUrl?: string;
  nodeEnv?: string;
  corsOrigins?: string[];
  /** Requests per minute per client on the webhook endpoint. */
  webhookRateLimit?: number;
}

// Malformed JSON bodies surface here from express.json()
const jsonErrors: ErrorRequestHandler = (err, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "invalid payload" });
    return;
  }
  next(err);
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: deps.nodeEnv === "production" && deps.corsOrigins ? deps.corsOrigins : true,
      methods: ["GET", "POST", "PUT", "DELETE"],
      allowedHeaders: ["Content-Type", "Authorization"],
      maxAge: 86400,
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(jsonErrors);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME });
  });

  const auth = authenticate({ secret: deps.jwtSecret, issuer: deps.jwtIssuer });

  app.use(
    "/bridge/config",
    bridgeConfigRoutes({
      store: deps.store,
      bridge: deps.bridge,
      audit: deps.audit,
      auth,
      defaultInboxName: deps.defaultInboxName,
      publicBaseUrl: deps.publicBaseUrl,
    })
  );
  app.use(
    "/bridge/webhook",
    rateLimit({ windowMs: 60_000, max: deps.webhookRateLimit ?? 600 }),
    bridgeWebhookRoutes(deps.bridge)
  );

  // 404 catch-all
  app.use((_req, res) => {
    res.status(404).json({
      error: { code: "NOT_FOUND", message: "Route not found" },
    });
  });

  return app;
}
