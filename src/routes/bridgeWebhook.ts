/**
 * Inbound webhook from the ticketing platform.
 *
 * POST /bridge/webhook/:token
 * POST /bridge/webhook?token=…
 *
 * Responds with the flat { status } / { error } body the platform expects.
 */

import { Router, type Request, type RequestHandler } from "express";
import type { BridgeService } from "../services/bridge/bridgeService.js";

export function bridgeWebhookRoutes(bridge: BridgeService): Router {
  const routes = Router();

  const handle =
    (tokenOf: (req: Request) => string): RequestHandler =>
    async (req, res) => {
      try {
        const result = await bridge.handleOutgoingWebhook(tokenOf(req), req.body);
        res.status(result.status).json(result.body);
      } catch (err) {
        console.error("[bridge] Webhook handling error:", err);
        res.status(500).json({ error: "internal error" });
      }
    };

  routes.post("/", handle((req) => (typeof req.query.token === "string" ? req.query.token : "")));
  routes.post("/:token", handle((req) => req.params.token ?? ""));

  return routes;
}
