/**
 * Bridge configuration routes — per-tenant ticketing platform settings.
 *
 * GET    /bridge/config  — Current settings (token masked) + webhook URL
 * PUT    /bridge/config  — Create or update; optionally provisions the inbox
 * POST   /bridge/config  — Same as PUT
 * DELETE /bridge/config  — Remove the configuration
 *
 * The tenant is the JWT's sub claim.
 */

import { Router, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { AuditRecorder } from "../services/audit.js";
import type { BridgeService } from "../services/bridge/bridgeService.js";
import type { BridgeConfig, BridgeStore } from "../services/bridge/store.js";

export interface BridgeConfigRouteDeps {
  store: BridgeStore;
  bridge: BridgeService;
  audit: AuditRecorder;
  auth: RequestHandler;
  defaultInboxName: string;
  /** Unset = derive from the request. */
  publicBaseUrl?: string;
}

const ConfigSchema = z.object({
  account_id: z.union([z.string().min(1), z.number().int().nonnegative().transform(String)]),
  token: z.string().min(1),
  url: z.string().url(),
  name_inbox: z.string().min(1).max(200).optional(),
  inbox_id: z.number().int().positive().nullish(),
  enabled: z.boolean().default(false),
  auto_create: z.boolean().default(false),
  sign_msg: z.boolean().default(false),
  sign_delimiter: z.string().max(20).optional(),
  reopen_conversation: z.boolean().default(false),
  conversation_pending: z.boolean().default(false),
  merge_brazil_contacts: z.boolean().default(false),
  organization: z.string().max(200).default(""),
  logo: z.string().max(2000).default(""),
});

export function maskToken(token: string): string {
  return token.length <= 4 ? "****" : `****${token.slice(-4)}`;
}

export function webhookBaseUrl(req: Request, publicBaseUrl?: string): string {
  if (publicBaseUrl) return publicBaseUrl.replace(/\/+$/, "");
  const proto = req.get("x-forwarded-proto")?.split(",")[0].trim() || req.protocol;
  const host = req.get("x-forwarded-host")?.split(",")[0].trim() || req.get("host") || "localhost";
  return `${proto}://${host}`;
}

function toResponse(config: BridgeConfig, webhookUrl: string) {
  return {
    enabled: config.enabled,
    account_id: config.accountId,
    token: maskToken(config.token),
    url: config.url,
    name_inbox: config.nameInbox,
    inbox_id: config.inboxId,
    auto_create: config.autoCreate,
    sign_msg: config.signMsg,
    sign_delimiter: config.signDelimiter,
    reopen_conversation: config.reopenConversation,
    conversation_pending: config.conversationPending,
    merge_brazil_contacts: config.mergeBrazilContacts,
    organization: config.organization,
    logo: config.logo,
    webhook_url: webhookUrl,
  };
}

function tenantOf(req: Request, res: Response): string | null {
  if (!req.tenantId) {
    res.status(401).json({ error: { code: "UNAUTHORIZED", message: "Authentication required" } });
    return null;
  }
  return req.tenantId;
}

export function bridgeConfigRoutes(deps: BridgeConfigRouteDeps): Router {
  const routes = Router();
  const { store, bridge, audit, auth } = deps;

  // ───────────────────────────────────────────────────────────────────────────
  // GET /bridge/config
  // ───────────────────────────────────────────────────────────────────────────

  routes.get("/", auth, async (req, res) => {
    try {
      const tenantId = tenantOf(req, res);
      if (!tenantId) return;

      const tenant = await store.getTenant(tenantId);
      const config = tenant ? await store.getConfig(tenantId) : null;
      if (!tenant || !config) {
        res.status(404).json({ error: { code: "NOT_FOUND", message: "Bridge not configured" } });
        return;
      }

      const webhookUrl = `${webhookBaseUrl(req, deps.publicBaseUrl)}/bridge/webhook/${tenant.bridgeToken}`;
      res.json({ data: toResponse(config, webhookUrl) });
    } catch (err) {
      console.error("[bridge] Get config error:", err);
      res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Failed to load bridge configuration" } });
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // PUT|POST /bridge/config
  // ───────────────────────────────────────────────────────────────────────────

  const save: RequestHandler = async (req, res) => {
    try {
      const tenantId = tenantOf(req, res);
      if (!tenantId) return;

      const body = ConfigSchema.parse(req.body);

      const tenant = await store.getTenant(tenantId);
      if (!tenant) {
        res.status(404).json({ error: { code: "NOT_FOUND", message: "Tenant not found" } });
        return;
      }

      const existing = await store.getConfig(tenantId);
      const nameInbox = body.name_inbox ?? existing?.nameInbox ?? deps.defaultInboxName;
      let inboxId = body.inbox_id ?? existing?.inboxId ?? null;
      let provisioned = false;

      if (body.auto_create && inboxId === null) {
        const webhookUrl = `${webhookBaseUrl(req, deps.publicBaseUrl)}/bridge/webhook/${tenant.bridgeToken}`;
        try {
          inboxId = await bridge.initializeInbox(
            {
              url: body.url,
              accountId: body.account_id,
              token: body.token,
              nameInbox,
              organization: body.organization,
              logo: body.logo,
            },
            webhookUrl
          );
          provisioned = true;
        } catch (err) {
          console.error(`[bridge] Inbox provisioning failed (tenant=${tenantId}):`, err);
          res.status(500).json({
            error: {
              code: "INBOX_PROVISION_FAILED",
              message: `Failed to create inbox: ${err instanceof Error ? err.message : String(err)}`,
            },
          });
          return;
        }
      }

      const saved = await store.saveConfig(tenantId, {
        accountId: body.account_id,
        token: body.token,
        url: body.url,
        inboxId,
        nameInbox,
        enabled: body.enabled,
        autoCreate: body.auto_create,
        signMsg: body.sign_msg,
        signDelimiter: body.sign_delimiter ?? "\\n",
        reopenConversation: body.reopen_conversation,
        conversationPending: body.conversation_pending,
        mergeBrazilContacts: body.merge_brazil_contacts,
        organization: body.organization,
        logo: body.logo,
      });

      await audit({
        tenantId,
        action: "bridge_config.saved",
        targetType: "bridge_config",
        targetId: tenantId,
        metadata: { enabled: saved.enabled, inboxId: saved.inboxId, provisioned },
      });

      res.json({
        status: "success",
        message: provisioned ? "Bridge configured and inbox created" : "Bridge configured",
        inbox_id: saved.inboxId ?? undefined,
      });
    } catch (err) {
      if (err instanceof z.ZodError) {
        res.status(400).json({ error: { code: "VALIDATION_ERROR", message: err.message } });
        return;
      }
      console.error("[bridge] Save config error:", err);
      res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Failed to save bridge configuration" } });
    }
  };

  routes.put("/", auth, save);
  routes.post("/", auth, save);

  // ───────────────────────────────────────────────────────────────────────────
  // DELETE /bridge/config
  // ───────────────────────────────────────────────────────────────────────────

  routes.delete("/", auth, async (req, res) => {
    try {
      const tenantId = tenantOf(req, res);
      if (!tenantId) return;

      const deleted = await store.deleteConfig(tenantId);
      if (!deleted) {
        res.status(404).json({ error: { code: "NOT_FOUND", message: "Bridge not configured" } });
        return;
      }

      bridge.cache.evictTenant(tenantId);

      await audit({
        tenantId,
        action: "bridge_config.deleted",
        targetType: "bridge_config",
        targetId: tenantId,
      });

      res.json({ status: "success", message: "Bridge configuration removed" });
    } catch (err) {
      console.error("[bridge] Delete config error:", err);
      res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Failed to delete bridge configuration" } });
    }
  });

  return routes;
}
