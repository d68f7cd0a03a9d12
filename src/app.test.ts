import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "./app.js";
import { openDatabase } from "./db/index.js";
import { createAuditRecorder } from "./services/audit.js";
import { BridgeService } from "./services/bridge/bridgeService.js";
import { DrizzleBridgeStore } from "./services/bridge/store.js";
import { WhatsAppClientRegistry } from "./services/whatsapp.js";

async function buildApp() {
  const { db } = await openDatabase(":memory:");
  const store = new DrizzleBridgeStore(db);
  return createApp({
    store,
    bridge: new BridgeService({ store, whatsapp: new WhatsAppClientRegistry() }),
    audit: createAuditRecorder(db),
    jwtSecret: "test-secret",
    defaultInboxName: "WhatsApp Inbox",
  });
}

describe("app", () => {
  it("reports health", async () => {
    const res = await request(await buildApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", service: "wa-ticket-bridge" });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await request(await buildApp()).get("/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: "NOT_FOUND", message: "Route not found" } });
  });
});
