import { beforeEach, describe, it, expect, vi } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp, type AppDeps } from "../app.js";
import { openDatabase, tenants } from "../db/index.js";
import { createAuditRecorder } from "../services/audit.js";
import { BridgeService } from "../services/bridge/bridgeService.js";
import { DrizzleBridgeStore } from "../services/bridge/store.js";
import { WhatsAppClientRegistry, type OutgoingContent } from "../services/whatsapp.js";

const CHAT = "5511999999999@s.whatsapp.net";

const payload = {
  event: "message_created",
  message_type: "outgoing",
  id: 500,
  content: "Hi there",
  private: false,
  conversation: {
    id: 10,
    meta: { sender: { id: 20, identifier: CHAT } },
    messages: [{ id: 500, source_id: null }],
  },
  inbox: { id: 30 },
};

describe("bridge webhook route", () => {
  let registry: WhatsAppClientRegistry;
  let deps: AppDeps;
  let app: Express;
  const client = {
    isLoggedIn: () => true,
    isConnected: () => true,
    sendMessage: vi.fn(async (_address: string, _content: OutgoingContent) => "SENT-1"),
    download: async () => new Uint8Array(),
  };

  beforeEach(async () => {
    client.sendMessage.mockClear();
    const { db } = await openDatabase(":memory:");
    const now = new Date().toISOString();
    await db.insert(tenants).values({
      id: "tenant-1",
      name: "Support line",
      bridgeToken: "token-tenant-1",
      createdAt: now,
      updatedAt: now,
    });
    const store = new DrizzleBridgeStore(db);
    registry = new WhatsAppClientRegistry();
    registry.register("tenant-1", client);
    deps = {
      store,
      bridge: new BridgeService({ store, whatsapp: registry }),
      audit: createAuditRecorder(db),
      jwtSecret: "test-secret",
      defaultInboxName: "WhatsApp Inbox",
    };
    app = createApp(deps);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("delivers with the token in the path", async () => {
    const res = await request(app).post("/bridge/webhook/token-tenant-1").send(payload);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "success" });
    expect(client.sendMessage).toHaveBeenCalledWith(CHAT, { kind: "text", text: "Hi there" });
  });

  it("delivers with the token in the query", async () => {
    const res = await request(app).post("/bridge/webhook").query({ token: "token-tenant-1" }).send(payload);

    expect(res.status).toBe(200);
    expect(client.sendMessage).toHaveBeenCalledTimes(1);
  });

  it("rejects missing and unknown tokens", async () => {
    const missing = await request(app).post("/bridge/webhook").send(payload);
    expect(missing.status).toBe(401);
    expect(missing.body).toEqual({ error: "missing token" });

    const unknown = await request(app).post("/bridge/webhook/nope").send(payload);
    expect(unknown.status).toBe(401);
    expect(unknown.body).toEqual({ error: "invalid token" });
  });

  it("reports ignored events with 200", async () => {
    const res = await request(app)
      .post("/bridge/webhook/token-tenant-1")
      .send({ ...payload, message_type: "incoming" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ignored", reason: "not outgoing" });
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await request(app)
      .post("/bridge/webhook/token-tenant-1")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "invalid payload" });
  });

  it("returns 503 while WhatsApp is unavailable", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    registry.unregister("tenant-1");

    const res = await request(app).post("/bridge/webhook/token-tenant-1").send(payload);

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: "whatsapp client not ready" });
  });

  it("rate limits per client", async () => {
    const limited = createApp({ ...deps, webhookRateLimit: 1 });

    await request(limited).post("/bridge/webhook/token-tenant-1").send(payload);
    const res = await request(limited).post("/bridge/webhook/token-tenant-1").send(payload);

    expect(res.status).toBe(429);
  });
});
