/**
 * wa-ticket-bridge
 *
 * Keeps WhatsApp chats and ticketing-platform conversations in sync, and
 * delivers WhatsApp events to tenant webhooks and the shared queue.
 *
 * The WhatsApp protocol client lives outside this process entry: sessions
 * register with `whatsappClients` and feed messages to `events.onMessage`.
 */

import { config } from "./config.js";
import { createApp } from "./app.js";
import { openDatabase } from "./db/index.js";
import { createAuditRecorder } from "./services/audit.js";
import { BridgeService } from "./services/bridge/bridgeService.js";
import { DrizzleBridgeStore } from "./services/bridge/store.js";
import { DeadLetterPublisher } from "./services/delivery/deadLetter.js";
import { DeliveryEngine } from "./services/delivery/deliveryEngine.js";
import { WhatsAppEventHandler } from "./services/eventHandler.js";
import { createQueuePublisher } from "./services/queue.js";
import { CredentialVault } from "./services/vault.js";
import { WhatsAppClientRegistry } from "./services/whatsapp.js";

const { client, db } = await openDatabase(config.databaseUrl);

const store = new DrizzleBridgeStore(db);
const audit = createAuditRecorder(db);
const queue = createQueuePublisher(config.redisUrl);

export const whatsappClients = new WhatsAppClientRegistry();

const bridge = new BridgeService({ store, whatsapp: whatsappClients });

const delivery = new DeliveryEngine({
  vault: new CredentialVault(config.encryptionKey),
  deadLetters: new DeadLetterPublisher(queue, config.webhookErrorQueue),
  defaultFormat: config.webhookFormat,
  retryEnabled: config.webhookRetryEnabled,
  retryCount: config.webhookRetryCount,
  retryBaseDelayMs: config.webhookRetryDelaySeconds * 1000,
  queue,
  eventQueue: config.eventQueue,
  audit,
});

export const events = new WhatsAppEventHandler({ store, bridge, delivery });

const app = createApp({
  store,
  bridge,
  audit,
  jwtSecret: config.jwtSecret,
  jwtIssuer: config.jwtIssuer,
  defaultInboxName: config.defaultInboxName,
  publicBaseUrl: config.publicBaseUrl,
  nodeEnv: config.nodeEnv,
  corsOrigins: config.corsOrigins,
});

bridge.start();

const server = app.listen(config.port, () => {
  console.log(`wa-ticket-bridge listening on port ${config.port}`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`[bridge] ${signal} received, shutting down`);
  bridge.stop();
  server.close();
  try {
    await queue.close();
  } catch (err) {
    console.error("[queue] Failed to close queue connection:", err);
  }
  client.close();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => console.error("[bridge] Shutdown error:", err));
  });
}

export default app;
