/**
 * Entry point for events coming off a tenant's WhatsApp session.
 *
 * Each message is forwarded to the ticketing platform (when the tenant has
 * the bridge enabled) and dispatched to the tenant's webhook and the shared
 * queue. Neither path raises to the session: failures are logged.
 */

import type { Tenant } from "../db/schema.js";
import type { BridgeService } from "./bridge/bridgeService.js";
import type { BridgeStore } from "./bridge/store.js";
import type { DeliveryEngine } from "./delivery/deliveryEngine.js";
import type { WhatsAppClient, WhatsAppMessageEvent } from "./whatsapp.js";

export const MESSAGE_EVENT_TYPE = "Message";

export interface WhatsAppEventHandlerDeps {
  store: BridgeStore;
  bridge: BridgeService;
  delivery: DeliveryEngine;
}

export class WhatsAppEventHandler {
  constructor(private readonly deps: WhatsAppEventHandlerDeps) {}

  async onMessage(
    tenantId: string,
    event: WhatsAppMessageEvent,
    client: WhatsAppClient,
    signal?: AbortSignal
  ): Promise<void> {
    let tenant: Tenant | null;
    try {
      tenant = await this.deps.store.getTenant(tenantId);
    } catch (err) {
      console.error(`[bridge] Failed to load tenant ${tenantId} for message ${event.id}:`, err);
      return;
    }
    if (!tenant) {
      console.warn(`[bridge] Message ${event.id} for unknown tenant ${tenantId} dropped`);
      return;
    }

    try {
      await this.deps.bridge.handleIncomingMessage(tenantId, event, client, signal);
    } catch (err) {
      console.error(`[bridge] Failed to forward message ${event.id} (tenant=${tenantId}):`, err);
    }

    await this.deps.delivery.dispatch(tenant, { type: MESSAGE_EVENT_TYPE, event });
  }
}
