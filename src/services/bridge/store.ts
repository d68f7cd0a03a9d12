/**
 * Persistence for the bridge: tenant lookup, bridge configuration,
 * conversation and message mappings.
 */

import { and, eq } from "drizzle-orm";
import {
  bridgeConfig,
  bridgeConversations,
  bridgeMessages,
  tenants,
  type BridgeConfigRow,
  type Database,
  type Tenant,
} from "../../db/index.js";

export type BridgeConfig = BridgeConfigRow;
export type BridgeConfigInput = Omit<BridgeConfigRow, "tenantId" | "createdAt" | "updatedAt">;

export interface ConversationMapping {
  tenantId: string;
  chatAddress: string;
  conversationId: number;
  contactId: number;
  inboxId: number;
}

export interface MessageMapping {
  tenantId: string;
  waMessageId: string;
  messageId: number;
  conversationId: number;
}

export interface BridgeStore {
  getTenant(tenantId: string): Promise<Tenant | null>;
  getTenantByToken(token: string): Promise<Tenant | null>;
  getConfig(tenantId: string): Promise<BridgeConfig | null>;
  saveConfig(tenantId: string, input: BridgeConfigInput): Promise<BridgeConfig>;
  deleteConfig(tenantId: string): Promise<boolean>;
  findConversation(tenantId: string, chatAddress: string): Promise<ConversationMapping | null>;
  /** Insert, or refresh the ids of an existing (tenant, chat) row. */
  saveConversation(mapping: ConversationMapping): Promise<void>;
  /** Insert once; a repeat for the same (tenant, message) is ignored. */
  saveMessageMapping(mapping: MessageMapping): Promise<void>;
}

export class DrizzleBridgeStore implements BridgeStore {
  constructor(private readonly db: Database) {}

  async getTenant(tenantId: string): Promise<Tenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.id, tenantId)).limit(1);
    return rows[0] ?? null;
  }

  async getTenantByToken(token: string): Promise<Tenant | null> {
    const rows = await this.db.select().from(tenants).where(eq(tenants.bridgeToken, token)).limit(1);
    return rows[0] ?? null;
  }

  async getConfig(tenantId: string): Promise<BridgeConfig | null> {
    const rows = await this.db
      .select()
      .from(bridgeConfig)
      .where(eq(bridgeConfig.tenantId, tenantId))
      .limit(1);
    return rows[0] ?? null;
  }

  async saveConfig(tenantId: string, input: BridgeConfigInput): Promise<BridgeConfig> {
    const now = new Date().toISOString();
    const rows = await this.db
      .insert(bridgeConfig)
      .values({ ...input, tenantId, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: bridgeConfig.tenantId,
        set: { ...input, updatedAt: now },
      })
      .returning();
    return rows[0];
  }

  async deleteConfig(tenantId: string): Promise<boolean> {
    const rows = await this.db
      .delete(bridgeConfig)
      .where(eq(bridgeConfig.tenantId, tenantId))
      .returning({ tenantId: bridgeConfig.tenantId });
    return rows.length > 0;
  }

  async findConversation(tenantId: string, chatAddress: string): Promise<ConversationMapping | null> {
    const rows = await this.db
      .select()
      .from(bridgeConversations)
      .where(
        and(
          eq(bridgeConversations.tenantId, tenantId),
          eq(bridgeConversations.chatAddress, chatAddress)
        )
      )
      .limit(1);

    if (rows.length === 0) return null;
    const row = rows[0];
    return {
      tenantId: row.tenantId,
      chatAddress: row.chatAddress,
      conversationId: row.conversationId,
      contactId: row.contactId,
      inboxId: row.inboxId,
    };
  }

  async saveConversation(mapping: ConversationMapping): Promise<void> {
    const now = new Date().toISOString();
    await this.db
      .insert(bridgeConversations)
      .values({ ...mapping, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [bridgeConversations.tenantId, bridgeConversations.chatAddress],
        set: {
          conversationId: mapping.conversationId,
          contactId: mapping.contactId,
          inboxId: mapping.inboxId,
          updatedAt: now,
        },
      });
  }

  async saveMessageMapping(mapping: MessageMapping): Promise<void> {
    await this.db
      .insert(bridgeMessages)
      .values({ ...mapping, createdAt: new Date().toISOString() })
      .onConflictDoNothing();
  }
}
