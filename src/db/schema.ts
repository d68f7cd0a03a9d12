/**
 * wa-ticket-bridge database schema
 *
 * Tenants are owned by the admin surface; the bridge reads them.
 * Bridge tables hang off a tenant and go away with it.
 */

import { sqliteTable, text, integer, index, uniqueIndex } from "drizzle-orm/sqlite-core";

// ─────────────────────────────────────────────────────────────────────────────
// TENANTS — one configured WhatsApp account/instance
// ─────────────────────────────────────────────────────────────────────────────

export const tenants = sqliteTable("tenants", {
  id: text("id").primaryKey(),
  name: text("name").notNull(), // instance name, merged into JSON events
  bridgeToken: text("bridge_token").notNull().unique(), // opaque, keys the inbound webhook URL
  webhookUrl: text("webhook_url"),
  webhookFormat: text("webhook_format").$type<"json" | "form">(), // null = process default
  hmacKey: text("hmac_key"), // Credential Vault ciphertext (hex)
  createdAt: text("created_at").notNull(), // ISO8601
  updatedAt: text("updated_at").notNull(),
});

// ─────────────────────────────────────────────────────────────────────────────
// BRIDGE CONFIG — ticketing platform credentials + feature flags
// ─────────────────────────────────────────────────────────────────────────────

export const bridgeConfig = sqliteTable("bridge_config", {
  tenantId: text("tenant_id")
    .primaryKey()
    .references(() => tenants.id, { onDelete: "cascade" }),
  accountId: text("account_id").notNull(),
  token: text("token").notNull(), // never returned unmasked
  url: text("url").notNull(),
  inboxId: integer("inbox_id"), // set on first auto-provision
  nameInbox: text("name_inbox").notNull(),

  enabled: integer("enabled", { mode: "boolean" }).notNull().default(false),
  autoCreate: integer("auto_create", { mode: "boolean" }).notNull().default(false),
  signMsg: integer("sign_msg", { mode: "boolean" }).notNull().default(false),
  reopenConversation: integer("reopen_conversation", { mode: "boolean" }).notNull().default(false),
  conversationPending: integer("conversation_pending", { mode: "boolean" }).notNull().default(false),
  mergeBrazilContacts: integer("merge_brazil_contacts", { mode: "boolean" }).notNull().default(false),

  signDelimiter: text("sign_delimiter").notNull().default("\\n"),
  organization: text("organization").notNull().default(""),
  logo: text("logo").notNull().default(""),

  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

// ─────────────────────────────────────────────────────────────────────────────
// CONVERSATION MAPPING — WhatsApp chat → remote conversation
// ─────────────────────────────────────────────────────────────────────────────

export const bridgeConversations = sqliteTable(
  "bridge_conversations",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id")
      .notNull()
      .references(() => tenants.id, { onDelete: "cascade" }),
    chatAddress: text("chat_address").notNull(), // e.g. 5511999999999@s.whatsapp.net
    conversationId: integer("conversation_id").notNull(),
    contactId: integer("contact_id").notNull(),
    inboxId: integer("inbox_id").notNull(),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [uniqueIndex("uq_bc_tenant_chat").on(table.tenantId, table.chatAddress)]
);

// ─────────────────────────────────────────────────────────────────────────────
// MESSAGE MAPPING — WhatsApp message → remote message
// ─────────────────────────────────────────────────────────────────────────────

export const bridgeMessages = sqliteTable(
  "bridge_messages",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    tenantId: text("tenant_id")
      .notNull()
      .references(() => tenants.id, { onDelete: "cascade" }),
    waMessageId: text("wa_message_id").notNull(),
    messageId: integer("message_id").notNull(),
    conversationId: integer("conversation_id").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => [uniqueIndex("uq_bm_tenant_message").on(table.tenantId, table.waMessageId)]
);

// ─────────────────────────────────────────────────────────────────────────────
// AUDIT LOG — append-only
// ─────────────────────────────────────────────────────────────────────────────

export const auditLog = sqliteTable(
  "audit_log",
  {
    id: text("id").primaryKey(), // UUID
    tenantId: text("tenant_id").notNull(),
    action: text("action").notNull(),
    // "bridge_config.saved" | "bridge_config.deleted" | "delivery.failed"
    targetType: text("target_type").notNull(), // "bridge_config" | "webhook"
    targetId: text("target_id").notNull(),
    metadata: text("metadata", { mode: "json" }).$type<Record<string, unknown>>(),
    createdAt: text("created_at").notNull(),
  },
  (table) => [
    index("idx_audit_tenant").on(table.tenantId),
    index("idx_audit_time").on(table.createdAt),
  ]
);

export type Tenant = typeof tenants.$inferSelect;
export type BridgeConfigRow = typeof bridgeConfig.$inferSelect;
export type ConversationMappingRow = typeof bridgeConversations.$inferSelect;
export type MessageMappingRow = typeof bridgeMessages.$inferSelect;
