/**
 * Bridge service — keeps WhatsApp chats and ticketing conversations in sync.
 *
 * Inbound (WhatsApp → platform): dedup, noise filter, resolve contact and
 * conversation, forward text or media tagged with a WAID: source id.
 *
 * Outbound (platform webhook → WhatsApp): filter to public outgoing
 * messages, drop echoes of messages we created, persist the conversation
 * mapping, send synchronously, and remember the sent ids so the inbound
 * path ignores them when WhatsApp echoes them back.
 */

import { z } from "zod";
import {
  TicketingClient,
  type TicketingCredentials,
  type MessageDirection,
} from "../ticketing/client.js";
import type { OutgoingContent, WhatsAppClient, WhatsAppDirectory, WhatsAppMessageEvent } from "../whatsapp.js";
import { DedupGuard } from "./dedupGuard.js";
import { ConversationCache, type RemoteConversationIds } from "./conversationCache.js";
import { extractMedia, extractText, isNoise } from "./messageContent.js";
import { addressLocalPart, brazilianAlternate, formatToE164, toUserAddress } from "./phone.js";
import type { BridgeConfig, BridgeStore } from "./store.js";

/** Source-id prefix on every message the bridge creates on the platform. */
export const BRIDGE_SOURCE_PREFIX = "WAID:";
/** Source-id prefix on conversations the bridge creates. */
export const CONVERSATION_SOURCE_PREFIX = "wa:";
/** Identifier of the bot contact created with an auto-provisioned inbox. */
export const BOT_CONTACT_IDENTIFIER = "123456";
export const DEFAULT_ORGANIZATION = "WA Ticket Bridge";

export type TicketingApi = Pick<
  TicketingClient,
  | "createInbox"
  | "findContactByPhone"
  | "createContact"
  | "createConversation"
  | "createMessage"
  | "sendMediaMessage"
>;

export interface InboxSetup extends TicketingCredentials {
  nameInbox: string;
  organization?: string;
  logo?: string;
}

export interface WebhookResult {
  status: number;
  body: Record<string, string>;
}

export class BridgeError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

export interface BridgeServiceOptions {
  store: BridgeStore;
  whatsapp: WhatsAppDirectory;
  dedup?: DedupGuard;
  cache?: ConversationCache;
  ticketingClient?: (credentials: TicketingCredentials) => TicketingApi;
}

// ─────────────────────────────────────────────────────────────────────────────
// Platform webhook payload (message_created and friends)
// ─────────────────────────────────────────────────────────────────────────────

const WebhookAttachment = z.object({
  data_url: z.string(),
  file_type: z.string().nullish(),
});

const WebhookPayloadSchema = z.object({
  event: z.string().nullish(),
  message_type: z.string().nullish(),
  id: z.number().int().nullish(),
  content: z.string().nullish(),
  private: z.boolean().nullish(),
  conversation: z
    .object({
      id: z.number().int().nullish(),
      status: z.string().nullish(),
      meta: z
        .object({
          sender: z
            .object({
              id: z.number().int().nullish(),
              identifier: z.string().nullish(),
              phone_number: z.string().nullish(),
            })
            .nullish(),
        })
        .nullish(),
      messages: z
        .array(
          z.object({
            id: z.number().int(),
            source_id: z.string().nullish(),
            attachments: z.array(WebhookAttachment).nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
  inbox: z.object({ id: z.number().int() }).nullish(),
  sender: z
    .object({
      name: z.string().nullish(),
      available_name: z.string().nullish(),
    })
    .nullish(),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

function ignored(reason: string): WebhookResult {
  return { status: 200, body: { status: "ignored", reason } };
}

function failure(status: number, error: string): WebhookResult {
  return { status, body: { error } };
}

/**
 * Prefix content with the agent's name when signing is enabled.
 * A stored "\n" (backslash, n) stands for a newline.
 */
export function signContent(config: BridgeConfig | null, payload: WebhookPayload, content: string): string {
  if (!config?.signMsg || !content) return content;
  const agent = payload.sender?.available_name || payload.sender?.name;
  if (!agent) return content;
  const delimiter = (config.signDelimiter || "\\n").replace(/\\n/g, "\n");
  return `*${agent}*${delimiter}${content}`;
}

export class BridgeService {
  readonly dedup: DedupGuard;
  readonly cache: ConversationCache;
  private readonly store: BridgeStore;
  private readonly whatsapp: WhatsAppDirectory;
  private readonly ticketingClient: (credentials: TicketingCredentials) => TicketingApi;

  constructor(options: BridgeServiceOptions) {
    this.store = options.store;
    this.whatsapp = options.whatsapp;
    this.dedup = options.dedup ?? new DedupGuard();
    this.cache = options.cache ?? new ConversationCache(options.store);
    this.ticketingClient = options.ticketingClient ?? ((credentials) => new TicketingClient(credentials));
  }

  start(): void {
    this.dedup.start();
  }

  stop(): void {
    this.dedup.stop();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inbound: WhatsApp → platform
  // ───────────────────────────────────────────────────────────────────────────

  async handleIncomingMessage(
    tenantId: string,
    event: WhatsAppMessageEvent,
    client: WhatsAppClient,
    signal?: AbortSignal
  ): Promise<void> {
    if (!this.dedup.claim(event.id)) {
      return;
    }

    if (isNoise(event.message)) {
      return;
    }

    const config = await this.store.getConfig(tenantId);
    if (!config || !config.enabled) {
      return;
    }

    const api = this.ticketingClient(config);
    const chatAddress = event.chat;
    // Groups: the contact is the participant, the conversation is the group
    const contactAddress = event.isGroup ? event.sender : event.chat;
    const contactName = event.pushName || addressLocalPart(contactAddress);
    const messageType: MessageDirection = event.isFromMe ? "outgoing" : "incoming";

    // Creation is shared with concurrent messages from this chat; only the wait is cancellable
    const { mapping, source } = await this.cache.ensure(
      tenantId,
      chatAddress,
      () => this.createRemoteConversation(api, config, chatAddress, contactAddress, contactName),
      signal
    );
    if (source !== "memory") {
      console.log(
        `[bridge] Conversation ${mapping.conversationId} for ${chatAddress} resolved from ${source} (tenant=${tenantId})`
      );
    }

    const sourceId = `${BRIDGE_SOURCE_PREFIX}${event.id}`;
    const media = extractMedia(event.message, event.id);
    let remoteMessageId: number;

    if (media) {
      signal?.throwIfAborted();
      const data = await client.download(media.media, signal);
      signal?.throwIfAborted();
      remoteMessageId = await api.sendMediaMessage(
        mapping.conversationId,
        {
          messageType,
          data,
          fileName: media.fileName,
          mimeType: media.mimeType,
          caption: media.caption,
          sourceId,
        },
        signal
      );
    } else {
      signal?.throwIfAborted();
      remoteMessageId = await api.createMessage(
        mapping.conversationId,
        { content: extractText(event.message), messageType, sourceId },
        signal
      );
    }

    try {
      await this.store.saveMessageMapping({
        tenantId,
        waMessageId: event.id,
        messageId: remoteMessageId,
        conversationId: mapping.conversationId,
      });
    } catch (err) {
      console.warn(`[bridge] Failed to record message mapping for ${event.id}:`, err);
    }
  }

  private async createRemoteConversation(
    api: TicketingApi,
    config: BridgeConfig,
    chatAddress: string,
    contactAddress: string,
    contactName: string
  ): Promise<RemoteConversationIds> {
    const inboxId = config.inboxId;
    if (inboxId === null) {
      throw new Error("inbox_id not configured");
    }

    const contactId = await this.ensureContact(api, config, inboxId, contactAddress, contactName);

    const conversationId = await api.createConversation({
      contactId,
      inboxId,
      sourceId: `${CONVERSATION_SOURCE_PREFIX}${chatAddress}`,
      pending: config.conversationPending,
    });

    return { conversationId, contactId, inboxId };
  }

  private async ensureContact(
    api: TicketingApi,
    config: BridgeConfig,
    inboxId: number,
    contactAddress: string,
    contactName: string
  ): Promise<number> {
    const phone = formatToE164(addressLocalPart(contactAddress));

    const found = await api.findContactByPhone(phone);
    if (found !== null) return found;

    if (config.mergeBrazilContacts) {
      const alternate = brazilianAlternate(phone);
      if (alternate) {
        const merged = await api.findContactByPhone(alternate);
        if (merged !== null) return merged;
      }
    }

    return api.createContact({ inboxId, name: contactName, phoneNumber: phone, identifier: contactAddress });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outbound: platform webhook → WhatsApp
  // ───────────────────────────────────────────────────────────────────────────

  async handleOutgoingWebhook(token: string, body: unknown): Promise<WebhookResult> {
    if (!token) {
      return failure(401, "missing token");
    }

    const tenant = await this.store.getTenantByToken(token);
    if (!tenant) {
      return failure(401, "invalid token");
    }

    const parsed = WebhookPayloadSchema.safeParse(body);
    if (!parsed.success) {
      return failure(400, "invalid payload");
    }
    const payload = parsed.data;

    if (payload.event !== "message_created") return ignored("not message_created");
    if (payload.message_type !== "outgoing") return ignored("not outgoing");
    if (payload.private) return ignored("private note");

    const messages = payload.conversation?.messages ?? [];
    const lead = messages[0];
    if (lead && lead.source_id?.startsWith(BRIDGE_SOURCE_PREFIX) && lead.id === payload.id) {
      return ignored("loop prevention");
    }

    const sender = payload.conversation?.meta?.sender;
    const chatId = sender?.identifier
      ? addressLocalPart(sender.identifier)
      : (sender?.phone_number ?? "").replace(/^\+/, "");
    if (!chatId) {
      return failure(400, "no destination");
    }
    const recipient = toUserAddress(chatId);

    // Keep the mapping even if the send below fails
    const conversationId = payload.conversation?.id;
    if (conversationId) {
      try {
        await this.cache.record({
          tenantId: tenant.id,
          chatAddress: recipient,
          conversationId,
          contactId: sender?.id ?? 0,
          inboxId: payload.inbox?.id ?? 0,
        });
      } catch (err) {
        console.warn(`[bridge] Failed to store conversation mapping from webhook (tenant=${tenant.id}):`, err);
      }
    }

    let client: WhatsAppClient;
    try {
      client = this.requireClient(tenant.id);
    } catch (err) {
      if (err instanceof BridgeError) {
        console.error(`[bridge] ${err.message} (tenant=${tenant.id})`);
        return failure(err.status, err.message);
      }
      throw err;
    }

    const config = await this.store.getConfig(tenant.id);
    const content = signContent(config, payload, payload.content ?? "");
    const attachments = messages.find((m) => m.id === payload.id && (m.attachments?.length ?? 0) > 0)?.attachments;

    if (attachments) {
      for (const attachment of attachments) {
        const media: OutgoingContent = {
          kind: "media",
          url: attachment.data_url,
          fileType: attachment.file_type ?? undefined,
          caption: content || attachment.data_url,
        };
        try {
          this.dedup.remember(await client.sendMessage(recipient, media));
        } catch (err) {
          console.error(`[bridge] Failed to send media to ${recipient} (tenant=${tenant.id}):`, err);
          return failure(500, "failed to send media");
        }
      }
      return { status: 200, body: { status: "success" } };
    }

    if (content) {
      try {
        const messageId = await client.sendMessage(recipient, { kind: "text", text: content });
        this.dedup.remember(messageId);
        console.log(
          `[bridge] Sent platform message ${payload.id ?? "?"} to ${recipient} as ${messageId} (tenant=${tenant.id})`
        );
      } catch (err) {
        console.error(`[bridge] Failed to send text to ${recipient} (tenant=${tenant.id}):`, err);
        return failure(500, "failed to send message");
      }
    }

    return { status: 200, body: { status: "success" } };
  }

  private requireClient(tenantId: string): WhatsAppClient {
    const client = this.whatsapp.get(tenantId);
    if (!client) throw new BridgeError(503, "whatsapp client not ready");
    if (!client.isLoggedIn()) throw new BridgeError(503, "whatsapp not logged in");
    if (!client.isConnected()) throw new BridgeError(503, "whatsapp disconnected");
    return client;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inbox provisioning
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Create an API inbox pointing at our webhook, plus the bot contact.
   * A bot contact failure is tolerated (it usually already exists).
   */
  async initializeInbox(setup: InboxSetup, webhookUrl: string): Promise<number> {
    const api = this.ticketingClient(setup);
    const inboxId = await api.createInbox(setup.nameInbox, webhookUrl);

    try {
      await api.createContact({
        inboxId,
        name: setup.organization || DEFAULT_ORGANIZATION,
        identifier: BOT_CONTACT_IDENTIFIER,
        avatarUrl: setup.logo || undefined,
      });
    } catch (err) {
      console.warn(`[bridge] Failed to create bot contact in inbox ${inboxId}:`, err);
    }

    return inboxId;
  }
}
