/**
 * Contract with the WhatsApp protocol client.
 *
 * The protocol client itself (session, login, wire format) lives outside
 * this service; one instance exists per tenant and is looked up through a
 * WhatsAppDirectory.
 */

export interface MediaMessage {
  mimetype?: string;
  caption?: string;
  fileName?: string;
  /** Opaque download handle, passed back to WhatsAppClient.download. */
  directPath?: string;
  mediaKey?: string;
}

/**
 * Message body as delivered by the protocol client. At most one content
 * field is normally set; control messages carry no user-visible content.
 */
export interface WhatsAppMessageContent {
  conversation?: string;
  extendedTextMessage?: { text?: string };
  imageMessage?: MediaMessage;
  videoMessage?: MediaMessage;
  audioMessage?: MediaMessage;
  documentMessage?: MediaMessage;
  stickerMessage?: MediaMessage;
  protocolMessage?: Record<string, unknown>;
  reactionMessage?: Record<string, unknown>;
  pollCreationMessage?: Record<string, unknown>;
  pollUpdateMessage?: Record<string, unknown>;
  keepInChatMessage?: Record<string, unknown>;
}

export interface WhatsAppMessageEvent {
  id: string;
  /** Conversation address: the peer for direct chats, the group for groups. */
  chat: string;
  /** Sending participant. Equals chat in direct chats. */
  sender: string;
  isGroup: boolean;
  isFromMe: boolean;
  pushName?: string;
  timestamp?: string;
  message: WhatsAppMessageContent;
}

export type OutgoingContent =
  | { kind: "text"; text: string }
  | { kind: "media"; url: string; fileType?: string; caption: string };

export interface WhatsAppClient {
  isLoggedIn(): boolean;
  isConnected(): boolean;
  /** Returns the id WhatsApp assigned to the sent message. */
  sendMessage(address: string, content: OutgoingContent, signal?: AbortSignal): Promise<string>;
  download(media: MediaMessage, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface WhatsAppDirectory {
  get(tenantId: string): WhatsAppClient | undefined;
}

/** In-memory directory; the process entry registers clients as sessions connect. */
export class WhatsAppClientRegistry implements WhatsAppDirectory {
  private readonly clients = new Map<string, WhatsAppClient>();

  register(tenantId: string, client: WhatsAppClient): void {
    this.clients.set(tenantId, client);
  }

  unregister(tenantId: string): void {
    this.clients.delete(tenantId);
  }

  get(tenantId: string): WhatsAppClient | undefined {
    return this.clients.get(tenantId);
  }
}
