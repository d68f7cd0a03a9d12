/**
 * Ticketing platform REST client — inboxes, contacts, conversations, messages.
 *
 * All calls go to {url}/api/v1/accounts/{accountId}/… with the account's
 * api_access_token header and a 30 s timeout, combined with the caller's
 * AbortSignal when one is given.
 */

import { z } from "zod";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface TicketingCredentials {
  url: string;
  accountId: string;
  token: string;
}

export class TicketingApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly path: string
  ) {
    super(`HTTP ${status}: ${message}`);
    this.name = "TicketingApiError";
  }
}

export type MessageDirection = "incoming" | "outgoing";

export interface CreateContactInput {
  inboxId: number;
  name: string;
  phoneNumber?: string;
  identifier?: string;
  avatarUrl?: string;
}

export interface CreateConversationInput {
  contactId: number;
  inboxId: number;
  sourceId: string;
  pending: boolean;
}

export interface CreateMessageInput {
  content: string;
  messageType: MessageDirection;
  private?: boolean;
  sourceId?: string;
}

export interface MediaMessageInput {
  messageType: MessageDirection;
  data: Uint8Array;
  fileName: string;
  mimeType: string;
  caption?: string;
  sourceId?: string;
}

const IdResponse = z.object({ id: z.number().int() });

const ContactSearchResponse = z.object({
  payload: z.array(z.object({ id: z.number().int() })),
});

const ContactCreateResponse = z.object({
  payload: z.object({ contact: z.object({ id: z.number().int() }) }),
});

const ErrorResponse = z.object({ message: z.string() });

export class TicketingClient {
  private readonly baseUrl: string;

  constructor(
    private readonly credentials: TicketingCredentials,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) {
    this.baseUrl = credentials.url.replace(/\/+$/, "");
  }

  private accountPath(suffix: string): string {
    return `/api/v1/accounts/${encodeURIComponent(this.credentials.accountId)}${suffix}`;
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T>,
    body: string | FormData | undefined,
    signal?: AbortSignal
  ): Promise<T> {
    const headers: Record<string, string> = { api_access_token: this.credentials.token };
    if (typeof body === "string") {
      headers["Content-Type"] = "application/json";
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    const text = await response.text();

    if (!response.ok) {
      throw new TicketingApiError(response.status, extractErrorMessage(text), path);
    }

    const data = parseJson(text);
    if (data === undefined) {
      throw new TicketingApiError(response.status, "response is not valid JSON", path);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TicketingApiError(response.status, `unexpected response shape: ${parsed.error.message}`, path);
    }
    return parsed.data;
  }

  /** Create an API-channel inbox whose webhook points back at the bridge. */
  async createInbox(name: string, webhookUrl: string, signal?: AbortSignal): Promise<number> {
    const body = JSON.stringify({ name, channel: { type: "api", webhook_url: webhookUrl } });
    const inbox = await this.request("POST", this.accountPath("/inboxes"), IdResponse, body, signal);
    console.log(`[ticketing] Inbox created: id=${inbox.id} name=${name}`);
    return inbox.id;
  }

  /**
   * Search contacts by phone number. Returns the first match, or null.
   */
  async findContactByPhone(phone: string, signal?: AbortSignal): Promise<number | null> {
    const query = phone.startsWith("+") ? phone : `+${phone}`;
    const result = await this.request(
      "GET",
      this.accountPath(`/contacts/search?q=${encodeURIComponent(query)}`),
      ContactSearchResponse,
      undefined,
      signal
    );
    return result.payload.length > 0 ? result.payload[0].id : null;
  }

  async createContact(input: CreateContactInput, signal?: AbortSignal): Promise<number> {
    const payload: Record<string, string | number> = {
      inbox_id: input.inboxId,
      name: input.name,
    };
    if (input.identifier) payload.identifier = input.identifier;
    if (input.avatarUrl) payload.avatar_url = input.avatarUrl;
    // Groups have no phone number
    if (input.phoneNumber && !input.phoneNumber.includes("@g.us")) {
      payload.phone_number = input.phoneNumber.startsWith("+") ? input.phoneNumber : `+${input.phoneNumber}`;
    }

    const result = await this.request(
      "POST",
      this.accountPath("/contacts"),
      ContactCreateResponse,
      JSON.stringify(payload),
      signal
    );
    const contactId = result.payload.contact.id;
    console.log(`[ticketing] Contact created: id=${contactId} name=${input.name}`);
    return contactId;
  }

  async createConversation(input: CreateConversationInput, signal?: AbortSignal): Promise<number> {
    const payload: Record<string, string> = {
      contact_id: String(input.contactId),
      inbox_id: String(input.inboxId),
      source_id: input.sourceId,
    };
    if (input.pending) payload.status = "pending";

    const conversation = await this.request(
      "POST",
      this.accountPath("/conversations"),
      IdResponse,
      JSON.stringify(payload),
      signal
    );
    console.log(
      `[ticketing] Conversation created: id=${conversation.id} contact=${input.contactId} inbox=${input.inboxId}`
    );
    return conversation.id;
  }

  async createMessage(conversationId: number, input: CreateMessageInput, signal?: AbortSignal): Promise<number> {
    const payload: Record<string, string | boolean> = {
      content: input.content,
      message_type: input.messageType,
      private: input.private ?? false,
    };
    if (input.sourceId) payload.source_id = input.sourceId;

    const message = await this.request(
      "POST",
      this.accountPath(`/conversations/${conversationId}/messages`),
      IdResponse,
      JSON.stringify(payload),
      signal
    );
    return message.id;
  }

  /** Multipart message with a single attachment; the caption becomes the content. */
  async sendMediaMessage(conversationId: number, input: MediaMessageInput, signal?: AbortSignal): Promise<number> {
    const form = new FormData();
    form.append("message_type", input.messageType);
    if (input.caption) form.append("content", input.caption);
    if (input.sourceId) form.append("source_id", input.sourceId);
    form.append("attachments[]", new Blob([input.data], { type: input.mimeType }), input.fileName);

    const message = await this.request(
      "POST",
      this.accountPath(`/conversations/${conversationId}/messages`),
      IdResponse,
      form,
      signal
    );
    console.log(
      `[ticketing] Media message sent: id=${message.id} conversation=${conversationId} file=${input.fileName} bytes=${input.data.byteLength}`
    );
    return message.id;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractErrorMessage(body: string): string {
  const parsed = ErrorResponse.safeParse(parseJson(body));
  if (parsed.success) return parsed.data.message;
  return body || "empty response";
}
