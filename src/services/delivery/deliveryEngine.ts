/**
 * Delivery engine — signed, retried POSTs of WhatsApp events to tenant
 * webhooks, with dead-letter hand-off on terminal failure.
 *
 * Deliveries never throw to the caller. The outcome is returned for
 * callers (and tests) that care; everyone else can ignore it.
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import type { WebhookFormat } from "../../config.js";
import type { AuditRecorder } from "../audit.js";
import type { QueuePublisher } from "../queue.js";
import type { CredentialVault } from "../vault.js";
import { canonicalJson, signPayload, SIGNATURE_HEADER } from "../webhookSignature.js";
import type { DeadLetterPublisher, DeadLetterRecord } from "./deadLetter.js";

export const DELIVERY_TIMEOUT_MS = 30_000;

/** The tenant fields a delivery needs. A tenants row satisfies it. */
export interface DeliveryTenant {
  id: string;
  name: string;
  webhookUrl: string | null;
  webhookFormat: WebhookFormat | null;
  /** Credential Vault ciphertext (hex) of the signing key. */
  hmacKey: string | null;
}

/** Flat field map, as produced by the event sources. `jsonData` holds the event JSON. */
export type DeliveryPayload = Record<string, string>;

export interface DeliveryOutcome {
  delivered: boolean;
  attempts: number;
  error?: string;
}

export interface DeliveryEngineOptions {
  vault: CredentialVault;
  deadLetters: DeadLetterPublisher;
  /** Used when the tenant has no explicit mode. */
  defaultFormat: WebhookFormat;
  retryEnabled: boolean;
  retryCount: number;
  retryBaseDelayMs: number;
  timeoutMs?: number;
  queue?: QueuePublisher;
  eventQueue?: string;
  audit?: AuditRecorder;
  sleep?: (ms: number) => Promise<void>;
}

interface PreparedRequest {
  headers: Record<string, string>;
  /** Built per attempt: a FormData body can only be sent once. */
  body: () => Promise<string | FormData>;
  /** What ends up in a dead-letter record. */
  deadLetterPayload: Record<string, unknown>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseObject(json: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    console.warn("[delivery] jsonData is not valid JSON; sending fields as-is:", errorMessage(err));
    return null;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return { ...value };
}

export class DeliveryEngine {
  private readonly options: DeliveryEngineOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly timeoutMs: number;

  constructor(options: DeliveryEngineOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.timeoutMs = options.timeoutMs ?? DELIVERY_TIMEOUT_MS;
  }

  /** Attempt budget for one delivery. */
  get maxAttempts(): number {
    const { retryEnabled, retryCount } = this.options;
    return retryEnabled && Number.isFinite(retryCount) ? Math.max(1, retryCount) : 1;
  }

  /** Delay before attempt `attempt` (2-based): base × 2^(attempt-2). */
  backoffDelay(attempt: number): number {
    return this.options.retryBaseDelayMs * 2 ** (attempt - 2);
  }

  /**
   * POST a field map to a webhook, as JSON or form fields depending on the
   * tenant's mode. Signed over the exact body bytes when the tenant has a key.
   */
  async deliver(url: string, payload: DeliveryPayload, tenant: DeliveryTenant): Promise<DeliveryOutcome> {
    const format = tenant.webhookFormat ?? this.options.defaultFormat;
    const key = this.signingKey(tenant);

    let body: string;
    let contentType: string;
    let deadLetterPayload: Record<string, unknown>;

    if (format === "json") {
      const merged = this.jsonBody(payload, tenant);
      body = JSON.stringify(merged);
      contentType = "application/json";
      deadLetterPayload = merged;
    } else {
      body = new URLSearchParams(payload).toString();
      contentType = "application/x-www-form-urlencoded";
      deadLetterPayload = { ...payload };
    }

    const headers: Record<string, string> = { "Content-Type": contentType };
    if (key) headers[SIGNATURE_HEADER] = signPayload(body, key);

    return this.run(url, tenant, { headers, body: async () => body, deadLetterPayload });
  }

  /**
   * Multipart variant: the payload fields plus the file at `filePath` as `file`.
   * The signature covers the sorted-key JSON of the fields with `file` = path.
   */
  async deliverFile(
    url: string,
    payload: DeliveryPayload,
    tenant: DeliveryTenant,
    filePath: string
  ): Promise<DeliveryOutcome> {
    const key = this.signingKey(tenant);
    const fields: DeliveryPayload = { ...payload, file: filePath };

    const headers: Record<string, string> = {};
    if (key) headers[SIGNATURE_HEADER] = signPayload(canonicalJson(fields), key);

    const body = async () => {
      const data = await readFile(filePath);
      const form = new FormData();
      for (const [name, value] of Object.entries(payload)) {
        form.append(name, value);
      }
      form.append("file", new Blob([data]), basename(filePath));
      return form;
    };

    return this.run(url, tenant, { headers, body, deadLetterPayload: fields }, filePath);
  }

  /**
   * Send an event to the tenant's webhook (when set) and the shared event
   * queue (when enabled).
   */
  async dispatch(tenant: DeliveryTenant, event: Record<string, unknown>): Promise<void> {
    const jsonData = JSON.stringify(event);
    if (tenant.webhookUrl) {
      await this.deliver(tenant.webhookUrl, { jsonData, instanceName: tenant.name }, tenant);
    }
    if (this.options.queue?.enabled) {
      await this.publishEvent(tenant, event);
    }
  }

  /** Publish an event to the shared queue, tagged with the tenant. Never throws. */
  async publishEvent(tenant: DeliveryTenant, event: Record<string, unknown>, queueName?: string): Promise<void> {
    const queue = this.options.queue;
    const name = queueName ?? this.options.eventQueue;
    if (!queue || !name) {
      console.debug("[queue] No event queue configured; event not published");
      return;
    }

    const message = JSON.stringify({ ...event, userID: tenant.id, instanceName: tenant.name });
    try {
      await queue.publish(name, message);
    } catch (err) {
      console.error(`[queue] Failed to publish event to ${name} (tenant=${tenant.id}):`, err);
    }
  }

  private jsonBody(payload: DeliveryPayload, tenant: DeliveryTenant): Record<string, unknown> {
    const event = payload.jsonData !== undefined ? parseObject(payload.jsonData) : null;
    const merged: Record<string, unknown> = event ?? { ...payload };
    if (event && payload.instanceName) {
      merged.instanceName = payload.instanceName;
    }
    merged.userID = tenant.id;
    return merged;
  }

  /** Decrypted signing key, or null. An undecryptable key sends unsigned. */
  private signingKey(tenant: DeliveryTenant): string | null {
    if (!tenant.hmacKey) return null;
    try {
      return this.options.vault.decrypt(tenant.hmacKey);
    } catch (err) {
      console.error(`[delivery] Failed to decrypt signing key for tenant ${tenant.id}; sending unsigned:`, errorMessage(err));
      return null;
    }
  }

  private async run(
    url: string,
    tenant: DeliveryTenant,
    request: PreparedRequest,
    filePath?: string
  ): Promise<DeliveryOutcome> {
    const attempts = this.maxAttempts;
    let lastError = "no attempt made";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        const delay = this.backoffDelay(attempt);
        console.warn(`[delivery] Retrying ${url} in ${delay}ms (attempt ${attempt}/${attempts}, tenant=${tenant.id})`);
        await this.sleep(delay);
      }

      try {
        const res = await fetch(url, {
          method: "POST",
          headers: request.headers,
          body: await request.body(),
          redirect: "manual",
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (res.status >= 200 && res.status < 300) {
          console.log(`[delivery] Delivered to ${url} (status=${res.status}, attempt=${attempt}, tenant=${tenant.id})`);
          // Release the connection; the response body is not used
          await res.body?.cancel().catch((err) => {
            console.warn(`[delivery] Failed to discard response body from ${url}:`, err);
          });
          return { delivered: true, attempts: attempt };
        }

        const text = await res.text().catch(() => "");
        lastError = `unexpected status code: ${res.status}. Body: ${text}`;
        console.error(`[delivery] ${url} returned ${res.status} (attempt ${attempt}/${attempts}, tenant=${tenant.id})`);
        if (!this.options.retryEnabled) break;
      } catch (err) {
        lastError = errorMessage(err);
        console.error(`[delivery] Request to ${url} failed (attempt ${attempt}/${attempts}, tenant=${tenant.id}):`, lastError);
      }
    }

    await this.fail(url, tenant, request.deadLetterPayload, lastError, filePath);
    return { delivered: false, attempts, error: lastError };
  }

  private async fail(
    url: string,
    tenant: DeliveryTenant,
    payload: Record<string, unknown>,
    error: string,
    filePath?: string
  ): Promise<void> {
    console.error(`[delivery] Giving up on ${url} (tenant=${tenant.id}): ${error}`);

    const record: DeadLetterRecord = {
      url,
      payload,
      userID: tenant.id,
      encryptedHmacKey: tenant.hmacKey ?? "",
      attemptTime: new Date().toISOString(),
      errorMessage: error,
    };
    if (filePath !== undefined) record.filePath = filePath;

    await this.options.deadLetters.publish(record);

    if (this.options.audit) {
      try {
        await this.options.audit({
          tenantId: tenant.id,
          action: "delivery.failed",
          targetType: "webhook",
          targetId: url,
          metadata: { error, filePath: filePath ?? null },
        });
      } catch (err) {
        console.error(`[delivery] Failed to audit delivery failure for ${url}:`, err);
      }
    }
  }
}
