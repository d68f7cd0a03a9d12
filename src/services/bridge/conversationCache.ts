/**
 * Two-tier (memory, then store) lookup of tenant:chat → remote conversation.
 *
 * Resolution of a key that is in neither tier runs at most once at a time:
 * concurrent callers for the same key share one in-flight promise, so
 * simultaneous first messages from a chat create a single remote
 * conversation. Entries never expire; a chat's remote conversation id
 * does not change.
 */

import type { BridgeStore, ConversationMapping } from "./store.js";

export type RemoteConversationIds = Pick<ConversationMapping, "conversationId" | "contactId" | "inboxId">;

export type CacheSource = "memory" | "store" | "created";

export interface CacheLookup {
  mapping: ConversationMapping;
  source: CacheSource;
}

export class ConversationCache {
  private readonly memory = new Map<string, ConversationMapping>();
  private readonly inflight = new Map<string, Promise<CacheLookup>>();

  constructor(private readonly store: BridgeStore) {}

  static key(tenantId: string, chatAddress: string): string {
    return `${tenantId}:${chatAddress}`;
  }

  /**
   * Return the mapping for a chat, calling `create` only when neither tier
   * has it. The new mapping is persisted; a persistence failure is logged
   * and the memory tier still serves later lookups in this process.
   *
   * `signal` cancels this caller's wait only. The shared resolution keeps
   * running for the other callers of the key, so `create` must not close
   * over any one caller's signal.
   */
  async ensure(
    tenantId: string,
    chatAddress: string,
    create: () => Promise<RemoteConversationIds>,
    signal?: AbortSignal
  ): Promise<CacheLookup> {
    signal?.throwIfAborted();
    const key = ConversationCache.key(tenantId, chatAddress);

    const cached = this.memory.get(key);
    if (cached) return { mapping: cached, source: "memory" };

    let resolution = this.inflight.get(key);
    if (!resolution) {
      resolution = this.resolve(key, tenantId, chatAddress, create).finally(() => {
        this.inflight.delete(key);
      });
      // Every waiter may have given up; the outcome is still reported once
      resolution.catch((err) => {
        console.warn(`[bridge] Conversation resolution for ${key} failed:`, err);
      });
      this.inflight.set(key, resolution);
    }

    return waitFor(resolution, signal);
  }

  private async resolve(
    key: string,
    tenantId: string,
    chatAddress: string,
    create: () => Promise<RemoteConversationIds>
  ): Promise<CacheLookup> {
    const stored = await this.store.findConversation(tenantId, chatAddress);
    if (stored) {
      this.memory.set(key, stored);
      return { mapping: stored, source: "store" };
    }

    const ids = await create();
    const mapping: ConversationMapping = { tenantId, chatAddress, ...ids };

    try {
      await this.store.saveConversation(mapping);
    } catch (err) {
      console.error(
        `[bridge] Failed to persist conversation mapping ${key} (conversation=${mapping.conversationId}); ` +
          "a restart before the next save may create a duplicate:",
        err
      );
    }

    this.memory.set(key, mapping);
    return { mapping, source: "created" };
  }

  /**
   * Record a mapping learned elsewhere (e.g. from a platform webhook).
   * Persistence failures propagate so the caller can decide how to react.
   */
  async record(mapping: ConversationMapping): Promise<void> {
    this.memory.set(ConversationCache.key(mapping.tenantId, mapping.chatAddress), mapping);
    await this.store.saveConversation(mapping);
  }

  /** Drop a tenant's memory entries, e.g. after its configuration is removed. */
  evictTenant(tenantId: string): void {
    const prefix = `${tenantId}:`;
    for (const key of this.memory.keys()) {
      if (key.startsWith(prefix)) this.memory.delete(key);
    }
  }

  get size(): number {
    return this.memory.size;
  }
}

function waitFor<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
