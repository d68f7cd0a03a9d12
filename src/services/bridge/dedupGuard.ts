/**
 * Time-windowed set of processed WhatsApp message ids.
 *
 * Guards the inbound path against redelivered events and suppresses the
 * echo of messages the bridge itself sent to WhatsApp. Entries older than
 * the window are treated as unseen and swept by a periodic cleanup task
 * owned by the guard (start/stop).
 */

export interface DedupGuardOptions {
  windowMs?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

export const DEDUP_WINDOW_MS = 30 * 60_000;
export const DEDUP_CLEANUP_INTERVAL_MS = 10 * 60_000;

export class DedupGuard {
  private readonly seen = new Map<string, number>();
  private readonly windowMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: DedupGuardOptions = {}) {
    this.windowMs = options.windowMs ?? DEDUP_WINDOW_MS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEDUP_CLEANUP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Test-and-set. Returns true when the id was not seen inside the window
   * (and records it now), false when it was already processed.
   * Synchronous, so no other task can interleave between test and set.
   */
  claim(id: string): boolean {
    const now = this.now();
    const firstSeen = this.seen.get(id);
    if (firstSeen !== undefined && now - firstSeen <= this.windowMs) {
      return false;
    }
    this.seen.set(id, now);
    return true;
  }

  /** Record an id without checking it, e.g. a message we just sent. */
  remember(id: string): void {
    this.seen.set(id, this.now());
  }

  has(id: string): boolean {
    const firstSeen = this.seen.get(id);
    return firstSeen !== undefined && this.now() - firstSeen <= this.windowMs;
  }

  get size(): number {
    return this.seen.size;
  }

  /** Remove entries older than the window. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, firstSeen] of this.seen) {
      if (now - firstSeen > this.windowMs) {
        this.seen.delete(id);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`[bridge] Dedup sweep removed ${removed} expired message ids`);
      }
    }, this.cleanupIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
