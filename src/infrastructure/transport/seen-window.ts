/**
 * Remembers envelope ids for a bounded time so at-least-once delivery
 * can be de-duplicated.
 *
 * Entries are kept in insertion order, which is also expiry order
 * because the TTL is constant.
 */
export class SeenEnvelopeWindow {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly capacity = 10_000,
  ) {}

  /** Returns false when `id` was already seen inside the window. */
  markSeen(id: string, now: number = Date.now()): boolean {
    this.evictExpired(now);

    if (this.seen.has(id)) return false;

    this.seen.set(id, now + this.ttlMs);
    if (this.seen.size > this.capacity) {
      const oldest = this.seen.keys().next();
      if (oldest.done !== true) this.seen.delete(oldest.value);
    }
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private evictExpired(now: number): void {
    for (const [id, expiresAt] of this.seen) {
      if (expiresAt > now) break;
      this.seen.delete(id);
    }
  }
}
