export type RateLimitResult = { ok: true; retryAfterMs: 0 } | { ok: false; retryAfterMs: number };

export interface TokenBucketOptions {
  capacity: number;
  refillMs: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Per-key token bucket. `capacity` tokens refill linearly over `refillMs`.
 */
export class TokenBucketRateLimiter {
  private readonly capacity: number;
  private readonly refillMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly state = new Map<string, { tokens: number; updatedAt: number }>();
  private lastPrunedAt = 0;

  constructor(options: TokenBucketOptions) {
    this.capacity = options.capacity;
    this.refillMs = options.refillMs;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  private prune(now: number): void {
    const maxAgeMs = this.refillMs * 10;
    if (this.state.size <= this.maxEntries && now - this.lastPrunedAt < this.refillMs) return;
    this.lastPrunedAt = now;

    for (const [key, entry] of this.state.entries()) {
      if (now - entry.updatedAt > maxAgeMs) this.state.delete(key);
    }

    // Hard cap on distinct keys.
    if (this.state.size > this.maxEntries * 2) this.state.clear();
  }

  take(key: string): RateLimitResult {
    if (!Number.isFinite(this.capacity) || this.capacity <= 0) return { ok: true, retryAfterMs: 0 };

    const now = this.now();
    this.prune(now);

    const existing = this.state.get(key) ?? { tokens: this.capacity, updatedAt: now };
    const refill = ((now - existing.updatedAt) / this.refillMs) * this.capacity;
    const tokens = Math.min(this.capacity, existing.tokens + refill);

    if (tokens < 1) {
      this.state.set(key, { tokens, updatedAt: now });
      const refillRatePerMs = this.capacity / this.refillMs;
      const retryAfterMs = refillRatePerMs > 0 ? Math.ceil((1 - tokens) / refillRatePerMs) : this.refillMs;
      return { ok: false, retryAfterMs };
    }

    this.state.set(key, { tokens: tokens - 1, updatedAt: now });
    return { ok: true, retryAfterMs: 0 };
  }
}
