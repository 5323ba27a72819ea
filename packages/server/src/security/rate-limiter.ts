/**
 * Rate Limiter
 *
 * Per-session token buckets. Refill is computed lazily from the elapsed
 * time on every call, so no timer runs per bucket. Capacity sets the burst
 * allowance and the refill rate sets the sustained rate.
 *
 * A denied message is dropped. `check()` reports the first denial of a
 * violation episode as 'throttled' and later ones as 'dropped', so callers
 * can send exactly one notice per episode; the episode ends at the next
 * allowed message.
 */

import { RATE_LIMIT } from '../constants.js';

export type RateDecision = 'allowed' | 'throttled' | 'dropped';

export interface RateLimiterConfig {
  /** Maximum tokens held by a bucket */
  capacity: number;
  /** Tokens added per minute */
  refillPerMinute: number;
  /** Clock in milliseconds (defaults to Date.now) */
  now?: () => number;
}

export interface RateLimiterStats {
  trackedSessions: number;
  totalAllowed: number;
  totalDenied: number;
  sessionsThrottled: number;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    readonly capacity: number,
    /** Tokens per millisecond */
    readonly refillRate: number,
    now: number
  ) {
    this.tokens = capacity;
    this.lastRefill = now;
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRate);
      this.lastRefill = now;
    }
  }

  consume(cost: number, now: number): boolean {
    this.refill(now);
    if (this.tokens >= cost) {
      this.tokens -= cost;
      return true;
    }
    return false;
  }

  peek(now: number): number {
    this.refill(now);
    return this.tokens;
  }

  /** Milliseconds until `cost` tokens are available */
  timeUntilAvailable(cost: number, now: number): number {
    this.refill(now);
    if (this.tokens >= cost) return 0;
    return (cost - this.tokens) / this.refillRate;
  }
}

interface BucketEntry {
  bucket: TokenBucket;
  throttled: boolean;
  violations: number;
}

export class RateLimiter {
  private buckets: Map<string, BucketEntry> = new Map();
  private readonly capacity: number;
  private readonly refillRate: number;
  private readonly now: () => number;

  private totalAllowed = 0;
  private totalDenied = 0;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.capacity = config.capacity ?? RATE_LIMIT.CAPACITY;
    this.refillRate = (config.refillPerMinute ?? RATE_LIMIT.REFILL_PER_MINUTE) / 60_000;
    this.now = config.now ?? Date.now;
  }

  private entry(sessionId: string): BucketEntry {
    let entry = this.buckets.get(sessionId);
    if (!entry) {
      entry = {
        bucket: new TokenBucket(this.capacity, this.refillRate, this.now()),
        throttled: false,
        violations: 0,
      };
      this.buckets.set(sessionId, entry);
    }
    return entry;
  }

  /**
   * Consume `cost` tokens if available
   * Returns false (and consumes nothing) when fewer than `cost` remain
   */
  tryConsume(sessionId: string, cost = 1): boolean {
    return this.check(sessionId, cost) === 'allowed';
  }

  /**
   * Consume tokens and classify the outcome within the violation episode.
   */
  check(sessionId: string, cost = 1): RateDecision {
    const entry = this.entry(sessionId);

    if (entry.bucket.consume(cost, this.now())) {
      entry.throttled = false;
      this.totalAllowed++;
      return 'allowed';
    }

    this.totalDenied++;
    entry.violations++;

    if (entry.throttled) {
      return 'dropped';
    }
    entry.throttled = true;
    return 'throttled';
  }

  /**
   * Current token count after refill, without consuming
   */
  peek(sessionId: string): number {
    return this.entry(sessionId).bucket.peek(this.now());
  }

  /**
   * Milliseconds until the session may send a message costing `cost`
   */
  retryAfter(sessionId: string, cost = 1): number {
    return this.entry(sessionId).bucket.timeUntilAvailable(cost, this.now());
  }

  violations(sessionId: string): number {
    return this.buckets.get(sessionId)?.violations ?? 0;
  }

  /**
   * Drop a session's bucket (safe to call repeatedly)
   */
  remove(sessionId: string): void {
    this.buckets.delete(sessionId);
  }

  getStats(): RateLimiterStats {
    let sessionsThrottled = 0;
    for (const entry of this.buckets.values()) {
      if (entry.throttled) sessionsThrottled++;
    }

    return {
      trackedSessions: this.buckets.size,
      totalAllowed: this.totalAllowed,
      totalDenied: this.totalDenied,
      sessionsThrottled,
    };
  }

  clear(): void {
    this.buckets.clear();
  }
}
