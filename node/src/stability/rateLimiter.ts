// Sliding-window rate limiter over the shared store.
// Counters live in the store, not in this process, so every instance sharing the store
// sees the same window; admission is a single atomic store operation.

import type { KeyValueStore } from '@/store/KeyValueStore';
import { sleep } from '@/utils/sleep';

export interface RateLimit {
  maxRequests: number;
  windowMs: number;
}

export interface RateLimiterOptions {
  defaultLimit: RateLimit;
  /** Per-source overrides, e.g. a stricter cap for a fragile airline site. */
  sourceLimits?: Record<string, RateLimit>;
  keyPrefix?: string;
  pollIntervalMs?: number;
}

export class SlidingWindowRateLimiter {
  private readonly keyPrefix: string;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: RateLimiterOptions,
  ) {
    this.keyPrefix = options.keyPrefix ?? 'rate_limit:';
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  limitFor(sourceId: string): RateLimit {
    return this.options.sourceLimits?.[sourceId] ?? this.options.defaultLimit;
  }

  /**
   * Check if a request for `sourceId` may proceed now.
   * @returns true if admitted (and recorded), false if the window is full
   */
  async tryAcquire(sourceId: string): Promise<boolean> {
    const { maxRequests, windowMs } = this.limitFor(sourceId);
    return this.store.slidingWindowAcquire(`${this.keyPrefix}${sourceId}`, Date.now(), windowMs, maxRequests);
  }

  /** Poll {@link tryAcquire} until admitted. */
  async waitAndAcquire(sourceId: string): Promise<void> {
    while (!(await this.tryAcquire(sourceId))) {
      await sleep(this.pollIntervalMs);
    }
  }
}
