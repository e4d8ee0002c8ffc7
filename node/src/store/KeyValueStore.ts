// src/store/KeyValueStore.ts

/**
 * Shared key-value store used by the caches and the rate limiter.
 * Values are UTF-8 JSON text; TTLs are seconds.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /**
   * Sliding-window admission, executed as one atomic unit:
   * purge entries older than `nowMs - windowMs`, count the rest, and only when the
   * count is below `limit` record `nowMs` and push the key expiry out to `windowMs`.
   * Returns whether the attempt was admitted. Rejected attempts are not recorded.
   */
  slidingWindowAcquire(key: string, nowMs: number, windowMs: number, limit: number): Promise<boolean>;

  close(): Promise<void>;
}
