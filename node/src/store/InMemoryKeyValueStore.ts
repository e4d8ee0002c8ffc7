import type { KeyValueStore } from './KeyValueStore';

interface ValueEntry {
  value: string;
  expiresAt: number;
}

interface WindowEntry {
  timestamps: number[];
  expiresAt: number;
}

/**
 * Process-local store. Expiry is checked lazily against Date.now(), so it behaves
 * under fake timers. Used when REDIS_URL is not configured and in tests.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private values = new Map<string, ValueEntry>();
  private windows = new Map<string, WindowEntry>();

  async get(key: string): Promise<string | null> {
    const entry = this.values.get(key);
    if (!entry) return null;
    if (Date.now() >= entry.expiresAt) {
      this.values.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      throw new Error(`Invalid TTL ${ttlSeconds} for key ${key}`);
    }
    this.values.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  // No await between read and write: the whole check-and-insert runs in one tick.
  async slidingWindowAcquire(key: string, nowMs: number, windowMs: number, limit: number): Promise<boolean> {
    const existing = this.windows.get(key);
    const live =
      existing && Date.now() < existing.expiresAt
        ? existing.timestamps.filter((ts) => ts >= nowMs - windowMs)
        : [];

    if (live.length >= limit) {
      if (existing) existing.timestamps = live;
      return false;
    }

    live.push(nowMs);
    this.windows.set(key, { timestamps: live, expiresAt: Date.now() + windowMs });
    return true;
  }

  async close(): Promise<void> {
    this.values.clear();
    this.windows.clear();
  }
}
