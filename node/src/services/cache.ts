// src/services/cache.ts: plain cache-aside over the shared store.
// Used for reference data and computed results that carry their own TTL
// (predictions, best-time, price history, natural-language searches).
// Store failures never reach the caller: a failed read is a miss, a failed write is logged.
import { z } from 'zod';
import type { KeyValueStore } from '@/store/KeyValueStore';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';

/** A schema that validates untrusted input into `T`. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function decodeJson<T>(raw: string, schema: Schema<T>): T | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = schema.safeParse(parsed);
  return result.success ? result.data : null;
}

export class JsonCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log: AppLogger = componentLogger('cache'),
  ) {}

  async get<T>(key: string, schema: Schema<T>): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (err) {
      this.log.warn('cache:get_error', { key, error: errorMessage(err) });
      return null;
    }
    if (raw === null) return null;

    const value = decodeJson(raw, schema);
    if (value === null) this.log.warn('cache:decode_error', { key });
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;
    try {
      await this.store.set(key, JSON.stringify(value), ttlSeconds);
    } catch (err) {
      this.log.warn('cache:set_error', { key, error: errorMessage(err) });
    }
  }
}
