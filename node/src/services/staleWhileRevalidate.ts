// src/services/staleWhileRevalidate.ts: stale-while-revalidate envelope over the shared store.
//
// Each write stores { data, freshUntil, staleUntil } and gives the store record a TTL of
// freshTtl + staleTtl, so the record disappears exactly when it would read as a miss.
// Concurrent misses for one key are not serialized; writes are whole-envelope overwrites.
import { z } from 'zod';
import type { KeyValueStore } from '@/store/KeyValueStore';
import { decodeJson, type Schema } from '@/services/cache';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';

export type CacheStatus = 'fresh' | 'stale' | 'miss';

export interface CacheEnvelope<T> {
  data: T;
  /** Epoch ms. */
  freshUntil: number;
  /** Epoch ms; never before freshUntil. */
  staleUntil: number;
}

export type SwrReadResult<T> =
  | { status: 'fresh' | 'stale'; data: T }
  | { status: 'miss'; data: null };

const MISS = { status: 'miss', data: null } as const;

const envelopeSchema = z
  .object({
    data: z.unknown(),
    freshUntil: z.number(),
    staleUntil: z.number(),
  })
  .refine((e) => e.freshUntil <= e.staleUntil, { message: 'freshUntil after staleUntil' });

export function classify(envelope: Pick<CacheEnvelope<unknown>, 'freshUntil' | 'staleUntil'>, now: number): CacheStatus {
  if (now < envelope.freshUntil) return 'fresh';
  if (now < envelope.staleUntil) return 'stale';
  return 'miss';
}

export class StaleWhileRevalidateCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log: AppLogger = componentLogger('swr-cache'),
  ) {}

  async read<T>(key: string, schema: Schema<T>): Promise<SwrReadResult<T>> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (err) {
      this.log.warn('swr:read_error', { key, error: errorMessage(err) });
      return MISS;
    }
    if (raw === null) return MISS;

    const envelope = decodeJson(raw, envelopeSchema);
    const payload = envelope === null ? null : schema.safeParse(envelope.data);
    if (envelope === null || payload === null || !payload.success) {
      this.log.warn('swr:invalid_envelope', { key });
      return MISS;
    }

    const status = classify(envelope, Date.now());
    switch (status) {
      case 'fresh':
      case 'stale':
        return { status, data: payload.data };
      case 'miss':
        return MISS;
    }
  }

  async write<T>(key: string, data: T, freshTtlSeconds: number, staleTtlSeconds: number): Promise<void> {
    const totalTtl = freshTtlSeconds + staleTtlSeconds;
    if (totalTtl <= 0) return;

    const now = Date.now();
    const freshUntil = now + freshTtlSeconds * 1000;
    const envelope: CacheEnvelope<T> = {
      data,
      freshUntil,
      staleUntil: freshUntil + staleTtlSeconds * 1000,
    };

    try {
      await this.store.set(key, JSON.stringify(envelope), totalTtl);
    } catch (err) {
      this.log.warn('swr:write_error', { key, error: errorMessage(err) });
    }
  }
}
