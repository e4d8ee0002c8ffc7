// src/services/priceHistoryService.ts: per-day price aggregates for a route, cache-aside.
import { z } from 'zod';
import type { Settings } from '@/config/settings';
import { JsonCache } from '@/services/cache';
import { priceHistoryKey } from '@/services/cacheKeys';
import type { PriceHistorySource } from '@/services/providers/flights/price-history-source';
import { cabinClassSchema, iataCodeSchema, isoDateSchema, pricePointSchema, type PricePoint } from '@/types/flights';
import { SearchValidationError } from '@/utils/errors';

export const priceHistoryQuerySchema = z
  .object({
    origin: iataCodeSchema,
    destination: iataCodeSchema,
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    cabinClass: cabinClassSchema.default('ECONOMY'),
    currency: z.string().trim().toUpperCase().length(3).default('KRW'),
  })
  .refine((q) => q.startDate <= q.endDate, {
    message: 'startDate must not be after endDate',
    path: ['endDate'],
  });

export type PriceHistoryInput = z.input<typeof priceHistoryQuerySchema>;

const pointsSchema = z.array(pricePointSchema);

export class PriceHistoryService {
  constructor(
    private readonly deps: {
      cache: JsonCache;
      history: PriceHistorySource;
      settings: Pick<Settings, 'priceCacheTtl'>;
    },
  ) {}

  async getPriceHistory(input: PriceHistoryInput): Promise<PricePoint[]> {
    const parsed = priceHistoryQuerySchema.safeParse(input);
    if (!parsed.success) throw SearchValidationError.fromZod(parsed.error.issues);
    const query = parsed.data;

    const key = priceHistoryKey(
      query.origin,
      query.destination,
      query.startDate,
      query.endDate,
      query.cabinClass,
      query.currency,
    );
    const cached = await this.deps.cache.get(key, pointsSchema);
    if (cached) return cached;

    const points = await this.deps.history.fetchDailyPoints(query);
    await this.deps.cache.set(key, points, this.deps.settings.priceCacheTtl);
    return points;
  }
}
