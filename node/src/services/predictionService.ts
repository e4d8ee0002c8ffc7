// src/services/predictionService.ts: cached price predictions and best-time-to-buy.
import { z } from 'zod';
import type { Settings } from '@/config/settings';
import { JsonCache } from '@/services/cache';
import { bestTimeKey, predictionKey } from '@/services/cacheKeys';
import { componentLogger, type AppLogger } from '@/services/logger';
import {
  HeuristicPredictor,
  type BestTimeResult,
  type PricePrediction,
} from '@/services/prediction/heuristicPredictor';
import type { PriceHistorySource } from '@/services/providers/flights/price-history-source';
import type { CabinClass } from '@/types/flights';
import { addDays, daysBetween, toIsoDate } from '@/utils/dates';

const DEFAULT_DAYS_UNTIL = 30;

const directionSchema = z.enum(['UP', 'DOWN', 'STABLE']);

const pricePredictionSchema = z.object({
  currentAvgPrice: z.number(),
  predictedDirection: directionSchema,
  confidence: z.number(),
  recommendation: z.enum(['BUY_NOW', 'WAIT', 'NEUTRAL']),
  reason: z.string(),
  bestPriceSeen: z.number(),
  worstPriceSeen: z.number(),
  percentileCurrent: z.number(),
  daysUntilDeparture: z.number(),
}) satisfies z.ZodType<PricePrediction>;

const bestTimeSchema = z.object({
  optimalDaysBefore: z.number(),
  estimatedPriceAtOptimal: z.number().nullable(),
  confidence: z.number(),
  currentDaysBefore: z.number(),
  recommendation: z.string(),
}) satisfies z.ZodType<BestTimeResult>;

export interface PredictionServiceDeps {
  cache: JsonCache;
  history: PriceHistorySource;
  settings: Pick<Settings, 'predictionCacheTtl' | 'priceLookbackDays'>;
}

export class PredictionService {
  constructor(
    private readonly deps: PredictionServiceDeps,
    private readonly log: AppLogger = componentLogger('prediction'),
  ) {}

  async predictPrice(
    origin: string,
    destination: string,
    departureDate: string,
    cabinClass: CabinClass = 'ECONOMY',
    today: string = toIsoDate(new Date()),
  ): Promise<PricePrediction> {
    const key = predictionKey(origin, destination, departureDate, cabinClass);
    const cached = await this.deps.cache.get(key, pricePredictionSchema);
    if (cached) return cached;

    const prices = await this.deps.history.fetchPrices({
      origin,
      destination,
      cabinClass,
      since: addDays(today, -this.deps.settings.priceLookbackDays),
    });
    const daysUntil = Math.max(0, daysBetween(today, departureDate));
    const prediction = new HeuristicPredictor(prices, daysUntil).predict();

    this.log.debug('prediction:computed', { key, samples: prices.length, recommendation: prediction.recommendation });
    await this.deps.cache.set(key, prediction, this.deps.settings.predictionCacheTtl);
    return prediction;
  }

  async bestTime(origin: string, destination: string, today: string = toIsoDate(new Date())): Promise<BestTimeResult> {
    const key = bestTimeKey(origin, destination);
    const cached = await this.deps.cache.get(key, bestTimeSchema);
    if (cached) return cached;

    const prices = await this.deps.history.fetchPrices({
      origin,
      destination,
      since: addDays(today, -this.deps.settings.priceLookbackDays),
    });
    const analysed = (await this.deps.history.fetchOptimalDaysBefore?.(origin, destination)) ?? null;
    const daysUntil = analysed === null ? DEFAULT_DAYS_UNTIL : Math.max(1, analysed);

    const result = new HeuristicPredictor(prices, daysUntil).bestTime();
    await this.deps.cache.set(key, result, this.deps.settings.predictionCacheTtl);
    return result;
  }
}
