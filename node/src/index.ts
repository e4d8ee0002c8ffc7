// Public surface of the flight freshness core.
export { loadSettings, type Settings } from '@/config/settings';
export { logger, componentLogger, type AppLogger } from '@/services/logger';

export type { KeyValueStore } from '@/store/KeyValueStore';
export { InMemoryKeyValueStore } from '@/store/InMemoryKeyValueStore';
export { RedisKeyValueStore } from '@/store/RedisKeyValueStore';

export * as cacheKeys from '@/services/cacheKeys';
export { JsonCache } from '@/services/cache';
export { StaleWhileRevalidateCache, classify, type CacheStatus, type SwrReadResult } from '@/services/staleWhileRevalidate';
export { SlidingWindowRateLimiter, type RateLimit, type RateLimiterOptions } from '@/stability/rateLimiter';
export { RetryPolicy, DEFAULT_RETRY_OPTIONS, type RetryPolicyOptions } from '@/stability/retryPolicy';
export { BullTaskQueue, connectionFromUrl, type TaskQueue } from '@/services/taskQueue';
export { CrawlDispatcher, CRAWL_JOB_NAME, crawlJobFromRequest, type CrawlJob } from '@/services/crawlDispatcher';
export { expandAirports } from '@/services/alternativeAirports';

export {
  HeuristicPredictor,
  type BestTimeResult,
  type PricePrediction,
} from '@/services/prediction/heuristicPredictor';
export { PredictionService } from '@/services/predictionService';
export { PriceHistoryService, type PriceHistoryInput } from '@/services/priceHistoryService';

export {
  buildFilters,
  parseUserPreference,
  type PreferenceFilters,
  type UserPreference,
} from '@/services/personalization/preferenceFilter';
export { FlightScorer, WEIGHT_PROFILES, type FlightScoringEngine } from '@/services/personalization/flightScorer';
export { PersonalizationService } from '@/services/personalization/personalizationService';
export {
  InMemoryPreferenceStore,
  type PreferenceSource,
  type SeatSpecSource,
} from '@/services/personalization/preferenceStorage';

export type { FlightProvider, FlightQuery } from '@/services/providers/flights/flight-provider';
export { InMemoryFlightProvider } from '@/services/providers/flights/memory-flight';
export type { PriceHistorySource } from '@/services/providers/flights/price-history-source';

export { SearchService } from '@/services/searchService';
export { NaturalSearchService, type NaturalQueryParser, type NaturalSearchResult } from '@/services/naturalSearchService';
export { openRuntime, withRuntime, type Collaborators, type Runtime } from '@/services/pipeline-deps';

export * from '@/types/flights';
export * from '@/types/search';
export { SearchValidationError, QueryNotUnderstoodError } from '@/utils/errors';
export { createErrorResponse, createSuccessResponse, errorResponseFrom } from '@/utils/errorResponse';
