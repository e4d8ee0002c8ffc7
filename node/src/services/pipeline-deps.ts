// src/services/pipeline-deps.ts: runtime wiring: opens the shared store and task queue,
// builds the services on top and hands back one handle that releases both.
import type { Settings } from '@/config/settings';
import { JsonCache } from '@/services/cache';
import { CrawlDispatcher } from '@/services/crawlDispatcher';
import { componentLogger, errorMessage } from '@/services/logger';
import { NaturalSearchService, type NaturalQueryParser } from '@/services/naturalSearchService';
import { PersonalizationService } from '@/services/personalization/personalizationService';
import type { PreferenceSource, SeatSpecSource } from '@/services/personalization/preferenceStorage';
import { PredictionService } from '@/services/predictionService';
import { PriceHistoryService } from '@/services/priceHistoryService';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import type { PriceHistorySource } from '@/services/providers/flights/price-history-source';
import { SearchService } from '@/services/searchService';
import { StaleWhileRevalidateCache } from '@/services/staleWhileRevalidate';
import { BullTaskQueue, connectionFromUrl, type TaskQueue } from '@/services/taskQueue';
import { SlidingWindowRateLimiter } from '@/stability/rateLimiter';
import { InMemoryKeyValueStore } from '@/store/InMemoryKeyValueStore';
import type { KeyValueStore } from '@/store/KeyValueStore';
import { RedisKeyValueStore } from '@/store/RedisKeyValueStore';

const log = componentLogger('runtime');

/** Data sources the runtime does not own. */
export interface Collaborators {
  flights: FlightProvider;
  priceHistory: PriceHistorySource;
  preferences: PreferenceSource;
  seatSpecs: SeatSpecSource;
  parser: NaturalQueryParser;
}

export interface RuntimeFactories {
  openStore(redisUrl: string): Promise<KeyValueStore>;
  createQueue(queueRedisUrl: string): TaskQueue;
}

const defaultFactories: RuntimeFactories = {
  openStore: (redisUrl) => RedisKeyValueStore.open(redisUrl),
  createQueue: (queueRedisUrl) => new BullTaskQueue(connectionFromUrl(queueRedisUrl)),
};

export interface Runtime {
  store: KeyValueStore;
  queue: TaskQueue;
  rateLimiter: SlidingWindowRateLimiter;
  search: SearchService;
  naturalSearch: NaturalSearchService;
  prediction: PredictionService;
  priceHistory: PriceHistoryService;
  personalization: PersonalizationService;
  close(): Promise<void>;
}

async function openStore(settings: Settings, factories: RuntimeFactories): Promise<KeyValueStore> {
  if (!settings.redisUrl) {
    log.warn('runtime:no_redis_url', { fallback: 'in-memory store' });
    return new InMemoryKeyValueStore();
  }
  try {
    return await factories.openStore(settings.redisUrl);
  } catch (err) {
    log.warn('runtime:redis_unavailable', { fallback: 'in-memory store', error: errorMessage(err) });
    return new InMemoryKeyValueStore();
  }
}

export async function openRuntime(
  settings: Settings,
  collaborators: Collaborators,
  factories: RuntimeFactories = defaultFactories,
): Promise<Runtime> {
  const store = await openStore(settings, factories);
  const queue = factories.createQueue(settings.queueRedisUrl);

  const cache = new JsonCache(store);
  const personalization = new PersonalizationService({
    preferences: collaborators.preferences,
    seatSpecs: collaborators.seatSpecs,
  });
  const dispatcher = new CrawlDispatcher(queue, {
    queueName: settings.crawlQueueName,
    timeoutMs: settings.crawlDispatchTimeoutMs,
  });
  const search = new SearchService({
    cache: new StaleWhileRevalidateCache(store),
    flights: collaborators.flights,
    dispatcher,
    personalization,
    settings,
  });

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    const results = await Promise.allSettled([queue.close(), store.close()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error('runtime:close_failed', { error: errorMessage(result.reason) });
      }
    }
    log.info('runtime:closed');
  };

  return {
    store,
    queue,
    rateLimiter: new SlidingWindowRateLimiter(store, {
      defaultLimit: {
        maxRequests: settings.rateLimitPerMinute,
        windowMs: settings.rateLimitWindowSeconds * 1000,
      },
    }),
    search,
    naturalSearch: new NaturalSearchService({
      parser: collaborators.parser,
      search,
      personalization,
      cache,
      settings,
    }),
    prediction: new PredictionService({ cache, history: collaborators.priceHistory, settings }),
    priceHistory: new PriceHistoryService({ cache, history: collaborators.priceHistory, settings }),
    personalization,
    close,
  };
}

/** Runs `fn` against a fresh runtime and closes it on every exit path. */
export async function withRuntime<T>(
  settings: Settings,
  collaborators: Collaborators,
  fn: (runtime: Runtime) => Promise<T>,
  factories: RuntimeFactories = defaultFactories,
): Promise<T> {
  const runtime = await openRuntime(settings, collaborators, factories);
  try {
    return await fn(runtime);
  } finally {
    await runtime.close();
  }
}
