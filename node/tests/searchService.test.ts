import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, type ILogObj } from 'tslog';
import { CrawlDispatcher } from '@/services/crawlDispatcher';
import { PersonalizationService } from '@/services/personalization/personalizationService';
import { InMemoryPreferenceStore } from '@/services/personalization/preferenceStorage';
import { InMemoryFlightProvider } from '@/services/providers/flights/memory-flight';
import { SearchService, parseSearchRequest } from '@/services/searchService';
import { StaleWhileRevalidateCache } from '@/services/staleWhileRevalidate';
import type { TaskQueue } from '@/services/taskQueue';
import { InMemoryKeyValueStore } from '@/store/InMemoryKeyValueStore';
import { SearchValidationError } from '@/utils/errors';
import { RecordingQueue, flight } from './helpers';

const BASE = Date.parse('2026-02-01T00:00:00Z');
const KEY = 'search:ICN:NRT:2026-03-01:ECONOMY';
const log = new Logger<ILogObj>({ type: 'hidden' });

const direct = flight({ flightNumber: 'KE701', departureTime: '2026-03-01T09:00:00' });
const viaAlternates = flight({
  flightNumber: 'OZ1035',
  airlineCode: 'OZ',
  airlineAlliance: 'STAR',
  origin: 'GMP',
  destination: 'HND',
  departureTime: '2026-03-01T14:00:00',
  arrivalTime: '2026-03-01T16:20:00',
  stops: 1,
  lowestPrice: 180000,
});
const nextDay = flight({ flightNumber: 'KE703', departureTime: '2026-03-02T09:00:00' });
const business = flight({ flightNumber: 'KE705', cabinClass: 'BUSINESS' });

describe('SearchService', () => {
  let store: InMemoryKeyValueStore;
  let provider: InMemoryFlightProvider;
  let queue: RecordingQueue;
  let preferences: InMemoryPreferenceStore;

  function buildService(taskQueue: TaskQueue = queue): SearchService {
    return new SearchService(
      {
        cache: new StaleWhileRevalidateCache(store, log),
        flights: provider,
        dispatcher: new CrawlDispatcher(taskQueue, { queueName: 'crawl', timeoutMs: 2000 }, log),
        personalization: new PersonalizationService({ preferences, seatSpecs: preferences }, log),
        settings: { searchCacheTtl: 300, searchCacheSwr: 120 },
      },
      log,
    );
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(BASE);
    store = new InMemoryKeyValueStore();
    provider = new InMemoryFlightProvider([direct, viaAlternates, nextDay, business]);
    queue = new RecordingQueue();
    preferences = new InMemoryPreferenceStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('computes a miss, then serves the stale copy and re-crawls', async () => {
    const searchFlights = vi.spyOn(provider, 'searchFlights');
    const service = buildService();
    const input = { origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' };

    const first = await service.searchFlights(input);
    expect(first).toEqual({ flights: [direct, viaAlternates], total: 2, cached: false, backgroundCrawlDispatched: true });
    expect(searchFlights).toHaveBeenCalledTimes(1);
    expect(queue.jobs).toEqual([
      {
        queueName: 'crawl',
        jobName: 'crawl_parallel',
        payload: {
          origin: 'ICN',
          destination: 'NRT',
          departureDate: '2026-03-01',
          cabinClass: 'ECONOMY',
          tripType: 'ONE_WAY',
          currency: 'KRW',
        },
      },
    ]);

    const envelope = JSON.parse((await store.get(KEY)) ?? 'null');
    expect(envelope.freshUntil).toBe(BASE + 300_000);
    expect(envelope.staleUntil).toBe(BASE + 420_000);

    vi.setSystemTime(BASE + 200_000);
    const fresh = await service.searchFlights(input);
    expect(fresh).toEqual({ flights: first.flights, total: 2, cached: true, backgroundCrawlDispatched: false });
    expect(queue.jobs).toHaveLength(1);

    vi.setSystemTime(BASE + 350_000);
    const stale = await service.searchFlights(input);

    expect(stale).toEqual({ flights: first.flights, total: 2, cached: true, backgroundCrawlDispatched: true });
    expect(searchFlights).toHaveBeenCalledTimes(1);
    expect(queue.jobs).toHaveLength(2);
  });

  it('serves a fresh hit without dispatching', async () => {
    const service = buildService();
    const input = { origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' };
    await service.searchFlights(input);

    vi.setSystemTime(BASE + 100_000);
    const hit = await service.searchFlights(input);

    expect(hit.cached).toBe(true);
    expect(hit.backgroundCrawlDispatched).toBe(false);
    expect(queue.jobs).toHaveLength(1);
  });

  it('recomputes once the stale window has passed', async () => {
    const searchFlights = vi.spyOn(provider, 'searchFlights');
    const service = buildService();
    const input = { origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' };
    await service.searchFlights(input);

    vi.setSystemTime(BASE + 420_000);
    const again = await service.searchFlights(input);

    expect(again.cached).toBe(false);
    expect(searchFlights).toHaveBeenCalledTimes(2);
  });

  it('normalizes codes before building the key', async () => {
    await buildService().searchFlights({ origin: ' icn', destination: 'nrt', departureDate: '2026-03-01' });
    expect(await store.get(KEY)).not.toBeNull();
  });

  it('searches only the requested airports when alternatives are off', async () => {
    const result = await buildService().searchFlights({
      origin: 'ICN',
      destination: 'NRT',
      departureDate: '2026-03-01',
      includeAlternatives: false,
    });

    expect(result.flights.map((f) => f.flightNumber)).toEqual(['KE701']);
    expect(await store.get(`${KEY}:direct`)).not.toBeNull();
    expect(await store.get(KEY)).toBeNull();
  });

  it('ranks and filters for a user with a profile under a user-scoped key', async () => {
    preferences.savePreference('user-1', { maxStops: 0, priority: 'PRICE' });

    const result = await buildService().searchFlights(
      { origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' },
      'user-1',
    );

    expect(result.flights.map((f) => f.flightNumber)).toEqual(['KE701']);
    expect(result.flights[0].scoreBreakdown?.priority).toBe('PRICE');
    expect(await store.get(`${KEY}:user:user-1`)).not.toBeNull();
    expect(await store.get(KEY)).toBeNull();
  });

  it('uses the shared key for a user without a profile', async () => {
    await buildService().searchFlights({ origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' }, 'user-2');
    expect(await store.get(KEY)).not.toBeNull();
  });

  it('still answers and caches when the dispatch fails', async () => {
    const broken: TaskQueue = {
      enqueue: vi.fn().mockRejectedValue(new Error('queue down')),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const service = buildService(broken);

    const result = await service.searchFlights({ origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' });

    expect(result.cached).toBe(false);
    expect(result.backgroundCrawlDispatched).toBe(false);
    expect(result.total).toBe(2);
    expect(await store.get(KEY)).not.toBeNull();
  });

  it('reports a stale hit with a failed dispatch honestly', async () => {
    const enqueue = vi.fn<[string, string, object], Promise<string>>().mockResolvedValueOnce('job-1');
    enqueue.mockRejectedValue(new Error('queue down'));
    const service = buildService({ enqueue, close: vi.fn().mockResolvedValue(undefined) });
    const input = { origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' };
    await service.searchFlights(input);

    vi.setSystemTime(BASE + 350_000);
    const stale = await service.searchFlights(input);

    expect(stale.cached).toBe(true);
    expect(stale.backgroundCrawlDispatched).toBe(false);
    expect(enqueue).toHaveBeenCalledTimes(2);
  });

  it('rejects invalid requests before touching the cache', async () => {
    const service = buildService();

    await expect(
      service.searchFlights({ origin: 'ICN', destination: 'ICN', departureDate: '2026-03-01' }),
    ).rejects.toBeInstanceOf(SearchValidationError);
    expect(queue.jobs).toHaveLength(0);
  });
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe('parseSearchRequest', () => {
  it('applies defaults', () => {
    expect(parseSearchRequest({ origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' })).toEqual({
      origin: 'ICN',
      destination: 'NRT',
      departureDate: '2026-03-01',
      cabinClass: 'ECONOMY',
      tripType: 'ONE_WAY',
      passengers: { adults: 1, children: 0, infants: 0 },
      currency: 'KRW',
      includeAlternatives: true,
    });
  });

  it('reports each invalid field', () => {
    const error = captureError(() =>
      parseSearchRequest({ origin: 'ICN', destination: 'NRT', departureDate: '2026-02-30' }),
    );

    expect(error).toBeInstanceOf(SearchValidationError);
    expect(error).toMatchObject({
      message: 'Invalid search parameters',
      issues: [{ path: 'departureDate', message: 'must be a calendar date' }],
    });
  });

  it('rejects a return before departure', () => {
    expect(() =>
      parseSearchRequest({
        origin: 'ICN',
        destination: 'NRT',
        departureDate: '2026-03-10',
        returnDate: '2026-03-01',
      }),
    ).toThrow(SearchValidationError);
  });
});
