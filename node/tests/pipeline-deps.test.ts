import { describe, expect, it, vi } from 'vitest';
import { loadSettings } from '@/config/settings';
import { InMemoryPreferenceStore } from '@/services/personalization/preferenceStorage';
import { InMemoryFlightProvider } from '@/services/providers/flights/memory-flight';
import { openRuntime, withRuntime, type Collaborators, type RuntimeFactories } from '@/services/pipeline-deps';
import { InMemoryKeyValueStore } from '@/store/InMemoryKeyValueStore';
import { RecordingQueue, flight } from './helpers';

function collaborators(): Collaborators {
  const preferences = new InMemoryPreferenceStore();
  return {
    flights: new InMemoryFlightProvider([flight()]),
    priceHistory: { fetchPrices: async () => [], fetchDailyPoints: async () => [] },
    preferences,
    seatSpecs: preferences,
    parser: { parse: async () => ({ origin: 'ICN', destination: 'NRT' }) },
  };
}

function factories(store = new InMemoryKeyValueStore(), queue = new RecordingQueue()) {
  const openStore = vi.fn(async (_url: string) => store);
  const createQueue = vi.fn((_url: string) => queue);
  const built: RuntimeFactories = { openStore, createQueue };
  return { built, openStore, createQueue, store, queue };
}

describe('openRuntime', () => {
  it('uses the in-memory store when no Redis URL is configured', async () => {
    const { built, openStore, createQueue } = factories();

    const runtime = await openRuntime(loadSettings({}), collaborators(), built);

    expect(openStore).not.toHaveBeenCalled();
    expect(runtime.store).toBeInstanceOf(InMemoryKeyValueStore);
    expect(createQueue).toHaveBeenCalledWith('redis://localhost:6379/1');
    await runtime.close();
  });

  it('opens the configured store', async () => {
    const { built, openStore, store } = factories();

    const runtime = await openRuntime(loadSettings({ REDIS_URL: 'redis://cache.local:6379/0' }), collaborators(), built);

    expect(openStore).toHaveBeenCalledWith('redis://cache.local:6379/0');
    expect(runtime.store).toBe(store);
    await runtime.close();
  });

  it('falls back to the in-memory store when Redis cannot be reached', async () => {
    const { built, openStore, store } = factories();
    openStore.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const runtime = await openRuntime(loadSettings({ REDIS_URL: 'redis://cache.local:6379/0' }), collaborators(), built);

    expect(runtime.store).toBeInstanceOf(InMemoryKeyValueStore);
    expect(runtime.store).not.toBe(store);
    await runtime.close();
  });

  it('wires the rate limiter from settings', async () => {
    const { built } = factories();
    const runtime = await openRuntime(
      loadSettings({ RATE_LIMIT_PER_MINUTE: '2', RATE_LIMIT_WINDOW_SECONDS: '30' }),
      collaborators(),
      built,
    );

    expect(runtime.rateLimiter.limitFor('any')).toEqual({ maxRequests: 2, windowMs: 30_000 });
    expect(await runtime.rateLimiter.tryAcquire('any')).toBe(true);
    expect(await runtime.rateLimiter.tryAcquire('any')).toBe(true);
    expect(await runtime.rateLimiter.tryAcquire('any')).toBe(false);
    await runtime.close();
  });

  it('closes the queue and the store once', async () => {
    const { built, store, queue } = factories();
    const closeStore = vi.spyOn(store, 'close');
    const runtime = await openRuntime(loadSettings({ REDIS_URL: 'redis://cache.local:6379/0' }), collaborators(), built);

    await runtime.close();
    await runtime.close();

    expect(queue.closed).toBe(true);
    expect(closeStore).toHaveBeenCalledTimes(1);
  });
});

describe('withRuntime', () => {
  it('runs a search end to end and releases the runtime', async () => {
    const { built, queue } = factories();

    const result = await withRuntime(
      loadSettings({}),
      collaborators(),
      (runtime) => runtime.search.searchFlights({ origin: 'ICN', destination: 'NRT', departureDate: '2026-03-01' }),
      built,
    );

    expect(result.total).toBe(1);
    expect(result.backgroundCrawlDispatched).toBe(true);
    expect(queue.jobs).toHaveLength(1);
    expect(queue.closed).toBe(true);
  });

  it('releases the runtime when the work fails', async () => {
    const { built, store, queue } = factories();
    const closeStore = vi.spyOn(store, 'close');
    const failure = new Error('boom');

    await expect(
      withRuntime(
        loadSettings({ REDIS_URL: 'redis://cache.local:6379/0' }),
        collaborators(),
        async () => {
          throw failure;
        },
        built,
      ),
    ).rejects.toBe(failure);

    expect(queue.closed).toBe(true);
    expect(closeStore).toHaveBeenCalledTimes(1);
  });
});
