// src/services/searchService.ts: flight search: SWR cache, flight store, ranking, re-crawl.
//
//   fresh hit  → serve cached list
//   stale hit  → serve cached list, dispatch a re-crawl
//   miss       → query the flight store, rank, dispatch a re-crawl, cache the result
//
// Misses for the same key are not coalesced: concurrent requests may each recompute and
// write; the writes are equivalent overwrites of the same key.
import type { Settings } from '@/config/settings';
import { expandAirports } from '@/services/alternativeAirports';
import { searchKey } from '@/services/cacheKeys';
import { CrawlDispatcher, crawlJobFromRequest } from '@/services/crawlDispatcher';
import { componentLogger, type AppLogger } from '@/services/logger';
import { buildFilters, type UserPreference } from '@/services/personalization/preferenceFilter';
import type { PersonalizationService } from '@/services/personalization/personalizationService';
import type { FlightProvider } from '@/services/providers/flights/flight-provider';
import type { StaleWhileRevalidateCache } from '@/services/staleWhileRevalidate';
import type { FlightResult } from '@/types/flights';
import {
  cachedSearchSchema,
  flightSearchRequestSchema,
  type CachedSearch,
  type FlightSearchInput,
  type FlightSearchRequest,
  type FlightSearchResponse,
} from '@/types/search';
import { SearchValidationError } from '@/utils/errors';

export interface SearchServiceDeps {
  cache: StaleWhileRevalidateCache;
  flights: FlightProvider;
  dispatcher: CrawlDispatcher;
  personalization: PersonalizationService;
  settings: Pick<Settings, 'searchCacheTtl' | 'searchCacheSwr'>;
}

export function parseSearchRequest(input: FlightSearchInput): FlightSearchRequest {
  const parsed = flightSearchRequestSchema.safeParse(input);
  if (!parsed.success) throw SearchValidationError.fromZod(parsed.error.issues);
  return parsed.data;
}

export class SearchService {
  constructor(
    private readonly deps: SearchServiceDeps,
    private readonly log: AppLogger = componentLogger('search'),
  ) {}

  async searchFlights(input: FlightSearchInput, userId?: string): Promise<FlightSearchResponse> {
    const request = parseSearchRequest(input);
    const preference = userId ? await this.deps.personalization.loadPreference(userId) : null;

    const key = searchKey(request.origin, request.destination, request.departureDate, request.cabinClass, {
      includeAlternatives: request.includeAlternatives,
      userId: preference ? userId : undefined,
    });

    const cached = await this.deps.cache.read(key, cachedSearchSchema);
    switch (cached.status) {
      case 'fresh':
        return this.respond(cached.data, { cached: true, backgroundCrawlDispatched: false });
      case 'stale': {
        const jobId = await this.deps.dispatcher.dispatch(crawlJobFromRequest(request));
        this.log.debug('search:stale_hit', { key, jobId });
        return this.respond(cached.data, { cached: true, backgroundCrawlDispatched: jobId !== null });
      }
      case 'miss':
        return this.recompute(key, request, preference);
    }
  }

  private async recompute(
    key: string,
    request: FlightSearchRequest,
    preference: UserPreference | null,
  ): Promise<FlightSearchResponse> {
    const flights = await this.queryFlights(request, preference);
    const ranked = await this.deps.personalization.rankFlights(flights, preference);

    const jobId = await this.deps.dispatcher.dispatch(crawlJobFromRequest(request));

    const payload: CachedSearch = { flights: ranked, total: ranked.length };
    const { searchCacheTtl, searchCacheSwr } = this.deps.settings;
    await this.deps.cache.write(key, payload, searchCacheTtl, searchCacheSwr);

    this.log.info('search:recomputed', { key, total: payload.total, dispatched: jobId !== null });
    return this.respond(payload, { cached: false, backgroundCrawlDispatched: jobId !== null });
  }

  private queryFlights(request: FlightSearchRequest, preference: UserPreference | null): Promise<FlightResult[]> {
    const expand = (code: string) => (request.includeAlternatives ? expandAirports(code) : [code]);
    return this.deps.flights.searchFlights({
      originCodes: expand(request.origin),
      destinationCodes: expand(request.destination),
      departureDate: request.departureDate,
      cabinClass: request.cabinClass,
      filters: preference ? buildFilters(preference).sql : undefined,
    });
  }

  private respond(
    payload: CachedSearch,
    status: Pick<FlightSearchResponse, 'cached' | 'backgroundCrawlDispatched'>,
  ): FlightSearchResponse {
    return { flights: payload.flights, total: payload.total, ...status };
  }
}
