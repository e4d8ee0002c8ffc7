// src/services/naturalSearchService.ts: free-text flight search.
//
//   query → parser → constraints (zod) → FlightSearchRequest → SearchService
//
// The whole answer is cached per normalized query (and per user, since results are
// ranked for them).
import { z } from 'zod';
import type { Settings } from '@/config/settings';
import { JsonCache } from '@/services/cache';
import { nlSearchKey } from '@/services/cacheKeys';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';
import type { PersonalizationService } from '@/services/personalization/personalizationService';
import { safeParseJson } from '@/services/safe-parse-json';
import type { SearchService } from '@/services/searchService';
import {
  allianceSchema,
  cabinClassSchema,
  flightResultSchema,
  iataCodeSchema,
  isoDateSchema,
  prioritySchema,
  timeOfDaySchema,
  tripTypeSchema,
  type FlightResult,
} from '@/types/flights';
import type { FlightSearchInput } from '@/types/search';
import { QueryNotUnderstoodError } from '@/utils/errors';
import { toIsoDate } from '@/utils/dates';

/** Turns a free-text query into constraint fields; may answer with an object or JSON text. */
export interface NaturalQueryParser {
  parse(query: string, referenceDate: string): Promise<unknown>;
}

const opt = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((v) => v ?? undefined);

export const naturalSearchConstraintsSchema = z.object({
  origin: opt(iataCodeSchema),
  destination: opt(iataCodeSchema),
  departureDate: opt(isoDateSchema),
  returnDate: opt(isoDateSchema),
  maxPrice: opt(z.number().nonnegative()),
  currency: opt(z.string().trim().toUpperCase().length(3)),
  maxStops: opt(z.number().int().nonnegative()),
  preferredAirlines: opt(z.array(z.string())),
  excludedAirlines: opt(z.array(z.string())),
  preferredAlliance: opt(allianceSchema),
  cabinClass: opt(cabinClassSchema),
  departureTimeStart: opt(timeOfDaySchema),
  departureTimeEnd: opt(timeOfDaySchema),
  preferredDays: opt(z.array(z.enum(['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN']))),
  minSeatWidth: opt(z.number().positive()),
  minSeatPitch: opt(z.number().positive()),
  baggageRequired: opt(z.boolean()),
  mealRequired: opt(z.boolean()),
  sortBy: opt(prioritySchema),
  tripType: opt(tripTypeSchema),
  passengersAdults: opt(z.number().int().min(1).max(9)),
  passengersChildren: opt(z.number().int().min(0).max(9)),
});

export type NaturalSearchConstraints = z.output<typeof naturalSearchConstraintsSchema>;

export interface NaturalSearchResult {
  /** The constraints that were understood; absent fields omitted. */
  parsedConstraints: Record<string, unknown>;
  flights: FlightResult[];
  total: number;
  cached: boolean;
}

const cachedResultSchema = z.object({
  parsedConstraints: z.record(z.unknown()),
  flights: z.array(flightResultSchema),
  total: z.number().int(),
});

export interface NaturalSearchDeps {
  parser: NaturalQueryParser;
  search: SearchService;
  personalization: PersonalizationService;
  cache: JsonCache;
  settings: Pick<Settings, 'nlSearchCacheTtl'>;
}

function definedFields(constraints: NaturalSearchConstraints): Record<string, unknown> {
  return Object.fromEntries(Object.entries(constraints).filter(([, v]) => v !== undefined));
}

export class NaturalSearchService {
  constructor(
    private readonly deps: NaturalSearchDeps,
    private readonly log: AppLogger = componentLogger('nl-search'),
  ) {}

  async search(query: string, userId?: string, referenceDate: string = toIsoDate(new Date())): Promise<NaturalSearchResult> {
    const key = nlSearchKey(query, userId);
    const cached = await this.deps.cache.get(key, cachedResultSchema);
    if (cached) return { ...cached, cached: true };

    const constraints = await this.parseConstraints(query, referenceDate);
    const { origin, destination } = constraints;
    if (!origin || !destination) {
      throw new QueryNotUnderstoodError('could not determine origin or destination');
    }

    const preference = userId ? await this.deps.personalization.loadPreference(userId) : null;
    const request: FlightSearchInput = {
      origin,
      destination,
      departureDate: constraints.departureDate ?? referenceDate,
      returnDate: constraints.returnDate,
      cabinClass: constraints.cabinClass ?? preference?.preferredCabinClass ?? 'ECONOMY',
      tripType: constraints.tripType ?? 'ONE_WAY',
      currency: constraints.currency,
      includeAlternatives: true,
      ...(constraints.passengersAdults !== undefined && {
        passengers: { adults: constraints.passengersAdults, children: constraints.passengersChildren ?? 0 },
      }),
    };

    const response = await this.deps.search.searchFlights(request, userId);
    const result = {
      parsedConstraints: definedFields(constraints),
      flights: response.flights,
      total: response.flights.length,
    };

    await this.deps.cache.set(key, result, this.deps.settings.nlSearchCacheTtl);
    return { ...result, cached: false };
  }

  private async parseConstraints(query: string, referenceDate: string): Promise<NaturalSearchConstraints> {
    let raw: unknown;
    try {
      raw = await this.deps.parser.parse(query, referenceDate);
    } catch (err) {
      this.log.warn('nl:parse_failed', { error: errorMessage(err) });
      throw new QueryNotUnderstoodError(errorMessage(err));
    }

    const candidate = typeof raw === 'string' ? safeParseJson(raw, 'nl-search') : raw;
    if (candidate === null || candidate === undefined) {
      throw new QueryNotUnderstoodError('parser returned no constraints');
    }

    const parsed = naturalSearchConstraintsSchema.safeParse(candidate);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
      throw new QueryNotUnderstoodError(detail);
    }
    return parsed.data;
  }
}
