/**
 * Personalization: loads a user's preference profile, derives filters from it and
 * ranks result lists with the scoring engine.
 */
import { ZodError } from 'zod';
import {
  buildFilters,
  parseUserPreference,
  type PostFilterConfig,
  type PreferenceFilters,
  type UserPreference,
} from '@/services/personalization/preferenceFilter';
import { FlightScorer, type FlightScoringEngine } from '@/services/personalization/flightScorer';
import type { PreferenceSource, SeatSpecSource } from '@/services/personalization/preferenceStorage';
import type { CabinClass, FlightResult, SeatSpecLookup } from '@/types/flights';
import { componentLogger, type AppLogger } from '@/services/logger';

export interface PersonalizationDeps {
  preferences: PreferenceSource;
  seatSpecs: SeatSpecSource;
  /** Scoring engine for a given post-filter config; defaults to {@link FlightScorer}. */
  createScorer?: (config: PostFilterConfig) => FlightScoringEngine;
}

export class PersonalizationService {
  private readonly createScorer: (config: PostFilterConfig) => FlightScoringEngine;

  constructor(
    private readonly deps: PersonalizationDeps,
    private readonly log: AppLogger = componentLogger('personalization'),
  ) {
    this.createScorer = deps.createScorer ?? ((config) => new FlightScorer(config));
  }

  /**
   * The user's validated profile, or null when there is none. A stored profile that
   * fails validation is logged and treated as absent.
   */
  async loadPreference(userId: string): Promise<UserPreference | null> {
    const raw = await this.deps.preferences.getPreference(userId);
    if (raw === null || raw === undefined) return null;
    try {
      return parseUserPreference(raw);
    } catch (err) {
      if (!(err instanceof ZodError)) throw err;
      this.log.warn('personalization:invalid_profile', {
        userId,
        issues: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
  }

  async getUserFilters(userId: string): Promise<PreferenceFilters | null> {
    const preference = await this.loadPreference(userId);
    return preference ? buildFilters(preference) : null;
  }

  async getSeatSpecs(flights: readonly FlightResult[]): Promise<SeatSpecLookup> {
    const airlineCodes = [...new Set(flights.map((f) => f.airlineCode))];
    if (airlineCodes.length === 0) return {};
    const cabinClasses: CabinClass[] = [...new Set(flights.map((f) => f.cabinClass))];
    return this.deps.seatSpecs.getSeatSpecs(airlineCodes, cabinClasses);
  }

  /**
   * Score flights against a profile and sort them by total score, highest first.
   * Equal scores keep their input order. Without a profile the list is returned as is.
   */
  async rankFlights(flights: FlightResult[], preference: UserPreference | null): Promise<FlightResult[]> {
    if (!preference || flights.length === 0) return flights;

    const { post } = buildFilters(preference);
    const seatSpecs = await this.getSeatSpecs(flights);
    const breakdowns = this.createScorer(post).scoreFlights(flights, seatSpecs);
    if (breakdowns.length !== flights.length) {
      throw new Error(`Scorer returned ${breakdowns.length} breakdowns for ${flights.length} flights`);
    }

    const scored = flights.map((flight, i) => ({
      ...flight,
      score: breakdowns[i].totalScore,
      scoreBreakdown: breakdowns[i],
    }));
    // Array.prototype.sort is stable.
    return scored.sort((a, b) => b.score - a.score);
  }

  /** {@link rankFlights} for a user id; unknown users and anonymous calls pass through. */
  async scoreResults(flights: FlightResult[], userId?: string): Promise<FlightResult[]> {
    if (!userId || flights.length === 0) return flights;
    return this.rankFlights(flights, await this.loadPreference(userId));
  }
}
