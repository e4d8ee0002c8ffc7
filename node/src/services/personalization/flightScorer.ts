// Weighted multi-factor flight scoring driven by a user's PostFilterConfig.
import type { PostFilterConfig } from '@/services/personalization/preferenceFilter';
import {
  seatSpecKey,
  type AirlineType,
  type FlightResult,
  type PriceInfo,
  type Priority,
  type ScoreBreakdown,
  type SeatSpecLookup,
} from '@/types/flights';
import { clockMinutes, hoursOutsideWindow, isWithinWindow, minutesOfDay } from '@/utils/dates';

/** Ranking contract: one breakdown per flight, same order as the input. */
export interface FlightScoringEngine {
  scoreFlights(flights: readonly FlightResult[], seatSpecs: SeatSpecLookup | null): ScoreBreakdown[];
}

interface Weights {
  price: number;
  time: number;
  comfort: number;
  service: number;
  reliability: number;
}

export const WEIGHT_PROFILES: Record<Priority, Weights> = {
  PRICE: { price: 0.5, time: 0.2, comfort: 0.1, service: 0.1, reliability: 0.1 },
  TIME: { price: 0.15, time: 0.45, comfort: 0.1, service: 0.1, reliability: 0.2 },
  COMFORT: { price: 0.15, time: 0.1, comfort: 0.45, service: 0.2, reliability: 0.1 },
  BALANCED: { price: 0.3, time: 0.25, comfort: 0.2, service: 0.1, reliability: 0.15 },
};

const RELIABILITY_BASE: Record<AirlineType, number> = { FSC: 0.8, LCC: 0.5, ULCC: 0.3 };
const NEUTRAL = 0.5;
const TIME_DECAY_HOURS = 6;

const round4 = (v: number) => Math.round(v * 10000) / 10000;

export class FlightScorer implements FlightScoringEngine {
  private readonly weights: Weights;

  constructor(private readonly config: PostFilterConfig) {
    this.weights = WEIGHT_PROFILES[config.priority];
  }

  scoreFlights(flights: readonly FlightResult[], seatSpecs: SeatSpecLookup | null): ScoreBreakdown[] {
    const prices = flights.map((f) => f.lowestPrice).filter((p): p is number => p !== null);
    const minPrice = prices.length > 0 ? Math.min(...prices) : 0;
    const priceRange = prices.length > 0 ? Math.max(...prices) - minPrice : 0;

    return flights.map((flight) => {
      const priceScore = this.scorePrice(flight.lowestPrice, minPrice, priceRange);
      const timeScore = this.scoreTime(flight.departureTime);
      const comfortScore = this.scoreComfort(flight, seatSpecs);
      const serviceScore = this.scoreService(flight.prices);
      const reliabilityScore = this.scoreReliability(flight.airlineType ?? 'LCC', flight.source);

      const w = this.weights;
      const total =
        w.price * priceScore +
        w.time * timeScore +
        w.comfort * comfortScore +
        w.service * serviceScore +
        w.reliability * reliabilityScore;

      return {
        priceScore: round4(priceScore),
        timeScore: round4(timeScore),
        comfortScore: round4(comfortScore),
        serviceScore: round4(serviceScore),
        reliabilityScore: round4(reliabilityScore),
        totalScore: round4(total),
        priority: this.config.priority,
      };
    });
  }

  /** Min-max normalized: cheapest 1.0, most expensive 0.0, unpriced 0. */
  private scorePrice(price: number | null, minPrice: number, priceRange: number): number {
    if (price === null) return 0;
    if (priceRange === 0) return 1;
    return 1 - (price - minPrice) / priceRange;
  }

  private scoreTime(departureTime: string): number {
    const { departureTimeStart, departureTimeEnd } = this.config;
    const minutes = clockMinutes(departureTime);
    if (!departureTimeStart || !departureTimeEnd || minutes === null) return NEUTRAL;

    const start = minutesOfDay(departureTimeStart);
    const end = minutesOfDay(departureTimeEnd);
    if (isWithinWindow(start, end, minutes)) return 1;

    return Math.max(0, 1 - hoursOutsideWindow(start, end, minutes) / TIME_DECAY_HOURS);
  }

  private scoreComfort(flight: FlightResult, seatSpecs: SeatSpecLookup | null): number {
    const spec = seatSpecs?.[seatSpecKey(flight.airlineCode, flight.cabinClass)];
    if (!spec) return NEUTRAL;

    const ratios: number[] = [];
    if (this.config.minSeatPitch !== undefined && spec.seatPitchInches) {
      ratios.push(Math.min(spec.seatPitchInches / this.config.minSeatPitch, 1));
    }
    if (this.config.minSeatWidth !== undefined && spec.seatWidthInches) {
      ratios.push(Math.min(spec.seatWidthInches / this.config.minSeatWidth, 1));
    }
    if (ratios.length === 0) return NEUTRAL;
    return ratios.reduce((sum, r) => sum + r, 0) / ratios.length;
  }

  private scoreService(prices: readonly PriceInfo[]): number {
    const { baggageRequired, mealRequired } = this.config;
    if (!baggageRequired && !mealRequired) return 1;

    const hasBaggage = prices.some((p) => p.includesBaggage);
    const hasMeal = prices.some((p) => p.includesMeal);
    return (!baggageRequired || hasBaggage ? 0.5 : 0) + (!mealRequired || hasMeal ? 0.5 : 0);
  }

  private scoreReliability(airlineType: AirlineType, source: string): number {
    const base = RELIABILITY_BASE[airlineType];
    // Several crawl sources agreeing on a flight.
    return source.includes(',') ? Math.min(base + 0.2, 1) : base;
  }
}
