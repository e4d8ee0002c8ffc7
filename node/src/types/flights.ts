// src/types/flights.ts: closed variant types and the canonical flight shape shared by every layer.
import { z } from 'zod';

export const cabinClassSchema = z.enum(['ECONOMY', 'PREMIUM_ECONOMY', 'BUSINESS', 'FIRST']);
export type CabinClass = z.infer<typeof cabinClassSchema>;

export const tripTypeSchema = z.enum(['ONE_WAY', 'ROUND_TRIP', 'MULTI_CITY']);
export type TripType = z.infer<typeof tripTypeSchema>;

export const allianceSchema = z.enum(['STAR', 'ONEWORLD', 'SKYTEAM']);
export type Alliance = z.infer<typeof allianceSchema>;

export const prioritySchema = z.enum(['PRICE', 'TIME', 'COMFORT', 'BALANCED']);
export type Priority = z.infer<typeof prioritySchema>;

/** Full-service, low-cost and ultra-low-cost carriers. */
export const airlineTypeSchema = z.enum(['FSC', 'LCC', 'ULCC']);
export type AirlineType = z.infer<typeof airlineTypeSchema>;

export const iataCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, 'must be a 3-letter IATA code');

export const airlineCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9]{2}$/, 'must be a 2-character airline code');

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD')
  .refine(
    (v) => {
      const d = new Date(`${v}T00:00:00Z`);
      return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === v;
    },
    { message: 'must be a calendar date' },
  );

/** "HH:MM", 24h clock. */
export const timeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:MM');

export const priceInfoSchema = z.object({
  amount: z.number(),
  currency: z.string(),
  source: z.string(),
  fareClass: z.string().nullable().optional(),
  bookingUrl: z.string().nullable().optional(),
  includesBaggage: z.boolean(),
  includesMeal: z.boolean(),
  crawledAt: z.string(),
});
export type PriceInfo = z.infer<typeof priceInfoSchema>;

export const scoreBreakdownSchema = z.object({
  priceScore: z.number(),
  timeScore: z.number(),
  comfortScore: z.number(),
  serviceScore: z.number(),
  reliabilityScore: z.number(),
  totalScore: z.number(),
  priority: prioritySchema,
});
export type ScoreBreakdown = z.infer<typeof scoreBreakdownSchema>;

export const flightResultSchema = z.object({
  flightNumber: z.string(),
  airlineCode: z.string(),
  airlineName: z.string(),
  airlineType: airlineTypeSchema.optional(),
  airlineAlliance: allianceSchema.nullable().optional(),
  origin: z.string(),
  destination: z.string(),
  originCity: z.string(),
  destinationCity: z.string(),
  /** Local ISO datetime at the departure airport, e.g. "2026-03-01T09:30:00". */
  departureTime: z.string(),
  arrivalTime: z.string(),
  durationMinutes: z.number().int(),
  cabinClass: cabinClassSchema,
  aircraftType: z.string().nullable().optional(),
  /** 0 = direct. */
  stops: z.number().int().nonnegative(),
  prices: z.array(priceInfoSchema),
  lowestPrice: z.number().nullable(),
  /** Comma-separated when several crawl sources reported the flight. */
  source: z.string(),
  score: z.number().optional(),
  scoreBreakdown: scoreBreakdownSchema.optional(),
});
export type FlightResult = z.infer<typeof flightResultSchema>;

export interface SeatSpec {
  seatPitchInches: number | null;
  seatWidthInches: number | null;
}

/** Seat specs keyed by `${airlineCode}_${cabinClass}`. */
export type SeatSpecLookup = Record<string, SeatSpec>;

export function seatSpecKey(airlineCode: string, cabinClass: CabinClass): string {
  return `${airlineCode}_${cabinClass}`;
}

export interface PricePoint {
  date: string;
  minPrice: number;
  maxPrice: number;
  avgPrice: number;
  currency: string;
  sampleCount: number;
}

export const pricePointSchema = z.object({
  date: z.string(),
  minPrice: z.number(),
  maxPrice: z.number(),
  avgPrice: z.number(),
  currency: z.string(),
  sampleCount: z.number().int(),
});
