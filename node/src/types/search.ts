// src/types/search.ts: search request/response contracts
import { z } from 'zod';
import {
  cabinClassSchema,
  flightResultSchema,
  iataCodeSchema,
  isoDateSchema,
  tripTypeSchema,
  type FlightResult,
} from '@/types/flights';

export const passengerCountSchema = z.object({
  adults: z.number().int().min(1).max(9).default(1),
  children: z.number().int().min(0).max(9).default(0),
  infants: z.number().int().min(0).max(9).default(0),
});

export const flightSearchRequestSchema = z
  .object({
    origin: iataCodeSchema,
    destination: iataCodeSchema,
    departureDate: isoDateSchema,
    returnDate: isoDateSchema.optional(),
    cabinClass: cabinClassSchema.default('ECONOMY'),
    tripType: tripTypeSchema.default('ONE_WAY'),
    passengers: passengerCountSchema.default({}),
    currency: z.string().trim().toUpperCase().length(3).default('KRW'),
    includeAlternatives: z.boolean().default(true),
  })
  .refine((r) => r.origin !== r.destination, {
    message: 'destination must differ from origin',
    path: ['destination'],
  })
  .refine((r) => r.returnDate === undefined || r.returnDate >= r.departureDate, {
    message: 'returnDate must not be before departureDate',
    path: ['returnDate'],
  });

/** What callers pass in (defaults not yet applied). */
export type FlightSearchInput = z.input<typeof flightSearchRequestSchema>;
export type FlightSearchRequest = z.output<typeof flightSearchRequestSchema>;

export interface FlightSearchResponse {
  flights: FlightResult[];
  total: number;
  cached: boolean;
  backgroundCrawlDispatched: boolean;
}

/** Payload stored in the SWR envelope for a search key. */
export const cachedSearchSchema = z.object({
  flights: z.array(flightResultSchema),
  total: z.number().int(),
});
export type CachedSearch = z.infer<typeof cachedSearchSchema>;
