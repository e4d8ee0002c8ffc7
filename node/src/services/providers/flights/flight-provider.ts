// src/services/providers/flights/flight-provider.ts
// Port to the primary flight store. Implementations push the SqlFilterSet down into their
// query; the search core never filters the returned list again.
import type { SqlFilterSet } from '@/services/personalization/preferenceFilter';
import type { CabinClass, FlightResult } from '@/types/flights';

export interface FlightQuery {
  /** Requested origin plus any alternative airports. */
  originCodes: string[];
  destinationCodes: string[];
  departureDate: string;
  cabinClass: CabinClass;
  filters?: SqlFilterSet;
}

export interface FlightProvider {
  name: string;
  /** Matching flights ordered by departure time. */
  searchFlights(query: FlightQuery): Promise<FlightResult[]>;
}
