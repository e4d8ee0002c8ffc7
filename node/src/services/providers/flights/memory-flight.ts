// In-process flight provider over a fixed list. Applies the same predicates a SQL-backed
// provider pushes into its WHERE clause; used for local runs and tests.
import type { SqlFilterSet } from '@/services/personalization/preferenceFilter';
import type { FlightResult } from '@/types/flights';
import { clockMinutes, isWithinWindow, minutesOfDay, weekdayOf } from '@/utils/dates';
import type { FlightProvider, FlightQuery } from './flight-provider';

export function matchesFilters(flight: FlightResult, filters: SqlFilterSet): boolean {
  if (filters.maxStops !== undefined && flight.stops > filters.maxStops) return false;

  // An allow-list takes precedence over a deny-list.
  if (filters.preferredAirlines) {
    if (!filters.preferredAirlines.includes(flight.airlineCode)) return false;
  } else if (filters.excludedAirlines?.includes(flight.airlineCode)) {
    return false;
  }

  if (filters.preferredAlliance && flight.airlineAlliance !== filters.preferredAlliance) return false;

  if (filters.departureTimeStart && filters.departureTimeEnd) {
    const minutes = clockMinutes(flight.departureTime);
    const start = minutesOfDay(filters.departureTimeStart);
    const end = minutesOfDay(filters.departureTimeEnd);
    if (minutes === null || !isWithinWindow(start, end, minutes)) return false;
  }

  if (filters.preferredDays && !filters.preferredDays.includes(weekdayOf(flight.departureTime.slice(0, 10)))) {
    return false;
  }

  return true;
}

export class InMemoryFlightProvider implements FlightProvider {
  readonly name = 'memory-flight';

  constructor(private readonly flights: readonly FlightResult[]) {}

  async searchFlights(query: FlightQuery): Promise<FlightResult[]> {
    return this.flights
      .filter(
        (f) =>
          query.originCodes.includes(f.origin) &&
          query.destinationCodes.includes(f.destination) &&
          f.departureTime.startsWith(query.departureDate) &&
          f.cabinClass === query.cabinClass &&
          (!query.filters || matchesFilters(f, query.filters)),
      )
      .sort((a, b) => a.departureTime.localeCompare(b.departureTime));
  }
}
