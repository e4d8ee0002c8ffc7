// Port to historical price observations.
import type { CabinClass, PricePoint } from '@/types/flights';

export interface PriceSeriesQuery {
  origin: string;
  destination: string;
  /** Omitted: every cabin. */
  cabinClass?: CabinClass;
  /** Earliest departure date to include (YYYY-MM-DD). */
  since: string;
}

export interface PriceHistoryQuery {
  origin: string;
  destination: string;
  startDate: string;
  endDate: string;
  cabinClass: CabinClass;
  currency: string;
}

export interface PriceHistorySource {
  /** Observed prices ascending by crawl time, single currency. */
  fetchPrices(query: PriceSeriesQuery): Promise<number[]>;
  /** Per-departure-date aggregates, ascending by date. */
  fetchDailyPoints(query: PriceHistoryQuery): Promise<PricePoint[]>;
  /** Latest stored "best days before departure" analysis for the route, if any. */
  fetchOptimalDaysBefore?(origin: string, destination: string): Promise<number | null>;
}
