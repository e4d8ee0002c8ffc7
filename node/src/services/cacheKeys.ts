// src/services/cacheKeys.ts: cache key builders; one namespace prefix per query shape.
import { createHash } from 'crypto';
import type { CabinClass } from '@/types/flights';

export interface SearchKeyOptions {
  /** Alternative airports are on by default; a direct-only search gets its own key. */
  includeAlternatives?: boolean;
  /** Personalized result lists are scoped to the user they were ranked for. */
  userId?: string;
}

function userScope(userId: string | undefined): string {
  return userId ? `:user:${userId}` : '';
}

export function searchKey(
  origin: string,
  destination: string,
  departureDate: string,
  cabinClass: CabinClass,
  options: SearchKeyOptions = {},
): string {
  const direct = options.includeAlternatives === false ? ':direct' : '';
  return `search:${origin}:${destination}:${departureDate}:${cabinClass}${direct}${userScope(options.userId)}`;
}

export function priceHistoryKey(
  origin: string,
  destination: string,
  startDate: string,
  endDate: string,
  cabinClass: CabinClass,
  currency: string,
): string {
  return `prices:${origin}:${destination}:${startDate}:${endDate}:${cabinClass}:${currency}`;
}

export function airportSearchKey(query: string): string {
  return `airports:search:${normalizeFreeText(query)}`;
}

export function airlinesListKey(typeFilter?: string | null, allianceFilter?: string | null): string {
  return `airlines:list:${typeFilter ?? 'all'}:${allianceFilter ?? 'all'}`;
}

export function nlSearchKey(query: string, userId?: string): string {
  const digest = createHash('sha256').update(normalizeFreeText(query)).digest('hex').substring(0, 32);
  return `nl_search:${digest}${userScope(userId)}`;
}

export function predictionKey(origin: string, destination: string, departureDate: string, cabinClass: CabinClass): string {
  return `prediction:${origin}:${destination}:${departureDate}:${cabinClass}`;
}

export function bestTimeKey(origin: string, destination: string): string {
  return `best_time:${origin}:${destination}`;
}

/** Lower-case, trim and collapse inner whitespace. */
export function normalizeFreeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}
