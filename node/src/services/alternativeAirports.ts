// Nearby-airport expansion for broadening a route search (same metro area).
import { z } from 'zod';
import table from '@/data/alternative-airports.json';

const ALTERNATIVE_AIRPORTS: Record<string, string[]> = z.record(z.array(z.string())).parse(table);

/** The code itself followed by its alternatives. */
export function expandAirports(code: string): string[] {
  return [code, ...(ALTERNATIVE_AIRPORTS[code] ?? [])];
}
