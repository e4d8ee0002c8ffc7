/**
 * User preference profile → query filters.
 *
 * A stored profile is validated once, when it is loaded ({@link parseUserPreference}).
 * {@link buildFilters} then splits it into predicates the flight query can push down
 * ({@link SqlFilterSet}) and settings that need joined data such as seat specs, applied
 * while scoring ({@link PostFilterConfig}). Absent fields never narrow anything.
 */
import { z } from 'zod';
import {
  airlineCodeSchema,
  allianceSchema,
  cabinClassSchema,
  prioritySchema,
  timeOfDaySchema,
  type Alliance,
  type CabinClass,
  type Priority,
} from '@/types/flights';

// Older profiles wrapped their lists: { "codes": [...] } / { "days": [...] }.
const airlineListSchema = z.union([
  z.array(airlineCodeSchema),
  z.object({ codes: z.array(airlineCodeSchema) }).transform((v) => v.codes),
]);

const weekdaySchema = z.number().int().min(0).max(6);
const dayListSchema = z.union([
  z.array(weekdaySchema),
  z.object({ days: z.array(weekdaySchema) }).transform((v) => v.days),
]);

const nullish = <T extends z.ZodTypeAny>(schema: T) => schema.nullish().transform((v) => v ?? undefined);

export const userPreferenceSchema = z.object({
  minSeatPitch: nullish(z.number().positive()),
  minSeatWidth: nullish(z.number().positive()),
  preferredDepartureTimeStart: nullish(timeOfDaySchema),
  preferredDepartureTimeEnd: nullish(timeOfDaySchema),
  /** 0 = Monday … 6 = Sunday. */
  preferredDays: nullish(dayListSchema),
  maxLayoverHours: nullish(z.number().int().nonnegative()),
  maxStops: nullish(z.number().int().nonnegative()),
  preferredAlliance: nullish(allianceSchema),
  preferredAirlines: nullish(airlineListSchema),
  excludedAirlines: nullish(airlineListSchema),
  baggageRequired: nullish(z.boolean()),
  mealRequired: nullish(z.boolean()),
  preferredCabinClass: nullish(cabinClassSchema),
  priority: nullish(prioritySchema),
});

export type UserPreference = z.output<typeof userPreferenceSchema>;

export function parseUserPreference(raw: unknown): UserPreference {
  return userPreferenceSchema.parse(raw);
}

/** Predicates for the primary flight query. */
export interface SqlFilterSet {
  maxStops?: number;
  preferredAirlines?: string[];
  excludedAirlines?: string[];
  preferredAlliance?: Alliance;
  departureTimeStart?: string;
  departureTimeEnd?: string;
  preferredDays?: number[];
  cabinClass?: CabinClass;
}

/** Settings applied after the query, during scoring. */
export interface PostFilterConfig {
  minSeatPitch?: number;
  minSeatWidth?: number;
  baggageRequired: boolean;
  mealRequired: boolean;
  priority: Priority;
  departureTimeStart?: string;
  departureTimeEnd?: string;
}

export interface PreferenceFilters {
  sql: SqlFilterSet;
  post: PostFilterConfig;
}

function nonEmpty<T>(values: T[] | undefined): T[] | undefined {
  return values && values.length > 0 ? [...values] : undefined;
}

export function buildFilters(preference: UserPreference): PreferenceFilters {
  const sql: SqlFilterSet = {
    maxStops: preference.maxStops,
    preferredAirlines: nonEmpty(preference.preferredAirlines),
    excludedAirlines: nonEmpty(preference.excludedAirlines),
    preferredAlliance: preference.preferredAlliance,
    departureTimeStart: preference.preferredDepartureTimeStart,
    departureTimeEnd: preference.preferredDepartureTimeEnd,
    preferredDays: nonEmpty(preference.preferredDays),
    cabinClass: preference.preferredCabinClass,
  };

  const post: PostFilterConfig = {
    minSeatPitch: preference.minSeatPitch,
    minSeatWidth: preference.minSeatWidth,
    baggageRequired: preference.baggageRequired ?? false,
    mealRequired: preference.mealRequired ?? false,
    priority: preference.priority ?? 'BALANCED',
    departureTimeStart: preference.preferredDepartureTimeStart,
    departureTimeEnd: preference.preferredDepartureTimeEnd,
  };

  return { sql, post };
}
