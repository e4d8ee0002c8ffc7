/**
 * Ports to the stored personalization data.
 */
import { seatSpecKey, type CabinClass, type SeatSpecLookup } from '@/types/flights';

export interface PreferenceSource {
  /** The raw stored profile, or null when the user never saved one. Validated by the caller. */
  getPreference(userId: string): Promise<unknown>;
}

export interface SeatSpecSource {
  /** Seat specs keyed by `${airlineCode}_${cabinClass}`. */
  getSeatSpecs(airlineCodes: string[], cabinClasses: CabinClass[]): Promise<SeatSpecLookup>;
}

/** In-process profile and seat-spec store. */
export class InMemoryPreferenceStore implements PreferenceSource, SeatSpecSource {
  private readonly profiles = new Map<string, unknown>();

  constructor(private readonly seatSpecs: SeatSpecLookup = {}) {}

  savePreference(userId: string, profile: unknown): void {
    this.profiles.set(userId, profile);
  }

  async getPreference(userId: string): Promise<unknown> {
    return this.profiles.get(userId) ?? null;
  }

  async getSeatSpecs(airlineCodes: string[], cabinClasses: CabinClass[]): Promise<SeatSpecLookup> {
    const lookup: SeatSpecLookup = {};
    for (const code of airlineCodes) {
      for (const cabin of cabinClasses) {
        const key = seatSpecKey(code, cabin);
        const spec = this.seatSpecs[key];
        if (spec) lookup[key] = spec;
      }
    }
    return lookup;
  }
}
