import { describe, expect, it } from 'vitest';
import { FlightScorer, WEIGHT_PROFILES } from '@/services/personalization/flightScorer';
import type { PostFilterConfig } from '@/services/personalization/preferenceFilter';
import { flight, price } from './helpers';

const config = (overrides: Partial<PostFilterConfig> = {}): PostFilterConfig => ({
  baggageRequired: false,
  mealRequired: false,
  priority: 'BALANCED',
  ...overrides,
});

describe('WEIGHT_PROFILES', () => {
  it('sums to one for every priority', () => {
    for (const w of Object.values(WEIGHT_PROFILES)) {
      expect(w.price + w.time + w.comfort + w.service + w.reliability).toBeCloseTo(1, 10);
    }
  });
});

describe('FlightScorer', () => {
  it('returns one breakdown per flight in input order', () => {
    const [cheap, pricey] = new FlightScorer(config()).scoreFlights(
      [flight({ lowestPrice: 100000 }), flight({ lowestPrice: 200000 })],
      null,
    );

    expect(cheap).toEqual({
      priceScore: 1,
      timeScore: 0.5,
      comfortScore: 0.5,
      serviceScore: 1,
      reliabilityScore: 0.8,
      totalScore: 0.745,
      priority: 'BALANCED',
    });
    expect(pricey.priceScore).toBe(0);
    expect(pricey.totalScore).toBe(0.445);
  });

  it('scores an unpriced flight at zero and a single price at one', () => {
    const [unpriced, priced] = new FlightScorer(config()).scoreFlights(
      [flight({ lowestPrice: null }), flight({ lowestPrice: 90000 })],
      null,
    );
    expect(unpriced.priceScore).toBe(0);
    expect(priced.priceScore).toBe(1);
  });

  it('decays the time score over six hours outside the window', () => {
    const scorer = new FlightScorer(config({ departureTimeStart: '08:00', departureTimeEnd: '10:00' }));
    const scores = scorer
      .scoreFlights(
        [
          flight({ departureTime: '2026-03-01T09:00:00' }),
          flight({ departureTime: '2026-03-01T12:00:00' }),
          flight({ departureTime: '2026-03-01T17:00:00' }),
        ],
        null,
      )
      .map((b) => b.timeScore);
    expect(scores).toEqual([1, 0.6667, 0]);
  });

  it('handles windows that wrap past midnight', () => {
    const scorer = new FlightScorer(config({ departureTimeStart: '22:00', departureTimeEnd: '02:00' }));
    const [late] = scorer.scoreFlights([flight({ departureTime: '2026-03-01T01:00:00' })], null);
    expect(late.timeScore).toBe(1);
  });

  it('compares seat specs against the comfort minimums', () => {
    const scorer = new FlightScorer(config({ minSeatPitch: 32 }));
    const seatSpecs = { KE_ECONOMY: { seatPitchInches: 30, seatWidthInches: null } };
    const [withSpec, without] = scorer.scoreFlights(
      [flight(), flight({ airlineCode: 'OZ' })],
      seatSpecs,
    );
    expect(withSpec.comfortScore).toBe(0.9375);
    expect(without.comfortScore).toBe(0.5);
  });

  it('halves the service score per unmet requirement', () => {
    const scorer = new FlightScorer(config({ baggageRequired: true, mealRequired: true }));
    const [none, baggageOnly, both] = scorer.scoreFlights(
      [
        flight(),
        flight({ prices: [price(100000, { includesBaggage: true })] }),
        flight({ prices: [price(100000, { includesBaggage: true, includesMeal: true })] }),
      ],
      null,
    );
    expect([none.serviceScore, baggageOnly.serviceScore, both.serviceScore]).toEqual([0, 0.5, 1]);
  });

  it('bases reliability on the airline type and boosts multi-source flights', () => {
    const scores = new FlightScorer(config())
      .scoreFlights(
        [
          flight({ source: 'a,b' }),
          flight({ airlineType: undefined }),
          flight({ airlineType: 'ULCC', source: 'a,b' }),
        ],
        null,
      )
      .map((b) => b.reliabilityScore);
    expect(scores).toEqual([1, 0.5, 0.5]);
  });
});
