/**
 * Heuristic flight price predictor.
 *
 * Works on a chronological series of observed prices for one route + cabin (newest last)
 * and turns it into a direction, a confidence and a buy/wait recommendation. Every
 * output is a plain function of the series and the days left before departure, so the
 * same history always explains itself the same way.
 */

export type PriceDirection = 'UP' | 'DOWN' | 'STABLE';
export type BuyRecommendation = 'BUY_NOW' | 'WAIT' | 'NEUTRAL';

export interface PricePrediction {
  currentAvgPrice: number;
  predictedDirection: PriceDirection;
  confidence: number;
  recommendation: BuyRecommendation;
  reason: string;
  bestPriceSeen: number;
  worstPriceSeen: number;
  percentileCurrent: number;
  daysUntilDeparture: number;
}

export interface BestTimeResult {
  optimalDaysBefore: number;
  estimatedPriceAtOptimal: number | null;
  confidence: number;
  currentDaysBefore: number;
  recommendation: string;
}

const SHORT_WINDOW = 7;
const LONG_WINDOW = 30;
const DIRECTION_THRESHOLD_PCT = 3;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Sample-count proxy for how much the series can be trusted. */
export function confidenceFor(sampleCount: number): number {
  if (sampleCount < 5) return 0.3;
  if (sampleCount <= 20) return 0.6;
  return 0.8;
}

/** Share of samples strictly below `value`, ×100. Neutral 50 for an empty series. */
export function percentileOf(prices: readonly number[], value: number): number {
  if (prices.length === 0) return 50.0;
  const below = prices.filter((p) => p < value).length;
  return (below / prices.length) * 100;
}

/** Last-7 moving average against the last-30 (or whole-series) average. */
export function directionOf(prices: readonly number[]): PriceDirection {
  if (prices.length < SHORT_WINDOW) return 'STABLE';

  const ma7 = mean(prices.slice(-SHORT_WINDOW));
  const ma30 = mean(prices.length >= LONG_WINDOW ? prices.slice(-LONG_WINDOW) : prices);
  const diffPct = ma30 ? ((ma7 - ma30) / ma30) * 100 : 0;

  if (diffPct > DIRECTION_THRESHOLD_PCT) return 'UP';
  if (diffPct < -DIRECTION_THRESHOLD_PCT) return 'DOWN';
  return 'STABLE';
}

export class HeuristicPredictor {
  private readonly prices: readonly number[];

  constructor(
    prices: readonly number[],
    private readonly daysUntilDeparture: number,
  ) {
    this.prices = [...prices];
  }

  predict(): PricePrediction {
    const confidence = confidenceFor(this.prices.length);

    if (this.prices.length === 0) {
      return {
        currentAvgPrice: 0,
        predictedDirection: 'STABLE',
        confidence,
        recommendation: 'NEUTRAL',
        reason: 'No price data available.',
        bestPriceSeen: 0,
        worstPriceSeen: 0,
        percentileCurrent: 50.0,
        daysUntilDeparture: this.daysUntilDeparture,
      };
    }

    const currentAvg = mean(this.prices.slice(-SHORT_WINDOW));
    const percentile = percentileOf(this.prices, currentAvg);
    const { recommendation, reason } = this.recommend(percentile);

    return {
      currentAvgPrice: round(currentAvg, 2),
      predictedDirection: directionOf(this.prices),
      confidence,
      recommendation,
      reason,
      bestPriceSeen: Math.min(...this.prices),
      worstPriceSeen: Math.max(...this.prices),
      percentileCurrent: round(percentile, 1),
      daysUntilDeparture: this.daysUntilDeparture,
    };
  }

  // First matching rule wins.
  private recommend(percentile: number): { recommendation: BuyRecommendation; reason: string } {
    const days = this.daysUntilDeparture;
    if (days < 7) {
      return {
        recommendation: 'BUY_NOW',
        reason: 'Departure is less than 7 days away; prices typically rise closer to departure.',
      };
    }
    if (percentile < 25) {
      return {
        recommendation: 'BUY_NOW',
        reason: `Current price is in the ${percentile.toFixed(0)}th percentile, lower than 75% of observed prices.`,
      };
    }
    if (percentile > 75 && days > 14) {
      return {
        recommendation: 'WAIT',
        reason: `Current price is in the ${percentile.toFixed(0)}th percentile and there are ${days} days until departure. Prices may drop.`,
      };
    }
    return {
      recommendation: 'NEUTRAL',
      reason: 'Price is in the normal range. No strong signal to buy or wait.',
    };
  }

  bestTime(): BestTimeResult {
    const n = this.prices.length;
    // Short histories read as domestic routes (~21 days), long ones as international (~45).
    const optimalDays = n < LONG_WINDOW ? 21 : 45;

    let estimatedPrice: number | null = null;
    if (n >= 5) {
      const sorted = [...this.prices].sort((a, b) => a - b);
      estimatedPrice = round(sorted[Math.floor(n / 4)], 2);
    }

    let recommendation: string;
    if (this.daysUntilDeparture <= 7) {
      recommendation = 'Buy now: departure is imminent.';
    } else if (this.daysUntilDeparture < optimalDays) {
      recommendation = 'Consider buying soon: approaching the optimal window.';
    } else {
      recommendation = `Optimal purchase window is around ${optimalDays} days before departure.`;
    }

    return {
      optimalDaysBefore: optimalDays,
      estimatedPriceAtOptimal: estimatedPrice,
      confidence: confidenceFor(n),
      currentDaysBefore: this.daysUntilDeparture,
      recommendation,
    };
  }
}
