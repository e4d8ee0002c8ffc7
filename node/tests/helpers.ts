import type { CrawlJob } from '@/services/crawlDispatcher';
import type { TaskQueue } from '@/services/taskQueue';
import type { FlightResult, PriceInfo } from '@/types/flights';

export function price(amount: number, overrides: Partial<PriceInfo> = {}): PriceInfo {
  return {
    amount,
    currency: 'KRW',
    source: 'test-source',
    includesBaggage: false,
    includesMeal: false,
    crawledAt: '2026-02-01T00:00:00Z',
    ...overrides,
  };
}

export function flight(overrides: Partial<FlightResult> = {}): FlightResult {
  const lowestPrice = overrides.lowestPrice === undefined ? 250000 : overrides.lowestPrice;
  return {
    flightNumber: 'KE701',
    airlineCode: 'KE',
    airlineName: 'Test Air',
    airlineType: 'FSC',
    airlineAlliance: 'SKYTEAM',
    origin: 'ICN',
    destination: 'NRT',
    originCity: 'Seoul',
    destinationCity: 'Tokyo',
    departureTime: '2026-03-01T09:00:00',
    arrivalTime: '2026-03-01T11:30:00',
    durationMinutes: 150,
    cabinClass: 'ECONOMY',
    stops: 0,
    prices: lowestPrice === null ? [] : [price(lowestPrice)],
    source: 'test-source',
    ...overrides,
    lowestPrice,
  };
}

/** Task queue stand-in that records every enqueue. */
export class RecordingQueue implements TaskQueue {
  readonly jobs: { queueName: string; jobName: string; payload: object }[] = [];
  closed = false;

  async enqueue(queueName: string, jobName: string, payload: object): Promise<string> {
    this.jobs.push({ queueName, jobName, payload });
    return `job-${this.jobs.length}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function crawlJob(overrides: Partial<CrawlJob> = {}): CrawlJob {
  return {
    origin: 'ICN',
    destination: 'NRT',
    departureDate: '2026-03-01',
    cabinClass: 'ECONOMY',
    tripType: 'ONE_WAY',
    currency: 'KRW',
    ...overrides,
  };
}
