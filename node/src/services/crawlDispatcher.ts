// src/services/crawlDispatcher.ts: fire-and-forget re-crawl requests.
//
// A failed dispatch only means stale data stays stale one cycle longer, so nothing here
// ever throws to the search path: every failure is logged and reported as `null`.
// Retrying belongs to the queue workers, not to this call.
import type { TaskQueue } from '@/services/taskQueue';
import type { CabinClass, TripType } from '@/types/flights';
import type { FlightSearchRequest } from '@/types/search';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';

export const CRAWL_JOB_NAME = 'crawl_parallel';

/** Serialized search intent consumed by the crawler workers. */
export interface CrawlJob {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  cabinClass: CabinClass;
  tripType: TripType;
  currency: string;
}

export function crawlJobFromRequest(request: FlightSearchRequest): CrawlJob {
  return {
    origin: request.origin,
    destination: request.destination,
    departureDate: request.departureDate,
    ...(request.returnDate && { returnDate: request.returnDate }),
    cabinClass: request.cabinClass,
    tripType: request.tripType,
    currency: request.currency,
  };
}

export interface CrawlDispatcherOptions {
  queueName: string;
  /** Upper bound on how long a dispatch may hold up the caller. */
  timeoutMs: number;
}

class DispatchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Dispatch timed out after ${timeoutMs}ms`);
    this.name = 'DispatchTimeoutError';
  }
}

export class CrawlDispatcher {
  constructor(
    private readonly queue: TaskQueue,
    private readonly options: CrawlDispatcherOptions,
    private readonly log: AppLogger = componentLogger('crawl-dispatcher'),
  ) {}

  /** @returns the queued job id, or null when the job could not be queued */
  async dispatch(job: CrawlJob): Promise<string | null> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new DispatchTimeoutError(this.options.timeoutMs)), this.options.timeoutMs);
    });

    try {
      const jobId = await Promise.race([this.enqueue(job), timeout]);
      this.log.info('crawl:dispatched', { jobId, origin: job.origin, destination: job.destination, departureDate: job.departureDate });
      return jobId;
    } catch (err) {
      this.log.error('crawl:dispatch_failed', {
        origin: job.origin,
        destination: job.destination,
        departureDate: job.departureDate,
        error: errorMessage(err),
      });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }

  private async enqueue(job: CrawlJob): Promise<string> {
    // Serialize up front so an unserializable payload fails here, not inside the queue client.
    const payload: unknown = JSON.parse(JSON.stringify(job));
    if (typeof payload !== 'object' || payload === null) {
      throw new Error('Crawl job did not serialize to an object');
    }
    return this.queue.enqueue(this.options.queueName, CRAWL_JOB_NAME, payload);
  }
}
