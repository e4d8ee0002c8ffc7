// Exponential backoff + jitter for any fallible async operation.
// Used by crawl workers and available to any caller that must eventually succeed.

import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';
import { sleep } from '@/utils/sleep';

type ErrorClass = abstract new (...args: never[]) => unknown;

export interface RetryPolicyOptions {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Scale each delay by a uniform factor in [0.5, 1.5). */
  jitter: boolean;
  /** Error kinds worth retrying. When omitted every error is retried. */
  retryOn?: readonly ErrorClass[];
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: true,
};

export class RetryPolicy {
  private readonly options: RetryPolicyOptions;

  constructor(
    options: Partial<RetryPolicyOptions> = {},
    private readonly log: AppLogger = componentLogger('retry'),
    private readonly random: () => number = Math.random,
  ) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
  }

  /** Delay before the retry that follows failed attempt `attempt` (0-based). */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options;
    const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
    return jitter ? delay * (0.5 + this.random()) : delay;
  }

  isRetryable(error: unknown): boolean {
    const { retryOn } = this.options;
    if (!retryOn) return true;
    return retryOn.some((kind) => error instanceof kind);
  }

  /**
   * Run `operation`, retrying on failure. The last error is rethrown as-is once
   * retries are exhausted; a non-retryable error is rethrown immediately.
   */
  async execute<T>(operation: () => Promise<T>, label = 'operation'): Promise<T> {
    const { maxRetries } = this.options;
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!this.isRetryable(error) || attempt >= maxRetries) {
          throw error;
        }
        const delay = this.delayFor(attempt);
        this.log.warn('retry:attempt_failed', {
          label,
          attempt: attempt + 1,
          maxRetries,
          nextDelayMs: Math.round(delay),
          error: errorMessage(error),
        });
        await sleep(delay);
      }
    }
  }
}
