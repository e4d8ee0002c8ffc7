/**
 * Runtime settings, read from the environment (and `.env` through dotenv).
 * All TTLs are seconds.
 */
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const seconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  REDIS_URL: z.string().trim().min(1).optional(),
  QUEUE_REDIS_URL: z.string().trim().min(1).default('redis://localhost:6379/1'),
  CRAWL_QUEUE_NAME: z.string().trim().min(1).default('crawl'),
  CRAWL_DISPATCH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  SEARCH_CACHE_TTL: seconds(300),
  SEARCH_CACHE_SWR: seconds(120),
  PRICE_CACHE_TTL: seconds(600),
  PREDICTION_CACHE_TTL: seconds(3600),
  NL_SEARCH_CACHE_TTL: seconds(600),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  PRICE_LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),
});

export interface Settings {
  redisUrl?: string;
  queueRedisUrl: string;
  crawlQueueName: string;
  crawlDispatchTimeoutMs: number;
  searchCacheTtl: number;
  searchCacheSwr: number;
  priceCacheTtl: number;
  predictionCacheTtl: number;
  nlSearchCacheTtl: number;
  rateLimitPerMinute: number;
  rateLimitWindowSeconds: number;
  priceLookbackDays: number;
}

function loadEnv(): NodeJS.ProcessEnv {
  dotenv.config({ path: path.resolve(process.cwd(), '.env') });
  return process.env;
}

export function loadSettings(env: NodeJS.ProcessEnv = loadEnv()): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    redisUrl: e.REDIS_URL,
    queueRedisUrl: e.QUEUE_REDIS_URL,
    crawlQueueName: e.CRAWL_QUEUE_NAME,
    crawlDispatchTimeoutMs: e.CRAWL_DISPATCH_TIMEOUT_MS,
    searchCacheTtl: e.SEARCH_CACHE_TTL,
    searchCacheSwr: e.SEARCH_CACHE_SWR,
    priceCacheTtl: e.PRICE_CACHE_TTL,
    predictionCacheTtl: e.PREDICTION_CACHE_TTL,
    nlSearchCacheTtl: e.NL_SEARCH_CACHE_TTL,
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    rateLimitWindowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
    priceLookbackDays: e.PRICE_LOOKBACK_DAYS,
  };
}
