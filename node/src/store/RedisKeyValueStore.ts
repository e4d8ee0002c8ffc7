// src/store/RedisKeyValueStore.ts

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import type { KeyValueStore } from './KeyValueStore';
import { componentLogger, errorMessage, type AppLogger } from '@/services/logger';

// KEYS[1] window key; ARGV: now, window, limit, member
const SLIDING_WINDOW_SCRIPT = `
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', '(' .. (now - window))
local count = redis.call('ZCARD', KEYS[1])
if count >= tonumber(ARGV[3]) then
  return 0
end
redis.call('ZADD', KEYS[1], now, ARGV[4])
redis.call('PEXPIRE', KEYS[1], window)
return 1
`;

/**
 * Redis-backed store. Construct through {@link RedisKeyValueStore.open}; the caller owns
 * the handle and must {@link close} it.
 */
export class RedisKeyValueStore implements KeyValueStore {
  private constructor(
    private readonly client: Redis,
    private readonly log: AppLogger,
  ) {}

  static async open(redisUrl: string, log: AppLogger = componentLogger('redis-store')): Promise<RedisKeyValueStore> {
    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      retryStrategy(times) {
        if (times > 3) return null; // stop after 3 retries
        return Math.min(times * 200, 2000);
      },
    });

    client.on('error', (err: Error) => {
      log.warn('redis:error', { error: err.message });
    });

    try {
      await client.connect();
      await client.ping();
    } catch (err) {
      client.disconnect();
      throw err;
    }
    log.info('redis:connected');
    return new RedisKeyValueStore(client, log);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async slidingWindowAcquire(key: string, nowMs: number, windowMs: number, limit: number): Promise<boolean> {
    const member = `${nowMs}:${uuidv4()}`;
    const admitted = await this.client.eval(SLIDING_WINDOW_SCRIPT, 1, key, nowMs, windowMs, limit, member);
    return admitted === 1;
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
      this.log.info('redis:closed');
    } catch (err) {
      this.log.warn('redis:quit_failed', { error: errorMessage(err) });
      this.client.disconnect();
    }
  }
}
