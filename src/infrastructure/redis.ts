/**
 * Redis client with connection lifecycle management.
 * Exposes only the list commands the persistent task queue needs.
 */
import { Redis } from 'ioredis';

import { QueueBackendError, errorMessage } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

/** The subset of Redis list commands used by the task queue. */
export interface RedisListClient {
  rpush(key: string, ...values: string[]): Promise<number>;
  lpop(key: string): Promise<string | null>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  del(key: string): Promise<number>;
}

/** Wrapper around an ioredis client with lifecycle hooks. */
export interface RedisConnection {
  client: RedisListClient;
  /** Connect and verify the server answers. Throws QueueBackendError otherwise. */
  connect(): Promise<void>;
  /** Gracefully close the connection. */
  disconnect(): Promise<void>;
}

export interface RedisConnectionOptions {
  url: string;
  logger: Logger;
}

/** Strip credentials before a URL reaches the logs. */
function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = '***';
    return parsed.toString();
  } catch {
    return '<invalid url>';
  }
}

/** Create a lazily connected Redis connection. */
export function createRedisConnection(options: RedisConnectionOptions): RedisConnection {
  const { url } = options;
  const logger = options.logger.child({ component: 'redis' });

  const redis = new Redis(url, {
    lazyConnect: true,
    // Fail commands fast while the server is down; the scheduler retries next cycle
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 200, 5_000),
  });

  redis.on('error', (error: Error) => {
    logger.warn('Redis connection error', {
      component: 'redis',
      error: error.message,
    });
  });

  return {
    client: {
      rpush: (key, ...values) => redis.rpush(key, ...values),
      lpop: (key) => redis.lpop(key),
      lrange: (key, start, stop) => redis.lrange(key, start, stop),
      del: (key) => redis.del(key),
    },

    async connect(): Promise<void> {
      try {
        await redis.connect();
        await redis.ping();
      } catch (error) {
        redis.disconnect();
        throw new QueueBackendError(
          'redis',
          `cannot reach ${redactUrl(url)}: ${errorMessage(error)}`,
          error,
        );
      }
      logger.info('Redis connected', { component: 'redis', url: redactUrl(url) });
    },

    async disconnect(): Promise<void> {
      try {
        await redis.quit();
      } catch (error) {
        logger.warn('Redis quit failed, forcing disconnect', {
          component: 'redis',
          error: errorMessage(error),
        });
        redis.disconnect();
      }
      logger.info('Redis disconnected', { component: 'redis' });
    },
  };
}
