import { QueueBackendError, errorMessage } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import type { Result } from '@/core/result.js';
import { createRedisConnection } from '@/infrastructure/redis.js';
import type { RedisConnection, RedisConnectionOptions } from '@/infrastructure/redis.js';
import type { Logger } from '@/observability/logger.js';
import { createMemoryTaskStore } from './memory-queue.js';
import { createRedisTaskStore } from './redis-queue.js';
import type { TaskStore } from './types.js';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379/0';

export type TaskStoreOptions =
  | { backend: 'memory' }
  | {
      backend: 'redis';
      url: string;
      key?: string;
      logger: Logger;
      /** Override the connection factory (tests). */
      connect?: (options: RedisConnectionOptions) => RedisConnection;
    };

/**
 * Open the selected task store. For Redis the server must answer before
 * this resolves; an unreachable server is returned as a QueueBackendError.
 */
export async function openTaskStore(
  options: TaskStoreOptions,
): Promise<Result<TaskStore, QueueBackendError>> {
  if (options.backend === 'memory') {
    return ok(createMemoryTaskStore());
  }

  const connection = (options.connect ?? createRedisConnection)({
    url: options.url,
    logger: options.logger,
  });

  try {
    await connection.connect();
  } catch (error) {
    return err(
      error instanceof QueueBackendError
        ? error
        : new QueueBackendError('redis', `connection failed: ${errorMessage(error)}`, error),
    );
  }

  return ok(createRedisTaskStore({ connection, key: options.key }));
}
