/**
 * Persistent task store backed by a Redis list.
 *
 * Entries are JSON `{name, interval_seconds, shell_command}` records;
 * RPUSH appends to the tail and LPOP takes the head, so FIFO order holds
 * across restarts. Several schedulers sharing one key is not coordinated.
 */
import { QueueBackendError, errorMessage } from '@/core/errors.js';
import { err, ok, settle } from '@/core/result.js';
import { fromTaskRecord, toTaskRecord } from '@/core/types.js';
import type { Task } from '@/core/types.js';
import { taskRecordSchema } from '@/config/schema.js';
import type { RedisConnection } from '@/infrastructure/redis.js';
import type { QueueResult, TaskStore } from './types.js';

export const DEFAULT_REDIS_KEY = 'qzark:tasks';

export interface RedisTaskStoreOptions {
  connection: RedisConnection;
  /** Redis key of the list. Defaults to `qzark:tasks`. */
  key?: string;
}

const toBackendError = (operation: string) => (error: unknown): QueueBackendError =>
  new QueueBackendError('redis', `${operation} failed: ${errorMessage(error)}`, error);

/** Serialize a task for storage. */
export function encodeTask(task: Task): string {
  return JSON.stringify(toTaskRecord(task));
}

/** Parse a stored entry back into a task. */
export function decodeTask(raw: string): QueueResult<Task> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return err(new QueueBackendError('redis', `corrupt queue entry (not JSON): ${raw}`));
  }

  const record = taskRecordSchema.safeParse(parsed);
  if (!record.success) {
    return err(new QueueBackendError('redis', `corrupt queue entry: ${raw}`));
  }
  return ok(fromTaskRecord(record.data));
}

/** Create a task store on an already connected Redis connection. */
export function createRedisTaskStore(options: RedisTaskStoreOptions): TaskStore {
  const { connection } = options;
  const { client } = connection;
  const key = options.key ?? DEFAULT_REDIS_KEY;

  const append = async (task: Task): Promise<QueueResult<void>> => {
    const pushed = await settle(client.rpush(key, encodeTask(task)), toBackendError('RPUSH'));
    return pushed.ok ? ok(undefined) : pushed;
  };

  return {
    backend: 'redis',

    push: append,

    async pop(): Promise<QueueResult<Task | null>> {
      const popped = await settle(client.lpop(key), toBackendError('LPOP'));
      if (!popped.ok) return popped;
      if (popped.value === null) return ok(null);
      return decodeTask(popped.value);
    },

    requeue: append,

    async snapshot(): Promise<QueueResult<Task[]>> {
      const listed = await settle(client.lrange(key, 0, -1), toBackendError('LRANGE'));
      if (!listed.ok) return listed;

      const tasks: Task[] = [];
      for (const raw of listed.value) {
        const decoded = decodeTask(raw);
        if (!decoded.ok) return decoded;
        tasks.push(decoded.value);
      }
      return ok(tasks);
    },

    async clear(): Promise<QueueResult<void>> {
      const deleted = await settle(client.del(key), toBackendError('DEL'));
      return deleted.ok ? ok(undefined) : deleted;
    },

    close(): Promise<void> {
      return connection.disconnect();
    },
  };
}
