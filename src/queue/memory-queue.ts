import { ok } from '@/core/result.js';
import type { Task } from '@/core/types.js';
import type { QueueResult, TaskStore } from './types.js';

/**
 * Create an in-process FIFO task store. Valid for the lifetime of one process.
 */
export function createMemoryTaskStore(initial: readonly Task[] = []): TaskStore {
  const queue: Task[] = [...initial];

  const append = (task: Task): Promise<QueueResult<void>> => {
    queue.push(task);
    return Promise.resolve(ok(undefined));
  };

  return {
    backend: 'memory',

    push: append,

    pop(): Promise<QueueResult<Task | null>> {
      return Promise.resolve(ok(queue.shift() ?? null));
    },

    requeue: append,

    snapshot(): Promise<QueueResult<Task[]>> {
      return Promise.resolve(ok([...queue]));
    },

    clear(): Promise<QueueResult<void>> {
      queue.length = 0;
      return Promise.resolve(ok(undefined));
    },

    close(): Promise<void> {
      return Promise.resolve();
    },
  };
}
