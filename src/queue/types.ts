/**
 * TaskStore — the queue holding every task between scheduling cycles.
 *
 * Two backends share one contract:
 * - `memory`: in-process FIFO, lost on restart
 * - `redis`: a Redis list of JSON task records, survives restarts
 *
 * Every operation reports backend trouble as a `QueueBackendError`
 * result instead of throwing, so the scheduler can skip a cycle.
 */
import type { QueueBackendError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { Task } from '@/core/types.js';

export type QueueBackend = 'memory' | 'redis';

export type QueueResult<T> = Result<T, QueueBackendError>;

export interface TaskStore {
  readonly backend: QueueBackend;

  /** Append a task to the tail. Used to seed the queue at startup. */
  push(task: Task): Promise<QueueResult<void>>;

  /** Remove and return the head, or `null` when the queue is empty. Never blocks. */
  pop(): Promise<QueueResult<Task | null>>;

  /** Put a processed task back at the tail. */
  requeue(task: Task): Promise<QueueResult<void>>;

  /** List queued tasks head-to-tail without removing them. */
  snapshot(): Promise<QueueResult<Task[]>>;

  /** Remove every queued task. */
  clear(): Promise<QueueResult<void>>;

  /** Release backend resources. */
  close(): Promise<void>;
}
