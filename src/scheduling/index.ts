// Scheduling: executor, worker pool and the poll loop
export type { CycleOutcome, Scheduler, SchedulerStats } from './types.js';

export { createScheduler, DEFAULT_POLL_INTERVAL_MS } from './scheduler.js';
export type { SchedulerOptions } from './scheduler.js';

export {
  createTaskExecutor,
  describeExitFailure,
  DEFAULT_COMMAND_TIMEOUT_MS,
} from './task-executor.js';
export type {
  FailureReason,
  ShellTaskExecutor,
  TaskExecutor,
  TaskExecutorOptions,
} from './task-executor.js';

export { createWorkerPool } from './worker-pool.js';
export type { WorkerPool, WorkerPoolOptions } from './worker-pool.js';
