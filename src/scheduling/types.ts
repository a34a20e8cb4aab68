/**
 * Poll-cycle outcomes and the scheduler contract.
 */
import type { QueueBackendError } from '@/core/errors.js';

export type CycleOutcome =
  /** The queue was empty. */
  | { kind: 'idle' }
  /** Popped task is not due yet; requeued untouched. */
  | { kind: 'not-due'; taskName: string; remainingMs: number }
  /** Popped entry duplicates a task that is still running; dropped. */
  | { kind: 'duplicate'; taskName: string }
  /** Due task handed to the worker pool. */
  | { kind: 'dispatched'; taskName: string }
  /** The queue backend failed; the cycle was skipped. */
  | { kind: 'store-error'; error: QueueBackendError };

export interface SchedulerStats {
  cycles: number;
  executions: number;
  failures: number;
  storeErrors: number;
}

export interface Scheduler {
  /** Start the poll loop in the background. */
  start(): void;

  /**
   * Ask the loop to stop after the current cycle and wait for running
   * executions to finish.
   */
  stop(): Promise<void>;

  /** Run a single poll cycle without pausing. */
  runCycle(): Promise<CycleOutcome>;

  /** Wait until every dispatched execution has finished. */
  drain(): Promise<void>;

  readonly isRunning: boolean;

  /** Epoch ms of the task's last execution start, if it ever ran. */
  lastRunAt(taskName: string): number | undefined;

  /** Names of tasks currently executing. */
  inFlight(): string[];

  stats(): SchedulerStats;
}
