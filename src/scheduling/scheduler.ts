/**
 * Scheduler — the polling loop behind every task run.
 *
 * Each cycle pops one task, checks whether its interval has elapsed since
 * its last start, hands due tasks to a bounded worker pool, alerts the
 * notification fanout on failure, and always puts the task back in the
 * queue. The loop pauses `pollIntervalMs` between cycles, so the finest
 * achievable interval is bounded by the pause times the queue length.
 */
import { setTimeout as sleepFor } from 'node:timers/promises';

import { errorMessage } from '@/core/errors.js';
import type { Task } from '@/core/types.js';
import type { NotificationFanout } from '@/notifications/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskStore } from '@/queue/types.js';
import type { TaskExecutor } from './task-executor.js';
import type { CycleOutcome, Scheduler, SchedulerStats } from './types.js';
import { createWorkerPool } from './worker-pool.js';

export const DEFAULT_POLL_INTERVAL_MS = 1_000;

// ─── Options ────────────────────────────────────────────────────

export interface SchedulerOptions {
  store: TaskStore;
  executor: TaskExecutor;
  notifier: NotificationFanout;
  logger: Logger;
  /** Pause between cycles. Defaults to 1 second. */
  pollIntervalMs?: number;
  /** Maximum simultaneous executions. Defaults to 1 (fully serialized). */
  concurrency?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
  /** Pause implementation; must resolve early when the signal aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the scheduler. Nothing runs until `start()` or `runCycle()`. */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const {
    store,
    executor,
    notifier,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    concurrency = 1,
    now = Date.now,
    sleep = defaultSleep,
  } = options;
  const logger = options.logger.child({ component: 'scheduler' });

  const lastRun = new Map<string, number>();
  const inFlight = new Set<string>();
  /** Tasks whose requeue failed; retried before the next pop. */
  const pendingRequeues: Task[] = [];
  const counters: SchedulerStats = { cycles: 0, executions: 0, failures: 0, storeErrors: 0 };

  const pool = createWorkerPool({
    concurrency,
    onError: (error) => {
      logger.error('Worker job crashed', {
        component: 'scheduler',
        error: errorMessage(error),
      });
    },
  });

  let stopping = false;
  let loop: Promise<void> | null = null;
  let pauseController = new AbortController();

  // ─── Queue Helpers ──────────────────────────────────────────

  async function requeue(task: Task): Promise<void> {
    const result = await store.requeue(task);
    if (result.ok) return;

    counters.storeErrors += 1;
    pendingRequeues.push(task);
    logger.error('Failed to requeue task, will retry next cycle', {
      component: 'scheduler',
      taskName: task.name,
      error: result.error.message,
    });
  }

  /** Yields a store-error outcome while the backend keeps failing. */
  async function flushPendingRequeues(): Promise<CycleOutcome | null> {
    while (pendingRequeues.length > 0) {
      const [task] = pendingRequeues;
      if (!task) break;

      const result = await store.requeue(task);
      if (!result.ok) {
        counters.storeErrors += 1;
        logger.warn('Requeue retry failed', {
          component: 'scheduler',
          taskName: task.name,
          pending: pendingRequeues.length,
          error: result.error.message,
        });
        return { kind: 'store-error', error: result.error };
      }
      pendingRequeues.shift();
    }
    return null;
  }

  // ─── Execution ──────────────────────────────────────────────

  async function execute(task: Task): Promise<void> {
    lastRun.set(task.name, now());
    counters.executions += 1;

    try {
      const result = await executor.run(task);
      if (result.status === 'failure') {
        counters.failures += 1;
        await notifier.notify(task.name, result.error.message);
      }
    } catch (error) {
      logger.error('Unexpected error while processing task', {
        component: 'scheduler',
        taskName: task.name,
        error: errorMessage(error),
      });
    } finally {
      // The guard is cleared before the task re-enters the queue
      inFlight.delete(task.name);
      await requeue(task);
    }
  }

  // ─── Cycle ──────────────────────────────────────────────────

  async function runCycle(): Promise<CycleOutcome> {
    counters.cycles += 1;

    const blocked = await flushPendingRequeues();
    if (blocked) return blocked;

    const popped = await store.pop();
    if (!popped.ok) {
      counters.storeErrors += 1;
      logger.error('Failed to pop task, skipping cycle', {
        component: 'scheduler',
        error: popped.error.message,
      });
      return { kind: 'store-error', error: popped.error };
    }

    const task = popped.value;
    if (!task) return { kind: 'idle' };

    if (inFlight.has(task.name)) {
      logger.warn('Dropped duplicate queue entry for a running task', {
        component: 'scheduler',
        taskName: task.name,
      });
      return { kind: 'duplicate', taskName: task.name };
    }

    const previous = lastRun.get(task.name);
    const elapsedMs = previous === undefined ? Infinity : now() - previous;
    const intervalMs = task.intervalSeconds * 1000;

    if (elapsedMs < intervalMs) {
      await requeue(task);
      return { kind: 'not-due', taskName: task.name, remainingMs: intervalMs - elapsedMs };
    }

    inFlight.add(task.name);
    await pool.submit(() => execute(task));
    return { kind: 'dispatched', taskName: task.name };
  }

  // ─── Loop ───────────────────────────────────────────────────

  async function runLoop(): Promise<void> {
    logger.info('Scheduler started', {
      component: 'scheduler',
      backend: store.backend,
      pollIntervalMs,
      concurrency,
    });

    while (!stopping) {
      try {
        await runCycle();
      } catch (error) {
        logger.error('Poll cycle failed', {
          component: 'scheduler',
          error: errorMessage(error),
        });
      }
      if (stopping) break;
      await sleep(pollIntervalMs, pauseController.signal);
    }

    await pool.drain();
    await flushPendingRequeues();

    logger.info('Scheduler stopped', { component: 'scheduler', ...counters });
  }

  return {
    start(): void {
      if (loop) return;
      stopping = false;
      pauseController = new AbortController();
      loop = runLoop()
        .catch((error: unknown) => {
          logger.fatal('Scheduler loop crashed', {
            component: 'scheduler',
            error: errorMessage(error),
          });
        })
        .finally(() => {
          loop = null;
        });
    },

    async stop(): Promise<void> {
      stopping = true;
      pauseController.abort();
      if (loop) {
        await loop;
      } else {
        await pool.drain();
      }
    },

    runCycle,

    drain: () => pool.drain(),

    get isRunning(): boolean {
      return loop !== null;
    },

    lastRunAt: (taskName) => lastRun.get(taskName),

    inFlight: () => [...inFlight],

    stats: () => ({ ...counters }),
  };
}
