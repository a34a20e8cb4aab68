import type { TaskExecutionError } from './errors.js';

// ─── Task ───────────────────────────────────────────────────────

/** Interval applied when a task definition omits `interval_seconds`. */
export const DEFAULT_INTERVAL_SECONDS = 60;

/** A named, interval-scheduled shell command. Immutable once loaded. */
export interface Task {
  readonly name: string;
  readonly intervalSeconds: number;
  readonly command: string;
}

/**
 * Wire shape of a task, shared by the task file and the persistent queue.
 */
export interface TaskRecord {
  name: string;
  interval_seconds: number;
  shell_command: string;
}

/** Convert a task into its wire shape. */
export function toTaskRecord(task: Task): TaskRecord {
  return {
    name: task.name,
    interval_seconds: task.intervalSeconds,
    shell_command: task.command,
  };
}

/** Build a task from its wire shape. */
export function fromTaskRecord(record: TaskRecord): Task {
  return Object.freeze({
    name: record.name,
    intervalSeconds: record.interval_seconds,
    command: record.shell_command,
  });
}

// ─── Execution ──────────────────────────────────────────────────

export type ExecutionStatus = 'success' | 'failure';

interface ExecutionOutput {
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Outcome of running one task's command. Never persisted. */
export type ExecutionResult =
  | (ExecutionOutput & { status: 'success'; exitCode: 0 })
  | (ExecutionOutput & {
      status: 'failure';
      /** Undefined when the process never started or was killed. */
      exitCode?: number;
      /** Its message is what the failure notification reports. */
      error: TaskExecutionError;
    });
