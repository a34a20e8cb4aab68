import { fromTaskRecord } from '@/core/types.js';
import type { Task } from '@/core/types.js';

/** Build a task with sensible test defaults. */
export function makeTask(overrides: Partial<Task> & Pick<Task, 'name'>): Task {
  return fromTaskRecord({
    name: overrides.name,
    interval_seconds: overrides.intervalSeconds ?? 60,
    shell_command: overrides.command ?? 'true',
  });
}
