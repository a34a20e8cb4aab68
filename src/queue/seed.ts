/**
 * Startup reconciliation between the task file and the queue.
 *
 * The task file is authoritative. Tasks already persisted keep their place
 * in the rotation (with the file's current definition), tasks removed from
 * the file are dropped, and new tasks are appended in document order.
 */
import { ok } from '@/core/result.js';
import type { Task } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { QueueResult, TaskStore } from './types.js';

export interface SeedSummary {
  /** Persisted tasks kept in their previous order. */
  kept: string[];
  /** Tasks appended from the task file. */
  added: string[];
  /** Persisted entries dropped (no longer defined, or duplicates). */
  dropped: string[];
}

/** Compute the queue order that reconciles persisted and loaded tasks. */
export function reconcileQueue(
  persisted: readonly Task[],
  loaded: readonly Task[],
): { order: Task[]; summary: SeedSummary } {
  const byName = new Map(loaded.map((task) => [task.name, task]));
  const placed = new Set<string>();
  const order: Task[] = [];
  const summary: SeedSummary = { kept: [], added: [], dropped: [] };

  for (const entry of persisted) {
    const current = byName.get(entry.name);
    if (!current || placed.has(entry.name)) {
      summary.dropped.push(entry.name);
      continue;
    }
    placed.add(entry.name);
    order.push(current);
    summary.kept.push(entry.name);
  }

  for (const task of loaded) {
    if (placed.has(task.name)) continue;
    placed.add(task.name);
    order.push(task);
    summary.added.push(task.name);
  }

  return { order, summary };
}

/**
 * Seed the store with the loaded tasks, reconciling with whatever the
 * backend already holds. Any backend error aborts seeding.
 */
export async function seedTaskStore(
  store: TaskStore,
  tasks: readonly Task[],
  logger: Logger,
): Promise<QueueResult<SeedSummary>> {
  const existing = await store.snapshot();
  if (!existing.ok) return existing;

  const { order, summary } = reconcileQueue(existing.value, tasks);

  const cleared = await store.clear();
  if (!cleared.ok) return cleared;

  for (const task of order) {
    const pushed = await store.push(task);
    if (!pushed.ok) return pushed;
  }

  logger.info('Task queue seeded', {
    component: 'task-store',
    backend: store.backend,
    kept: summary.kept.length,
    added: summary.added.length,
    dropped: summary.dropped,
  });

  return ok(summary);
}
