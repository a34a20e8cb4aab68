/**
 * Task file loader — reads the YAML task definitions and turns every valid
 * record into a {@link Task}. Invalid records are skipped, not fatal.
 */
import { readFile } from 'node:fs/promises';

import { load, YAMLException } from 'js-yaml';

import { TaskDefinitionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { fromTaskRecord } from '@/core/types.js';
import type { Task } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

import { ConfigError } from './loader.js';
import { taskFileSchema, taskRecordSchema } from './schema.js';

export const DEFAULT_TASKS_FILE = 'tasks.yaml';

// ─── Parsing ────────────────────────────────────────────────────

export interface ParsedTaskDefinitions {
  /** Valid tasks in document order. */
  tasks: Task[];
  /** One error per skipped record. */
  rejected: TaskDefinitionError[];
}

/**
 * Validate each record of a parsed task document.
 * Records missing a name or command, with a bad interval, or repeating an
 * earlier name are rejected; everything else loads in document order.
 */
export function parseTaskDefinitions(
  document: unknown,
): Result<ParsedTaskDefinitions, ConfigError> {
  // An empty file parses to null/undefined
  if (document === null || document === undefined) {
    return ok({ tasks: [], rejected: [] });
  }

  const layout = taskFileSchema.safeParse(document);
  if (!layout.success) {
    return err(
      new ConfigError('Task file must be a mapping with a "tasks" list', {
        issues: layout.error.issues.map((issue) => issue.message),
      }),
    );
  }

  const tasks: Task[] = [];
  const rejected: TaskDefinitionError[] = [];
  const seen = new Set<string>();

  (layout.data.tasks ?? []).forEach((item, index) => {
    const record = taskRecordSchema.safeParse(item);
    if (!record.success) {
      rejected.push(
        new TaskDefinitionError('Invalid task definition', {
          index,
          definition: item,
          issues: record.error.issues.map(
            (issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`,
          ),
        }),
      );
      return;
    }

    if (seen.has(record.data.name)) {
      rejected.push(
        new TaskDefinitionError(`Duplicate task name "${record.data.name}"`, {
          index,
          definition: item,
        }),
      );
      return;
    }

    seen.add(record.data.name);
    tasks.push(fromTaskRecord(record.data));
  });

  return ok({ tasks, rejected });
}

// ─── Loader ─────────────────────────────────────────────────────

/**
 * Load tasks from a YAML file. A missing or unparsable file is a
 * {@link ConfigError}; individual bad records are logged and skipped.
 */
export async function loadTaskDefinitions(
  filePath: string,
  logger: Logger,
): Promise<Result<Task[], ConfigError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    return err(
      new ConfigError(
        code === 'ENOENT' ? `Tasks file not found: ${filePath}` : `Failed to read tasks file: ${filePath}`,
        { filePath, errorCode: code },
      ),
    );
  }

  let document: unknown;
  try {
    document = load(content, { filename: filePath });
  } catch (error) {
    const reason = error instanceof YAMLException ? error.reason : String(error);
    return err(new ConfigError(`Error parsing YAML: ${reason}`, { filePath }));
  }

  const parsed = parseTaskDefinitions(document);
  if (!parsed.ok) {
    return err(
      new ConfigError(parsed.error.message, { filePath, ...parsed.error.context }),
    );
  }

  for (const rejection of parsed.value.rejected) {
    logger.warn(rejection.message, {
      component: 'task-file',
      filePath,
      ...rejection.context,
    });
  }

  logger.info(`Loaded ${parsed.value.tasks.length} tasks from '${filePath}'`, {
    component: 'task-file',
    filePath,
    skipped: parsed.value.rejected.length,
  });

  return ok(parsed.value.tasks);
}
