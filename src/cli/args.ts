/**
 * Command-line flags for the qzark process.
 *
 * Usage: qzark [--tasks <file>] [--config <file>] [--timeout <10-300>]
 *              [--log-level <level>] [--queue-backend memory|redis]
 *              [--redis-url <url>] [--redis-key <key>]
 *              [--concurrency <n>] [--poll-interval-ms <n>]
 */
import { z } from 'zod';

import { ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { timeoutSecondsSchema } from '@/config/schema.js';
import { DEFAULT_TASKS_FILE } from '@/config/task-file.js';
import type { LogLevel } from '@/observability/types.js';
import { DEFAULT_REDIS_URL } from '@/queue/factory.js';
import { DEFAULT_REDIS_KEY } from '@/queue/redis-queue.js';
import type { QueueBackend } from '@/queue/types.js';
import { DEFAULT_POLL_INTERVAL_MS } from '@/scheduling/scheduler.js';

// ─── Types ──────────────────────────────────────────────────────

export interface CliOptions {
  tasksFile: string;
  configFile?: string;
  /** Overrides the settings timeout when given. */
  timeoutSeconds?: number;
  logLevel?: LogLevel;
  queueBackend: QueueBackend;
  redisUrl: string;
  redisKey: string;
  concurrency: number;
  pollIntervalMs: number;
  help: boolean;
}

export const USAGE = `Usage: qzark [options]

Options:
  --tasks <file>            YAML task definitions (default: ${DEFAULT_TASKS_FILE})
  --config <file>           JSON settings file (default: environment variables)
  --timeout <seconds>       Global timeout, 10-300 (default: 50)
  --log-level <level>       debug | info | warn | error (default: info)
  --queue-backend <name>    memory | redis (default: memory)
  --redis-url <url>         Redis connection URL (default: ${DEFAULT_REDIS_URL})
  --redis-key <key>         Redis list key (default: ${DEFAULT_REDIS_KEY})
  --concurrency <n>         Maximum simultaneous task runs (default: 1)
  --poll-interval-ms <n>    Pause between scheduling cycles (default: ${DEFAULT_POLL_INTERVAL_MS})
  -h, --help                Show this help`;

// ─── Schema ─────────────────────────────────────────────────────

const cliSchema = z.object({
  tasksFile: z.string().min(1).default(DEFAULT_TASKS_FILE),
  configFile: z.string().min(1).optional(),
  timeoutSeconds: timeoutSecondsSchema.optional(),
  logLevel: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional(),
  queueBackend: z.enum(['memory', 'redis']).default('memory'),
  redisUrl: z
    .string()
    .url('Invalid Redis URL')
    .refine((url) => /^rediss?:\/\//.test(url), 'Redis URL must start with redis:// or rediss://')
    .default(DEFAULT_REDIS_URL),
  redisKey: z.string().min(1).default(DEFAULT_REDIS_KEY),
  concurrency: z.coerce.number().int().min(1).max(64).default(1),
  pollIntervalMs: z.coerce.number().int().min(10).default(DEFAULT_POLL_INTERVAL_MS),
  help: z.boolean().default(false),
});

/** Flag name → option key, for flags that take a value. */
const VALUE_FLAGS: Record<string, keyof CliOptions> = {
  '--tasks': 'tasksFile',
  '--config': 'configFile',
  '--timeout': 'timeoutSeconds',
  '--log-level': 'logLevel',
  '--queue-backend': 'queueBackend',
  '--redis-url': 'redisUrl',
  '--redis-key': 'redisKey',
  '--concurrency': 'concurrency',
  '--poll-interval-ms': 'pollIntervalMs',
};

// ─── Parser ─────────────────────────────────────────────────────

/**
 * Parse process arguments (without the node and script entries).
 * Accepts `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): Result<CliOptions, ValidationError> {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      raw['help'] = true;
      continue;
    }

    const [flag = arg, inlineValue] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const key = VALUE_FLAGS[flag];
    if (!key) {
      return err(new ValidationError(`Unknown argument: ${arg}`, { argument: arg }));
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      return err(new ValidationError(`Missing value for ${flag}`, { flag }));
    }
    if (inlineValue === undefined) i++;

    raw[key] = value;
  }

  const validation = cliSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    return err(
      new ValidationError(
        first ? `Invalid ${first.path}: ${first.message}` : 'Invalid arguments',
        { issues },
      ),
    );
  }

  return ok(validation.data);
}
