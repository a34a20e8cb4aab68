/**
 * Zod schemas for the settings file / environment and for task records.
 */
import { z } from 'zod';

import { DEFAULT_INTERVAL_SECONDS } from '@/core/types.js';

/** Blank strings (unset `.env` entries) count as absent. */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

// ─── Settings ───────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_SECONDS = 50;
export const MIN_TIMEOUT_SECONDS = 10;
export const MAX_TIMEOUT_SECONDS = 300;

export const timeoutSecondsSchema = z.coerce
  .number()
  .int('Timeout must be a whole number of seconds')
  .min(MIN_TIMEOUT_SECONDS, `Timeout must be between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS}`)
  .max(MAX_TIMEOUT_SECONDS, `Timeout must be between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS}`);

/**
 * Flat notification settings. Every field is optional; a channel is enabled
 * only when all of its required fields are present.
 */
export const settingsSchema = z.object({
  timeout: z.preprocess(
    blankToUndefined,
    timeoutSecondsSchema.default(DEFAULT_TIMEOUT_SECONDS),
  ),

  telegramBotToken: optionalText,
  // Chat ids are numeric in Telegram and often written unquoted in JSON
  telegramChatId: z.preprocess(
    (value) => (typeof value === 'number' ? String(value) : blankToUndefined(value)),
    z.string().optional(),
  ),

  discordWebhookUrl: z.preprocess(
    blankToUndefined,
    z.string().url('Invalid Discord webhook URL').optional(),
  ),

  smtpServer: optionalText,
  smtpPort: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(65_535, 'SMTP port must be between 1 and 65535').optional(),
  ),
  smtpUsername: optionalText,
  smtpPassword: optionalText,
  // Addresses go to nodemailer as-is, so `Name <user@host>` works too
  smtpFromEmail: optionalText,
  smtpToEmail: optionalText,
});

export type SettingsInput = z.input<typeof settingsSchema>;
export type ParsedSettings = z.output<typeof settingsSchema>;

// ─── Task Records ───────────────────────────────────────────────

/**
 * One entry of the task file, and the JSON shape stored by the
 * persistent queue.
 */
export const taskRecordSchema = z.object({
  name: z.string().trim().min(1, 'Task name cannot be empty'),
  interval_seconds: z
    .number()
    .int('interval_seconds must be an integer')
    .positive('interval_seconds must be positive')
    .default(DEFAULT_INTERVAL_SECONDS),
  shell_command: z
    .string()
    .refine((command) => command.trim().length > 0, 'shell_command cannot be empty'),
});

/** Top-level layout of the task file. */
export const taskFileSchema = z
  .object({
    tasks: z.array(z.unknown()).nullish(),
  })
  .passthrough();
