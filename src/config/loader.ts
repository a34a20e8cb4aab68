/**
 * Settings loader — reads an optional JSON settings file (or the process
 * environment), validates with Zod, and resolves environment variable
 * placeholders.
 */
import { readFile } from 'node:fs/promises';

import { QzarkError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { settingsSchema } from './schema.js';
import type { ParsedSettings } from './schema.js';
import type { ChannelConfig, Settings } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error raised when configuration loading or validation fails.
 */
export class ConfigError extends QzarkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves `${VAR_NAME}` placeholders in a JSON value.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Environment Mapping ────────────────────────────────────────

/** Environment variable backing each settings field. */
export const SETTINGS_ENV_VARS = {
  timeout: 'QZARK_TIMEOUT',
  telegramBotToken: 'TELEGRAM_BOT_TOKEN',
  telegramChatId: 'TELEGRAM_CHAT_ID',
  discordWebhookUrl: 'DISCORD_WEBHOOK_URL',
  smtpServer: 'SMTP_SERVER',
  smtpPort: 'SMTP_PORT',
  smtpUsername: 'SMTP_USERNAME',
  smtpPassword: 'SMTP_PASSWORD',
  smtpFromEmail: 'SMTP_FROM_EMAIL',
  smtpToEmail: 'SMTP_TO_EMAIL',
} as const satisfies Record<keyof ParsedSettings, string>;

function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const [field, varName] of Object.entries(SETTINGS_ENV_VARS)) {
    raw[field] = env[varName];
  }
  return raw;
}

// ─── Channel Resolution ─────────────────────────────────────────

/**
 * Derive the enabled channels from flat settings. Telegram needs a token
 * and chat id, Discord a webhook URL, SMTP a server plus both addresses.
 */
export function resolveChannelConfig(parsed: ParsedSettings): ChannelConfig {
  const channels: ChannelConfig = {};

  if (parsed.telegramBotToken && parsed.telegramChatId) {
    channels.telegram = {
      botToken: parsed.telegramBotToken,
      chatId: parsed.telegramChatId,
    };
  }

  if (parsed.discordWebhookUrl) {
    channels.discord = { webhookUrl: parsed.discordWebhookUrl };
  }

  if (parsed.smtpServer && parsed.smtpFromEmail && parsed.smtpToEmail) {
    channels.smtp = {
      server: parsed.smtpServer,
      port: parsed.smtpPort ?? 25,
      username: parsed.smtpUsername,
      password: parsed.smtpPassword,
      fromEmail: parsed.smtpFromEmail,
      toEmail: parsed.smtpToEmail,
    };
  }

  return channels;
}

// ─── Settings Loader ────────────────────────────────────────────

export interface LoadSettingsOptions {
  /** JSON settings file. When omitted, settings come from the environment. */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate raw settings and freeze them into a {@link Settings} value.
 */
export function parseSettings(raw: unknown): Result<Settings, ConfigError> {
  const validation = settingsSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Settings validation failed', { issues }));
  }

  return ok(
    Object.freeze({
      timeoutSeconds: validation.data.timeout,
      channels: Object.freeze(resolveChannelConfig(validation.data)),
    }),
  );
}

/**
 * Loads and validates notification settings.
 *
 * 1. Reads the JSON file, or maps the environment variables
 * 2. Resolves `${VAR}` placeholders (file only)
 * 3. Validates against the Zod schema
 */
export async function loadSettings(
  options: LoadSettingsOptions = {},
): Promise<Result<Settings, ConfigError>> {
  const env = options.env ?? process.env;
  const { filePath } = options;

  if (filePath === undefined) {
    return parseSettings(settingsFromEnv(env));
  }

  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return err(new ConfigError(`Settings file not found: ${filePath}`, { filePath }));
    }
    return err(
      new ConfigError(`Failed to read settings file: ${filePath}`, {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in settings file', { filePath }));
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return parseSettings(resolved);
}
