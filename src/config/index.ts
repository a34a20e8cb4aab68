// ─── Types ──────────────────────────────────────────────────────
export type {
  ChannelConfig,
  DiscordChannelConfig,
  Settings,
  SmtpChannelConfig,
  TelegramChannelConfig,
} from './types.js';
export type { ParsedSettings, SettingsInput } from './schema.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  MIN_TIMEOUT_SECONDS,
  settingsSchema,
  taskFileSchema,
  taskRecordSchema,
  timeoutSecondsSchema,
} from './schema.js';

// ─── Loaders ────────────────────────────────────────────────────
export {
  ConfigError,
  SETTINGS_ENV_VARS,
  loadSettings,
  parseSettings,
  resolveChannelConfig,
  resolveEnvVars,
} from './loader.js';
export type { LoadSettingsOptions } from './loader.js';
export { DEFAULT_TASKS_FILE, loadTaskDefinitions, parseTaskDefinitions } from './task-file.js';
export type { ParsedTaskDefinitions } from './task-file.js';
