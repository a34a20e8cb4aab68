// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  taskName?: string;
  channel?: string;
  component: string;
  [key: string]: unknown;
}
