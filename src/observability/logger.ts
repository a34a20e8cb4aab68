import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for Qzark. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/** Adapt pino's `(object, msg)` call order to `(msg, context)`. */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => { instance.debug(context ?? {}, msg); },
    info: (msg, context) => { instance.info(context ?? {}, msg); },
    warn: (msg, context) => { instance.warn(context ?? {}, msg); },
    error: (msg, context) => { instance.error(context ?? {}, msg); },
    fatal: (msg, context) => { instance.fatal(context ?? {}, msg); },
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: LogLevel; name?: string }): Logger {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();

  const pinoInstance = pino({
    name: options?.name ?? 'qzark',
    level: options?.level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'password',
        'botToken',
        'webhookUrl',
        '*.password',
        '*.botToken',
        '*.webhookUrl',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
