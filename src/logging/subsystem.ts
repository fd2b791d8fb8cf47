/**
 * Subsystem Logging
 *
 * Tagged console loggers shared by every devtelemetry module.
 *
 * Usage:
 *   const log = createSubsystemLogger('devices/amd');
 *   log.info('AMD backend started', { gpus: 2 });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.DEVTELEMETRY_LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** Process-wide minimum level, adjustable at runtime */
let globalLogLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Flattens an unknown thrown value into a loggable message
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function normalizeMeta(meta: LogMeta): LogMeta {
  const normalized: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    normalized[key] = value instanceof Error ? value.message : value;
  }
  return normalized;
}

/**
 * Creates a logger whose lines are prefixed with the subsystem tag
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const prefix = `[${subsystem}]`;

  const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[globalLogLevel]) {
      return;
    }
    const args: unknown[] = meta ? [prefix, message, normalizeMeta(meta)] : [prefix, message];
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
      case 'fatal':
        console.error(...args);
        break;
    }
  };

  return {
    subsystem,
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    fatal: (message, meta) => write('fatal', message, meta),
  };
}
