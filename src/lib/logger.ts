/**
 * Logger module that writes ONLY to stderr.
 *
 * Library code must never write to stdout: consumers may be piping their own
 * output through it.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogData {
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getConfiguredLevel()];
}

function formatMessage(level: LogLevel, scope: string | undefined, msg: string, data?: LogData): string {
  const timestamp = new Date().toISOString();
  const levelUpper = level.toUpperCase().padEnd(5);
  const prefix = scope ? `${timestamp} [${levelUpper}] (${scope})` : `${timestamp} [${levelUpper}]`;

  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${msg} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${msg}`;
}

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

/**
 * Creates a logger whose lines are tagged with `scope`.
 *
 * Respects LOG_LEVEL (debug, info, warn, error); only messages at or above the
 * configured level are emitted. The level is read on every call so tests can
 * change it without reloading modules.
 */
export function createLogger(scope?: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: LogData): void => {
    if (shouldLog(level)) {
      console.error(formatMessage(level, scope, msg, data));
    }
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}

/**
 * Default logger instance.
 *
 * Usage:
 *   logger.debug('Request sent', { verb: 'get', url });
 *   logger.warn('Response body is not JSON');
 */
export const logger: Logger = createLogger();

export type { LogLevel, LogData };
