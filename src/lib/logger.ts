/**
 * Structured Logger
 *
 * JSON lines with a level, the emitting module and structured metadata.
 * Every engine component accepts a Logger so tests can inject a silent one.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

function resolveLevel(): LogLevel {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(requested)) return requested;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[resolveLevel()];
}

function formatEntry(level: LogLevel, module: string, message: string, meta?: Record<string, unknown>): LogEntry {
  return {
    level,
    module,
    message,
    timestamp: new Date().toISOString(),
    ...meta,
  };
}

function emit(entry: LogEntry): void {
  const output = JSON.stringify(entry);
  switch (entry.level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      console.log(output);
      break;
  }
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subModule: string): Logger;
}

/**
 * Create a logger for a specific module
 */
export function createLogger(module: string): Logger {
  const log = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    if (!shouldLog(level)) return;
    emit(formatEntry(level, module, message, meta));
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child(subModule: string): Logger {
      return createLogger(`${module}:${subModule}`);
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/**
 * Serialize an error for structured logging
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'),
    };
    if ('code' in error && typeof error.code === 'string') {
      serialized.errorCode = error.code;
    }
    return serialized;
  }
  return { errorMessage: String(error) };
}
