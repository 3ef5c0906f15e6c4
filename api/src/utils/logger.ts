/**
 * Structured Logger
 *
 * JSON lines with levels: debug, info, warn, error
 *
 * - Minimum level comes from LOG_LEVEL, else `info` in production and `debug` elsewhere
 * - `child()` binds fields (request id, user id) that are repeated on every entry
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, bindings: LogContext, context?: LogContext) {
  return JSON.stringify({
    level,
    msg: message,
    ts: new Date().toISOString(),
    ...bindings,
    ...context,
  });
}

function createLogger(bindings: LogContext = {}): Logger {
  const write = (level: LogLevel, sink: (line: string) => void) =>
    (message: string, context?: LogContext) => {
      if (!shouldLog(level)) return;
      sink(formatEntry(level, message, bindings, context));
    };

  return {
    debug: write('debug', (line) => console.debug(line)),
    info: write('info', (line) => console.info(line)),
    warn: write('warn', (line) => console.warn(line)),
    error: write('error', (line) => console.error(line)),
    child(extra: LogContext) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const logger = createLogger({ service: 'blog-api' });
