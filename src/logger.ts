/**
 * Leveled console logger.
 *
 * Entries look like `[2026-01-01T00:00:00.000Z] [INFO ] [policy] message {"key":"value"}`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
}

let defaultLevel: LogLevel = 'info';

/** Set the level used by loggers created without an explicit one */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function formatLogEntry(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${scope}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }

  return entry;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function getConsoleMethod(level: Exclude<LogLevel, 'silent'>): typeof console.log {
  switch (level) {
    case 'debug':
      return console.debug;
    case 'info':
      return console.info;
    case 'warn':
      return console.warn;
    case 'error':
      return console.error;
  }
}

export function createLogger(scopeOrOptions: string | LoggerOptions = {}): Logger {
  const options = typeof scopeOrOptions === 'string' ? { scope: scopeOrOptions } : scopeOrOptions;
  const scope = options.scope ?? 'topic-cache';

  function log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    const threshold = options.level ?? defaultLevel;
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold]) {
      return;
    }
    getConsoleMethod(level)(formatLogEntry(level, scope, message, context));
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (childScope) => createLogger({ ...options, scope: `${scope}:${childScope}` }),
  };
}

/** Logger that drops everything; used by tests */
export const silentLogger: Logger = createLogger({ level: 'silent' });
