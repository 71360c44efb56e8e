/**
 * Structured logging for the sandbox.
 *
 * Every module logs through a named child of the package logger, so one call to
 * `configureLogging()` redirects security warnings, command traces and commit
 * failures alike.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext | undefined;
}

export interface LoggerOptions {
  /** Minimum log level to output (default: 'info') */
  level?: LogLevel | undefined;
  /** Logger name, prepended to every message */
  name?: string | undefined;
  /** Custom log handler */
  handler?: ((entry: LogEntry) => void) | undefined;
}

export interface ConfigureLoggingOptions {
  /** Handler receiving every entry from the sandbox loggers */
  handler?: ((entry: LogEntry) => void) | undefined;
  /** Append log lines to this file instead of the console */
  file?: string | undefined;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

function formatEntry(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}`;
  return entry.context
    ? `${prefix}: ${entry.message} ${JSON.stringify(entry.context)}`
    : `${prefix}: ${entry.message}`;
}

function consoleHandler(entry: LogEntry): void {
  const line = formatEntry(entry);
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

/**
 * Loggers built with the default handler delegate here, so `configureLogging()`
 * also redirects loggers created at import time.
 */
let activeHandler: (entry: LogEntry) => void = consoleHandler;

function defaultHandler(entry: LogEntry): void {
  activeHandler(entry);
}

/**
 * Redirect all sandbox loggers.
 *
 * @example
 * ```typescript
 * configureLogging({ file: 'sandbox.log' });
 * configureLogging({ handler: (entry) => audit.push(entry) });
 * ```
 */
export function configureLogging(options: ConfigureLoggingOptions): void {
  if (options.handler) {
    activeHandler = options.handler;
  } else if (options.file) {
    const filePath = options.file;
    activeHandler = (entry: LogEntry) => {
      appendFileSync(filePath, `${formatEntry(entry)}\n`);
    };
  }
}

/** Restore console output. */
export function resetLogging(): void {
  activeHandler = consoleHandler;
}

/**
 * Create a logger instance.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'workspace', level: 'debug' });
 * log.warn('Path rejected', { path: 'secrets/../../x' });
 * ```
 */
export function createLogger(options: LoggerOptions = {}) {
  const { level = 'info', name, handler = defaultHandler } = options;
  const minLevel = LOG_LEVELS[level];

  function log(logLevel: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[logLevel] < minLevel) {
      return;
    }

    handler({
      level: logLevel,
      message: name ? `[${name}] ${message}` : message,
      timestamp: new Date().toISOString(),
      context,
    });
  }

  return {
    debug: (message: string, context?: LogContext) => {
      log('debug', message, context);
    },
    info: (message: string, context?: LogContext) => {
      log('info', message, context);
    },
    warn: (message: string, context?: LogContext) => {
      log('warn', message, context);
    },
    error: (message: string, context?: LogContext) => {
      log('error', message, context);
    },

    /** Create a child logger; names nest as `parent:child` */
    child: (childOptions: LoggerOptions) => {
      let childName: string | undefined;
      if (name && childOptions.name) {
        childName = `${name}:${childOptions.name}`;
      } else {
        childName = childOptions.name ?? name;
      }
      return createLogger({
        level,
        handler,
        ...childOptions,
        name: childName,
      });
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Package logger. The level comes from AGENT_SANDBOX_LOG_LEVEL.
 */
const envLogLevel = process.env['AGENT_SANDBOX_LOG_LEVEL'];
export const logger = createLogger({
  name: 'sandbox',
  level: isLogLevel(envLogLevel) ? envLogLevel : 'info',
});
