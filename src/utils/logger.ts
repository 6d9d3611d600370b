/**
 * SDK logging.
 *
 * Each session and the bus log through a child of the root `omotes` logger, so
 * entries read `[omotes:client] Submitted job`. A process picks the destination and
 * the minimum level for all of them with `configureLogging()`, typically from the
 * `LOG_LEVEL` of its worker or orchestrator settings.
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
  /** Minimum level; when omitted the process-wide level from `configureLogging()` applies */
  level?: LogLevel | undefined;
  /** Logger name/prefix */
  name?: string | undefined;
  /** Custom log handler */
  handler?: ((entry: LogEntry) => void) | undefined;
}

export interface ConfigureLoggingOptions {
  /** Receives every entry instead of the console */
  handler?: ((entry: LogEntry) => void) | undefined;
  /** Append entries to this file instead of writing them to the console */
  file?: string | undefined;
  /** Minimum level for loggers without a level of their own */
  level?: LogLevel | undefined;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Read a level from an environment value such as `LOG_LEVEL=WARNING`. Casing is
 * ignored and `warning` means `warn`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return isLogLevel(normalized) ? normalized : fallback;
}

function formatEntry(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}`;
  return entry.context
    ? `${prefix}: ${entry.message} ${JSON.stringify(entry.context)}`
    : `${prefix}: ${entry.message}`;
}

function writeToConsole(entry: LogEntry): void {
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

const envLogLevel = parseLogLevel(process.env['OMOTES_LOG_LEVEL']);

// Process-wide destination and level. Loggers read them on every call, so module
// loggers created at import time follow later `configureLogging()` calls.
let activeHandler: (entry: LogEntry) => void = writeToConsole;
let activeLevel: LogLevel = envLogLevel;

function dispatch(entry: LogEntry): void {
  activeHandler(entry);
}

/**
 * Route the entries of every SDK logger and set their minimum level.
 *
 * @example
 * ```typescript
 * const settings = loadWorkerSettings();
 * configureLogging({ file: 'worker.log', level: settings.logLevel });
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
  if (options.level) {
    activeLevel = options.level;
  }
}

/**
 * Back to console output at the `OMOTES_LOG_LEVEL` level. Used by tests.
 */
export function resetLogging(): void {
  activeHandler = writeToConsole;
  activeLevel = envLogLevel;
}

/**
 * Create a logger. SDK modules use `logger.child({ name })` instead.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'grow-worker', level: 'debug' });
 * log.info('Task started', { jobId: job.id });
 * ```
 */
export function createLogger(options: LoggerOptions = {}) {
  const { level, name, handler = dispatch } = options;

  function log(logLevel: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[logLevel] < LOG_LEVELS[level ?? activeLevel]) {
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

    /** Logger named `<parent>:<child>`, sharing this logger's level and handler */
    child: (childOptions: LoggerOptions) => {
      const childName =
        name && childOptions.name ? `${name}:${childOptions.name}` : (childOptions.name ?? name);
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
 * Root SDK logger. Module loggers are its children (`omotes:client`, `omotes:worker`, ...).
 */
export const logger = createLogger({ name: 'omotes' });
