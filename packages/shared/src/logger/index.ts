/**
 * Structured logging module using pino
 *
 * Provides consistent, structured logging across the engine and the CLI.
 * In development, logs are pretty-printed; in production, they're JSON.
 */

import pino from 'pino';

/** Log levels supported by the logger */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Context that can be attached to log messages */
export interface LogContext {
  [key: string]: unknown;
}

/** Configuration options for creating a logger */
export interface LoggerOptions {
  /** Name of the component */
  name: string;
  /** Minimum log level to output */
  level?: LogLevel;
  /** Additional base context to include in all logs */
  base?: LogContext;
}

function isDevelopment(): boolean {
  const env = process.env['NODE_ENV'];
  return env !== 'production' && env !== 'test';
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return value;
    default:
      return null;
  }
}

/** Get the log level from environment or default */
function getLogLevel(): LogLevel {
  const envLevel = parseLogLevel(process.env['LOG_LEVEL']);
  if (envLevel !== null) {
    return envLevel;
  }
  if (process.env['NODE_ENV'] === 'test') return 'silent';
  return isDevelopment() ? 'debug' : 'info';
}

/**
 * Create a configured pino logger instance
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  const level = options.level ?? getLogLevel();

  const loggerOptions: pino.LoggerOptions = {
    name: options.name,
    level,
    base: {
      ...options.base,
      env: process.env['NODE_ENV'] ?? 'development',
    },
  };

  // Logs go to stderr so CLI output on stdout stays machine-readable
  if (isDevelopment()) {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(loggerOptions, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function childLogger(
  parent: pino.Logger,
  context: LogContext
): pino.Logger {
  return parent.child(context);
}

let defaultLogger: pino.Logger | null = null;

/**
 * Get or create the default shared logger
 */
export function getLogger(): pino.Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({ name: 'changegate' });
  }
  return defaultLogger;
}

/**
 * Set the default logger (useful for testing)
 */
export function setLogger(logger: pino.Logger): void {
  defaultLogger = logger;
}

export type { Logger } from 'pino';
