/**
 * Logger Utility
 *
 * JSON-lines logging for the sync client, the integration and the poll loop.
 * A logger carries bound context; `child()` adds to it. Children share their
 * root's service name, level and sink, so `configure()` on the root applies
 * to every logger handed out before.
 */

import { RequestFailedError, SyncError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

/**
 * Receives every formatted line at or above the configured level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  service?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_SERVICE_NAME = 'verbatim-sync';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Common surface of `Logger` and test doubles.
 */
export interface LoggerLike {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): LoggerLike;
}

export const consoleSink: LogSink = (level, line) => {
  switch (level) {
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
};

// =============================================================================
// SERIALISATION
// =============================================================================

/**
 * Errors do not survive `JSON.stringify`; keep what a reader of the log needs.
 */
export function serializeError(error: Error): LogContext {
  const fields: LogContext = { name: error.name, message: error.message };
  if (error instanceof SyncError) {
    fields.code = error.code;
  }
  if (error instanceof RequestFailedError && error.status !== undefined) {
    fields.status = error.status;
  }
  return fields;
}

function serializeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

// =============================================================================
// LOGGER
// =============================================================================

interface LoggerSettings {
  service: string;
  level: LogLevel;
  sink: LogSink;
}

export class Logger implements LoggerLike {
  private settings: LoggerSettings;
  private bound: LogContext = {};

  constructor(options: LoggerOptions = {}) {
    this.settings = {
      service: options.service ?? DEFAULT_SERVICE_NAME,
      level: options.level ?? 'info',
      sink: options.sink ?? consoleSink,
    };
  }

  /**
   * Change service name, level or sink for this logger and all its children.
   */
  configure(options: LoggerOptions): void {
    if (options.service !== undefined) this.settings.service = options.service;
    if (options.level !== undefined) this.settings.level = options.level;
    if (options.sink !== undefined) this.settings.sink = options.sink;
  }

  get level(): LogLevel {
    return this.settings.level;
  }

  get service(): string {
    return this.settings.service;
  }

  child(context: LogContext): Logger {
    const child = new Logger();
    child.settings = this.settings;
    child.bound = { ...this.bound, ...context };
    return child;
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.settings.level]) return;

    const merged = serializeContext({ ...this.bound, ...context });
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      service: this.settings.service,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });

    this.settings.sink(level, line);
  }
}

const envLevel = process.env.LOG_LEVEL;

// Library default; the CLI reconfigures it once .env has been loaded.
export const logger = new Logger({
  service: process.env.SERVICE_NAME || DEFAULT_SERVICE_NAME,
  level: isLogLevel(envLevel) ? envLevel : 'info',
});
