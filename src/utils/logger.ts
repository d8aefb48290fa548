/**
 * Leveled, named logging for the assistant.
 *
 * Every module creates its own logger at import time. Output goes to the
 * console unless `configureLogging()` points it somewhere else.
 */

import { appendFileSync } from 'node:fs';

/** Levels in increasing severity. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerOptions {
  /**
   * Lowest level that is emitted. When omitted the process-wide level from
   * `configureLogging()` applies, then the LOG_LEVEL env var, then 'info'.
   */
  level?: LogLevel | undefined;
  /** Shown as a `[name]` prefix on every message */
  name?: string | undefined;
  /** Receives entries instead of the process-wide handler */
  handler?: LogHandler | undefined;
}

export interface ConfigureLoggingOptions {
  /** Level for every logger created without one */
  level?: LogLevel | undefined;
  handler?: LogHandler | undefined;
  /** Append formatted lines to this file */
  file?: string | undefined;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose name is `parent:child` */
  child(options: LoggerOptions): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** `[timestamp] LEVEL: message {context}` */
export function formatLogEntry(entry: LogEntry): string {
  const line = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  return entry.context ? `${line} ${JSON.stringify(entry.context)}` : line;
}

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const writeToConsole: LogHandler = (entry) => {
  consoleWriters[entry.level](formatLogEntry(entry));
};

// Loggers without their own handler or level look these up on every entry,
// so configuring also affects loggers created before the call.
let processHandler: LogHandler = writeToConsole;
let processLevel: LogLevel | undefined;

/**
 * Set the level and destination of every logger that has none of its own.
 *
 * @example
 * ```typescript
 * // Keep the terminal for the chat loop
 * configureLogging({ level: 'warn', file: 'assistant.log' });
 * ```
 */
export function configureLogging(options: ConfigureLoggingOptions): void {
  const { level, handler, file } = options;
  if (level) {
    processLevel = level;
  }
  if (handler) {
    processHandler = handler;
    return;
  }
  if (file) {
    processHandler = (entry) => {
      appendFileSync(file, `${formatLogEntry(entry)}\n`);
    };
  }
}

/** Send output back to the console at the LOG_LEVEL env level. */
export function resetLogging(): void {
  processHandler = writeToConsole;
  processLevel = undefined;
}

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL'];
  return isLogLevel(value) ? value : 'info';
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'memory' });
 * logger.info('Conversation compressed', { from: 12300, to: 60 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level, name, handler } = options;

  const emit = (entryLevel: LogLevel, message: string, context?: LogContext): void => {
    if (severity(entryLevel) < severity(level ?? processLevel ?? levelFromEnv())) return;

    const entry: LogEntry = {
      level: entryLevel,
      message: name ? `[${name}] ${message}` : message,
      timestamp: new Date().toISOString(),
      context,
    };
    (handler ?? processHandler)(entry);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    child: (childOptions) =>
      createLogger({
        level,
        handler,
        ...childOptions,
        name: [name, childOptions.name].filter(Boolean).join(':') || undefined,
      }),
  };
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
