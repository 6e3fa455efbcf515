/**
 * Lightweight logging utility.
 * Outputs to the console and, optionally, a log file with timestamps and
 * bound context.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Append entries to this file; no file output when unset */
  file?: string;
  /** Context added to every entry */
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that adds `context` to every entry */
  child(context: LogContext): Logger;
}

function formatLogEntry(level: LogLevel, message: string, context: LogContext): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  const call = typeof context.call === "string" ? context.call : "-";

  const { call: _call, ...rest } = context;
  let entry = `[${timestamp}] [${levelStr}] [${call}] ${message}`;

  if (Object.keys(rest).length > 0) {
    entry += ` ${JSON.stringify(rest)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const file = options.file;

  if (file !== undefined && !existsSync(dirname(file))) {
    mkdirSync(dirname(file), { recursive: true });
  }

  function build(bound: LogContext): Logger {
    function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }

      const entry = formatLogEntry(entryLevel, message, { ...bound, ...context });

      if (toConsole) {
        getConsoleMethod(entryLevel)(entry);
      }

      if (file !== undefined) {
        try {
          appendFileSync(file, entry + "\n");
        } catch (err) {
          console.error(`Failed to write to log file: ${err}`);
        }
      }
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (context) => build({ ...bound, ...context }),
    };
  }

  return build(options.context ?? {});
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = createLogger({ console: false });
