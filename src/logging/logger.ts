/**
 * Lightweight logging utility.
 * Writes timestamped, run-tagged lines to stderr and optionally to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output (stderr) */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Extra sink receiving every formatted entry */
  write?: (entry: string, level: LogLevel) => void;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "write">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "gallery-upload.log",
  console: true,
  file: false,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that merges `bindings` into the context of every entry. */
  child(bindings: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { write, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function emit(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    // stdout is reserved for command output
    if (opts.console) {
      console.error(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        console.error(`Failed to write to log file: ${String(err)}`);
      }
    }

    write?.(entry, level);
  }

  function bind(bindings: LogContext): Logger {
    const withBindings = (context?: LogContext): LogContext | undefined =>
      Object.keys(bindings).length > 0 ? { ...bindings, ...context } : context;

    return {
      debug: (message, context) => emit("debug", message, withBindings(context)),
      info: (message, context) => emit("info", message, withBindings(context)),
      warn: (message, context) => emit("warn", message, withBindings(context)),
      error: (message, context) => emit("error", message, withBindings(context)),
      child: (more) => bind({ ...bindings, ...more }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything. Used as the default where a caller
 * does not pass one.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
