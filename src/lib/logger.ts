/**
 * Structured Logger
 *
 * Outputs structured JSON in production and human-readable lines in
 * development. Every entry carries a timestamp, level, message and an
 * optional context object.
 *
 * Usage:
 * ```typescript
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Archive completed", { archiveId: "123", state: "success" });
 * logger.error("Failed to persist transition", { archiveId: "456", error: error.message });
 * ```
 */

import * as Sentry from "@sentry/node";

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data that can be attached to log entries.
 */
export type LogContext = Record<string, unknown>;

/**
 * A logger, or a child logger bound to extra context.
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  /** Returns a logger that merges `context` into every entry. */
  child: (context: LogContext) => Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL, else "info" in production, "debug" otherwise) */
  minLevel?: LogLevel;
  /** Whether to output JSON (default: true in production) */
  json?: boolean;
  /** Service name for structured logs */
  service?: string;
  /** Where formatted lines go; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const RESET = "\x1b[0m";

const isProduction = process.env.NODE_ENV === "production";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

/**
 * Creates a logger instance with the given configuration.
 */
function createLogger(config: LoggerConfig = {}): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const {
    minLevel = isLogLevel(envLevel) ? envLevel : isProduction ? "info" : "debug",
    json = isProduction,
    service = "linkshelf-archiver",
    sink = consoleSink,
  } = config;

  const minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        ...entry.context,
        timestamp: entry.timestamp,
        level: entry.level,
        message: entry.message,
        service,
      });
    }

    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = `${LEVEL_COLORS[entry.level]}${levelStr}${RESET} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    sink(
      level,
      formatEntry({
        timestamp: new Date().toISOString(),
        level,
        message,
        context,
      })
    );

    if (level === "error" && isProduction) {
      Sentry.addBreadcrumb({
        category: "log",
        message,
        level: "error",
        data: context,
      });
    }
  }

  function bind(bound: LogContext): Logger {
    const merge = (context?: LogContext): LogContext => ({ ...bound, ...context });
    return {
      debug: (message, context) => log("debug", message, merge(context)),
      info: (message, context) => log("info", message, merge(context)),
      warn: (message, context) => log("warn", message, merge(context)),
      error: (message, context) => log("error", message, merge(context)),
      child: (context) => bind(merge(context)),
    };
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (context) => bind(context),
  };
}

/**
 * Default logger instance.
 */
export const logger = createLogger();

/**
 * Creates a job-scoped logger with job context.
 */
export function createJobLogger(context: { jobId: string; jobType: string; attempt?: number }) {
  return logger.child(context);
}

/**
 * Creates a logger scoped to one archive.
 */
export function createArchiveLogger(context: { archiveId: string; bookmarkId: string }) {
  return logger.child(context);
}

/**
 * Formats an unknown thrown value for a log context.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { createLogger };
