/**
 * Structured logging for bake runs.
 *
 * Every entry is a flat record `{ ts, level, msg, runId?, step?, ...fields }`
 * handed to a {@link LogSink}. Child loggers carry bound fields, so a step
 * only needs `logger.withContext({ step })` once.
 *
 * @module
 */

import { ScaffoldError } from "../errors/errors.js";
import type { Step } from "./Step.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  /** ISO timestamp */
  ts: string;
  level: LogLevel;
  msg: string;

  /** Workspace name of the bake run that produced the entry */
  runId?: string;

  /** Pipeline step */
  step?: string;

  /** Set when an `error` field was logged */
  errorCode?: string;
  errorMessage?: string;

  /** Debug mode only */
  stack?: string;
  cause?: string;

  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Fields bound to a logger and copied into each of its entries.
 */
export interface LogContext {
  runId?: string;
  step?: Step;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Default: JSON lines on stderr */
  sink?: LogSink;

  /** Default: "info" */
  minLevel?: LogLevel;

  /** Attach stacks and causes of logged errors */
  debug?: boolean;

  context?: LogContext;
}

// =============================================================================
// Sinks and Levels
// =============================================================================

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Writes one JSON object per line to stderr; stdout stays for command output.
 */
const stderrJsonSink: LogSink = {
  write(entry) {
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  },
};

export const nullSink: LogSink = {
  write() {},
};

/**
 * Reads a level name such as the value of `THEMEBAKE_LOG_LEVEL`.
 */
export function parseLogLevelName(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return fallback;
  }
}

// =============================================================================
// ContextualLogger
// =============================================================================

/**
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: "debug" });
 * const mirror = logger.withContext({ runId: "1718000000000-1a2b3c4d", step: Step.MIRROR });
 * mirror.debug("Copying starter", { srcDir, dstDir });
 * mirror.error(err.message, { error: err });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? stderrJsonSink;
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  debug(msg: string, fields?: Record<string, unknown>): void {
    this.emit("debug", msg, fields);
  }

  info(msg: string, fields?: Record<string, unknown>): void {
    this.emit("info", msg, fields);
  }

  warn(msg: string, fields?: Record<string, unknown>): void {
    this.emit("warn", msg, fields);
  }

  /**
   * An `error` field holding an Error is expanded into `errorCode` and
   * `errorMessage` (plus `stack` and `cause` in debug mode).
   */
  error(msg: string, fields?: Record<string, unknown>): void {
    this.emit("error", msg, fields);
  }

  private emit(level: LogLevel, msg: string, fields: Record<string, unknown> = {}): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = { ts: new Date().toISOString(), level, msg };

    for (const [key, value] of [...Object.entries(this.context), ...Object.entries(fields)]) {
      if (value === undefined) {
        continue;
      }
      if (key === "error" && value instanceof Error) {
        this.describeError(entry, value);
      } else {
        entry[key] = value;
      }
    }

    this.sink.write(entry);
  }

  private describeError(entry: LogEntry, error: Error): void {
    if (error instanceof ScaffoldError) {
      entry.errorCode = error.code;
    }
    entry.errorMessage = error.message;

    if (!this.debugMode) {
      return;
    }
    if (error.stack) {
      entry.stack = error.stack;
    }
    if (error.cause !== undefined) {
      entry.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
  }
}

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}
