import type { LogEntry, LogSink } from "../../core/logging/ContextualLogger.js";
import type { CliUx } from "./CliUx.js";

/** Entry fields rendered elsewhere in the line */
const RESERVED = new Set(["ts", "level", "msg", "step", "runId"]);

/**
 * Renders structured log entries as CliUx lines.
 *
 * Debug entries only show with --debug and info entries with --verbose.
 * Errors also go to debug output: the command reports the failure itself,
 * once, with its hint.
 */
export class CliUxLogSink implements LogSink {
  constructor(private readonly ux: CliUx) {}

  write(entry: LogEntry): void {
    const line = formatLogLine(entry);

    switch (entry.level) {
      case "info":
        this.ux.verbose(line);
        break;
      case "warn":
        this.ux.warn(line);
        break;
      default:
        this.ux.debug(line);
    }
  }
}

/**
 * Formats an entry as `[step] message key=value ...`.
 */
export function formatLogLine(entry: LogEntry): string {
  const prefix = entry.step ? `[${entry.step}] ` : "";
  const fields = Object.entries(entry)
    .filter(([key, value]) => !RESERVED.has(key) && value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);

  return [`${prefix}${entry.msg}`, ...fields].join(" ");
}
