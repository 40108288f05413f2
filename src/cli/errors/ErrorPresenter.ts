/**
 * The error report printed with `--debug`.
 *
 * ```
 * Error [MIRROR_FAILED]: Failed to copy starter: EACCES: permission denied
 *
 * Src Dir: /project/themes/contrib/emulsify/whisk
 * Dst Dir: /project/themes/custom/my_theme
 *
 * Hint:
 *   Check that /project/themes/custom/my_theme is writable and that the starter directory exists.
 * ```
 *
 * @module
 */

import { ScaffoldError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";

export interface FormatErrorOptions {
  /** Append the stack trace and the cause (default: false) */
  debug?: boolean;
}

/**
 * Renders any thrown value. Values that are not a ScaffoldError are
 * reported as INTERNAL_ERROR.
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const err = asScaffoldError(error);
  const sections: string[][] = [[`Error [${err.code}]: ${err.message}`]];

  if (err.details) {
    const details = Object.entries(err.details).flatMap(([key, value]) => detailLines(key, value));
    if (details.length > 0) {
      sections.push(details);
    }
  }

  if (err.hint) {
    sections.push(["Hint:", ...err.hint.split("\n").map((line) => `  ${line}`)]);
  }

  if (options.debug) {
    if (err.stack) {
      sections.push(["Stack trace:", ...stackFrames(err.stack)]);
    }
    if (err.cause) {
      sections.push(["Caused by:", `  ${err.cause.message}`, ...stackFrames(err.cause.stack)]);
    }
  }

  return sections.map((lines) => lines.join("\n")).join("\n\n");
}

function asScaffoldError(error: unknown): ScaffoldError {
  if (error instanceof ScaffoldError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const wrapped = new ScaffoldError(
    cause ? cause.message : String(error),
    ErrorCode.INTERNAL_ERROR,
    undefined,
    undefined,
    undefined,
    cause,
    false,
  );
  if (cause?.stack) {
    wrapped.stack = cause.stack;
  }
  return wrapped;
}

/** Stack lines after the message line */
function stackFrames(stack: string | undefined): string[] {
  return stack ? stack.split("\n").slice(1) : [];
}

function detailLines(key: string, value: unknown): string[] {
  const label = titleCase(key);

  if (Array.isArray(value)) {
    return value.length > 0 ? [`${label}:`, ...value.map((item) => `  - ${String(item)}`)] : [];
  }
  if (value === undefined) {
    return [];
  }
  if (typeof value === "object" && value !== null) {
    return [`${label}: ${JSON.stringify(value)}`];
  }
  return [`${label}: ${String(value)}`];
}

/** `dstDir` -> `Dst Dir` */
function titleCase(key: string): string {
  return key.replace(/([A-Z])/g, " $1").replace(/^./, (c) => c.toUpperCase()).trim();
}
