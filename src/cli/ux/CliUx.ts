/**
 * User-facing terminal output.
 *
 * Four levels, each including the ones before it:
 * - `silent`: errors only
 * - `info`: progress, the success line and the bake summary
 * - `verbose`: per-file listing and info-level pipeline logs
 * - `debug`: every pipeline log line
 *
 * Errors go to stderr whatever the level.
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: LogLevel;

  /** Default: whether stdout is a TTY */
  readonly colors?: boolean;

  /** Replace the process streams (tests, embedding) */
  readonly stdout?: (msg: string) => void;
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
}

type Paint = (text: string) => string;

// =============================================================================
// CliUx
// =============================================================================

const RANK: Record<LogLevel, number> = { silent: 0, info: 1, verbose: 2, debug: 3 };

const plain: Paint = (text) => text;

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 * ux.info("Baking My Theme");
 * ux.success('Sub-theme "My Theme" created');
 * ux.detail("Machine name: my_theme");
 * ux.error("Theme \"emulsify\" is not installed", { code: "THEME_NOT_FOUND", hint: "Pass --source." });
 * ```
 */
export class CliUx {
  private readonly level: LogLevel;
  private readonly out: (msg: string) => void;
  private readonly err: (msg: string) => void;
  private readonly paint: Record<"green" | "red" | "yellow" | "cyan" | "dim", Paint>;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.out = options.stdout ?? ((msg) => void process.stdout.write(msg));
    this.err = options.stderr ?? ((msg) => void process.stderr.write(msg));

    const colors = options.colors ?? process.stdout.isTTY ?? false;
    this.paint = colors
      ? { green: pc.green, red: pc.red, yellow: pc.yellow, cyan: pc.cyan, dim: pc.dim }
      : { green: plain, red: plain, yellow: plain, cyan: plain, dim: plain };
  }

  get logLevel(): LogLevel {
    return this.level;
  }

  private shows(level: LogLevel): boolean {
    return RANK[this.level] >= RANK[level];
  }

  /** `✓ message` */
  success(message: string): void {
    if (this.shows("info")) {
      this.out(`${this.paint.green("✓")} ${message}\n`);
    }
  }

  /** `✗ CODE: message`, then the hint; shown even when silent */
  error(message: string, details: ErrorDetails = {}): void {
    const code = details.code ? `${this.paint.red(details.code)}: ` : "";
    this.err(`${this.paint.red("✗")} ${code}${message}\n`);

    if (details.hint) {
      this.err(`  ${this.paint.dim("Hint:")} ${details.hint}\n`);
    }
  }

  /** `⚠ message` on stderr */
  warn(message: string): void {
    if (this.shows("info")) {
      this.err(`${this.paint.yellow("⚠")} ${message}\n`);
    }
  }

  /** `→ message` */
  info(message: string): void {
    if (this.shows("info")) {
      this.out(`${this.paint.cyan("→")} ${message}\n`);
    }
  }

  /** Indented summary line */
  detail(message: string): void {
    if (this.shows("info")) {
      this.out(`  ${message}\n`);
    }
  }

  verbose(message: string): void {
    if (this.shows("verbose")) {
      this.out(`  ${this.paint.dim(message)}\n`);
    }
  }

  debug(message: string): void {
    if (this.shows("debug")) {
      this.out(`  ${this.paint.dim(`[debug] ${message}`)}\n`);
    }
  }
}

// =============================================================================
// Shared Instance
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let current: CliUx | undefined;

/**
 * The instance installed by the program for the running command.
 */
export function getCliUx(): CliUx {
  current ??= createCliUx({ level: "info" });
  return current;
}

export function setDefaultCliUx(ux: CliUx): void {
  current = ux;
}

// =============================================================================
// Flags
// =============================================================================

export interface LogLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * `--debug` beats `--silent`, which beats `--verbose`.
 */
export function parseLogLevel(flags: LogLevelFlags): LogLevel {
  if (flags.debug) return "debug";
  if (flags.silent) return "silent";
  if (flags.verbose) return "verbose";
  return "info";
}
