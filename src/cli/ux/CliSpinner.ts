/**
 * Progress indicator around the bake pipeline.
 *
 * On a terminal this animates a @clack/prompts spinner; elsewhere (CI,
 * pipes, tests, `--silent`) the start and success messages become plain
 * {@link CliUx} lines.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { CliUx } from "./CliUx.js";

export interface CliSpinnerOptions {
  readonly ux: CliUx;

  /** Default: whether stdout is a TTY */
  readonly isTTY?: boolean;
}

export class CliSpinner {
  private readonly ux: CliUx;
  private readonly animate: boolean;
  private active: ReturnType<typeof clack.spinner> | undefined;
  private message = "";

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    this.animate =
      (options.isTTY ?? process.stdout.isTTY ?? false) && options.ux.logLevel !== "silent";
  }

  start(message: string): void {
    this.message = message;

    if (!this.animate) {
      this.ux.info(message);
      return;
    }
    this.active = clack.spinner();
    this.active.start(message);
  }

  /** Stops without a message (failure path; the error is printed elsewhere) */
  stop(): void {
    this.active?.stop();
    this.active = undefined;
  }

  succeed(message: string = this.message): void {
    if (this.active) {
      this.active.stop(message);
      this.active = undefined;
      return;
    }
    this.ux.success(message);
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
