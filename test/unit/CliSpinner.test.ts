/**
 * Tests for the non-TTY spinner fallback.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { createCliSpinner } from "../../src/cli/ux/CliSpinner.js";
import { createCliUx, type LogLevel } from "../../src/cli/ux/CliUx.js";

function capture(level: LogLevel) {
  const stdout: string[] = [];
  const ux = createCliUx({ level, colors: false, stdout: (msg) => stdout.push(msg), stderr: () => {} });
  return { ux, stdout };
}

describe("CliSpinner without a TTY", () => {
  it("prints the start and success messages as lines", () => {
    const { ux, stdout } = capture("info");
    const spinner = createCliSpinner({ ux, isTTY: false });

    spinner.start("Baking My Theme");
    spinner.succeed('Sub-theme "My Theme" created');

    expect(stdout).toEqual(["→ Baking My Theme\n", '✓ Sub-theme "My Theme" created\n']);
  });

  it("reuses the start message when succeed has none", () => {
    const { ux, stdout } = capture("info");
    const spinner = createCliSpinner({ ux, isTTY: false });

    spinner.start("Baking");
    spinner.succeed();

    expect(stdout).toEqual(["→ Baking\n", "✓ Baking\n"]);
  });

  it("prints nothing on stop", () => {
    const { ux, stdout } = capture("info");
    const spinner = createCliSpinner({ ux, isTTY: false });

    spinner.start("Baking");
    spinner.stop();

    expect(stdout).toEqual(["→ Baking\n"]);
  });

  it("never animates when silent", () => {
    const { ux, stdout } = capture("silent");
    const spinner = createCliSpinner({ ux, isTTY: true });

    spinner.start("Baking");
    spinner.succeed();

    expect(stdout).toEqual([]);
  });
});
