/**
 * CLI program assembly.
 *
 * `runCli` builds the commander program, runs it and maps the outcome to an
 * exit status: 0 on success, 1 on any failure (commander's own status for
 * usage errors and --help).
 *
 * @module
 */

import { Command, CommanderError } from "commander";
import { toUserMessage, ScaffoldError } from "../core/errors/errors.js";
import { buildBakeCommand, type BakeCommandContext } from "./commands/bake.js";
import { formatError } from "./errors/ErrorPresenter.js";
import { createCliUx, setDefaultCliUx, parseLogLevel, getCliUx } from "./ux/CliUx.js";
import { CLI_VERSION } from "./version.js";

/**
 * Options for a CLI run.
 */
export interface RunCliOptions extends BakeCommandContext {
  /** User arguments (without the node and script entries) */
  readonly args: readonly string[];

  /** Force colors on or off (default: TTY detection) */
  readonly colors?: boolean;

  readonly stdout?: (msg: string) => void;
  readonly stderr?: (msg: string) => void;
}

/**
 * Builds the program with its global flags and commands.
 */
export function buildProgram(options: RunCliOptions): Command {
  const output = resolveOutput(options);

  const program = new Command()
    .name("themebake")
    .description("Bake CMS sub-themes from a starter template")
    .version(CLI_VERSION)
    .option("--verbose", "Show additional context and details", false)
    .option("--debug", "Show all output including debug traces", false)
    .option("--silent", "Suppress all output except errors", false)
    .exitOverride()
    .configureOutput(output);

  // Set up CliUx before any command runs
  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    const level = parseLogLevel({
      verbose: opts.verbose ?? false,
      debug: opts.debug ?? false,
      silent: opts.silent ?? false,
    });

    setDefaultCliUx(
      createCliUx({
        level,
        colors: options.colors,
        stdout: output.writeOut,
        stderr: output.writeErr,
      }),
    );
  });

  const bake = buildBakeCommand(options);
  bake.copyInheritedSettings(program);
  program.addCommand(bake);

  return program;
}

function resolveOutput(options: RunCliOptions) {
  return {
    writeOut: options.stdout ?? ((msg: string) => void process.stdout.write(msg)),
    writeErr: options.stderr ?? ((msg: string) => void process.stderr.write(msg)),
  };
}

/**
 * Runs the CLI and returns the exit status.
 */
export async function runCli(options: RunCliOptions): Promise<number> {
  const program = buildProgram(options);

  try {
    await program.parseAsync([...options.args], { from: "user" });
    return 0;
  } catch (err) {
    // Usage errors and --help/--version: commander already printed them
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const ux = getCliUx();

    if (program.opts().debug) {
      resolveOutput(options).writeErr(formatError(err, { debug: true }) + "\n");
    } else {
      const u = toUserMessage(err);
      ux.error(u.message, {
        code: u.code,
        hint: err instanceof ScaffoldError ? err.hint : undefined,
      });
    }

    return 1;
  }
}
