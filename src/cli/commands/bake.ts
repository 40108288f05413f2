/**
 * Bake CLI command.
 *
 * Creates a sub-theme from the starter template.
 *
 * Usage:
 *   themebake bake [name] [--source <location>] [--base-theme <id>]
 *                         [--dest-root <dir>] [--project-root <dir>]
 *
 * Examples:
 *   themebake bake "My Theme"
 *   themebake bake "My Theme" --source https://example.com/starter-1.2.0.zip
 *   themebake b Client --source ../starters/whisk --dest-root web/themes/custom
 *
 * @module
 */

import * as path from "node:path";
import { Command } from "commander";
import { createLogger, parseLogLevelName } from "../../core/logging/ContextualLogger.js";
import { handleBake, formatBakeOutput, type BakeDependencies } from "../handlers/bakeHandler.js";
import { LabelPrompt } from "../prompts/LabelPrompt.js";
import { getCliUx } from "../ux/CliUx.js";
import { createCliSpinner } from "../ux/CliSpinner.js";
import { CliUxLogSink } from "../ux/CliUxLogSink.js";

/**
 * Environment variable switching pipeline logs to JSON lines on stderr.
 */
export const LOG_LEVEL_ENV_VAR = "THEMEBAKE_LOG_LEVEL";

/**
 * What the command needs from its host process.
 */
export interface BakeCommandContext {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;

  /** Whether stdin/stdout are a terminal (prompting, spinner) */
  readonly interactive: boolean;

  /** Overrides for the handler's collaborators (tests) */
  readonly services?: Omit<BakeDependencies, "logger" | "env">;

  readonly prompt?: LabelPrompt;
}

interface BakeCommandOptions {
  source?: string;
  baseTheme?: string;
  destRoot?: string;
  projectRoot?: string;
}

/**
 * Builds the `bake` command.
 *
 * Failures are thrown to the program, which reports them and sets the exit
 * status.
 */
export function buildBakeCommand(context: BakeCommandContext): Command {
  return new Command("bake")
    .alias("b")
    .description("Create a sub-theme from the starter template")
    .argument("[name]", "Human-readable sub-theme name (e.g. \"My Theme\")")
    .addHelpText(
      "after",
      "\nThe name must contain at least one letter or digit: it becomes the theme's\n" +
        "machine name (\"My Theme\" -> my_theme), and a name like \"!!!\" is refused\n" +
        "rather than baked into themes/custom/_.",
    )
    .option("--source <location>", "Starter URL (zip/tar archive) or local directory")
    .option("--base-theme <id>", "Base theme that ships the default starter")
    .option("--dest-root <dir>", "Directory the sub-theme is created in (default: themes/custom)")
    .option("--project-root <dir>", "Project root (default: current directory)")
    .action(async (name: string | undefined, options: BakeCommandOptions) => {
      const ux = getCliUx();

      const jsonLevel = context.env[LOG_LEVEL_ENV_VAR];
      const logger = jsonLevel
        ? createLogger({ minLevel: parseLogLevelName(jsonLevel), debug: ux.logLevel === "debug" })
        : createLogger({
            sink: new CliUxLogSink(ux),
            minLevel: "debug",
            debug: ux.logLevel === "debug",
          });

      let label = name;
      if (label === undefined && context.interactive) {
        label = await (context.prompt ?? new LabelPrompt()).ask();
      }

      // Only a terminal session may animate; otherwise fall back to plain lines
      const spinner = createCliSpinner({ ux, isTTY: context.interactive ? undefined : false });
      spinner.start(`Baking ${label ?? "sub-theme"}`);

      try {
        const result = await handleBake(
          {
            label,
            projectRoot: path.resolve(context.cwd, options.projectRoot ?? "."),
            source: options.source,
            baseTheme: options.baseTheme,
            destinationRoot: options.destRoot,
          },
          { ...context.services, logger, env: context.env },
        );

        spinner.succeed(`Sub-theme "${result.label}" created`);
        for (const line of formatBakeOutput(result, ux.logLevel !== "info")) {
          if (line.startsWith("  ")) {
            ux.verbose(line.trim());
          } else {
            ux.detail(line);
          }
        }
      } catch (err) {
        spinner.stop();
        throw err;
      }
    });
}
