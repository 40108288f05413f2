/**
 * Handler for the `bake` CLI command.
 *
 * Coordinates:
 * - Configuration loading (ConfigLoader)
 * - Label validation and machine name derivation
 * - Starter location (flag, environment, config, or base theme)
 * - The bake pipeline (PipelineController)
 *
 * The handler is separated from the CLI wiring to enable direct testing.
 *
 * @module
 */

import * as path from "node:path";
import { ScaffoldError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import type { ContextualLogger } from "../../core/logging/ContextualLogger.js";
import { Step } from "../../core/logging/Step.js";
import { loadConfig, SOURCE_ENV_VAR, type ThemebakeConfig } from "../../core/config/ConfigLoader.js";
import { isUsableMachineName, toMachineName } from "../../core/naming/machineName.js";
import { isRemote } from "../../core/source/SourceResolver.js";
import { ArtifactFetcher, type FetchLike } from "../../core/source/ArtifactFetcher.js";
import {
  DefaultArchiveExtractorFactory,
  type ArchiveExtractorFactory,
} from "../../core/archive/ArchiveExtractor.js";
import {
  ProjectThemePathResolver,
  type ThemePathResolver,
} from "../../core/themes/ThemePathResolver.js";
import {
  SubThemeGenerator,
  type GenerateResult,
  type ThemeGenerator,
} from "../../core/generate/SubThemeGenerator.js";
import { WorkspaceManager } from "../../core/workspace/WorkspaceManager.js";
import { runPipeline } from "../../core/pipeline/PipelineController.js";
import type { ScaffoldRequest } from "../../core/pipeline/PipelineState.js";
import { resolveAppPaths } from "../../core/utils/paths.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Input for the bake handler.
 */
export interface BakeInput {
  /** Human-readable sub-theme name */
  readonly label?: string;

  /** Project root; config and destination are resolved against it */
  readonly projectRoot: string;

  /** Starter URL or path (overrides environment and config) */
  readonly source?: string;

  /** Base theme holding the default starter (overrides config) */
  readonly baseTheme?: string;

  /** Destination root relative to the project root (overrides config) */
  readonly destinationRoot?: string;
}

/**
 * Dependencies for the bake handler.
 *
 * Everything but the logger has a production default.
 */
export interface BakeDependencies {
  readonly logger: ContextualLogger;

  /** Environment variables (default: none) */
  readonly env?: Readonly<Record<string, string | undefined>>;

  /** Parent of per-invocation workspaces */
  readonly workspacesDir?: string;

  /** HTTP client for remote starters */
  readonly fetchImpl?: FetchLike;

  readonly extractors?: ArchiveExtractorFactory;

  /** Default: scans the config's theme search paths */
  readonly themePaths?: ThemePathResolver;

  /** Default: SubThemeGenerator with the config's placeholders */
  readonly generator?: ThemeGenerator;
}

/**
 * Result of a successful bake.
 */
export interface BakeResult {
  readonly label: string;
  readonly machineName: string;
  readonly sourceLocation: string;
  readonly remote: boolean;
  readonly destinationDir: string;

  /** Relative paths copied from the starter */
  readonly filesCopied: string[];

  readonly generated: GenerateResult;
}

// =============================================================================
// Handler Implementation
// =============================================================================

/**
 * Handles `bake <name>`.
 *
 * ## Process
 *
 * 1. Validate the label and derive the machine name
 * 2. Load `themebake.config.yaml` (defaults when absent)
 * 3. Pick the starter: --source, THEMEBAKE_SOURCE, config `source`, or
 *    `<base theme path>/<starterDir>`
 * 4. Run the pipeline into `<projectRoot>/<destinationRoot>/<machineName>`
 *
 * @throws ScaffoldError on invalid input, configuration or theme lookup,
 *   and with the failing step's error when the pipeline fails
 */
export async function handleBake(input: BakeInput, deps: BakeDependencies): Promise<BakeResult> {
  const projectRoot = path.resolve(input.projectRoot);
  const logger = deps.logger.withContext({ step: Step.SETUP });

  const label = input.label ?? "";
  if (label.trim().length === 0) {
    throw new ScaffoldError(
      "Sub-theme name is required",
      ErrorCode.INPUT_REQUIRED,
      undefined,
      undefined,
      'Pass the name as an argument, e.g. themebake bake "My Theme".',
    );
  }

  const machineName = toMachineName(label);
  if (!isUsableMachineName(machineName)) {
    throw new ScaffoldError(
      `"${label}" does not yield a usable machine name`,
      ErrorCode.INPUT_INVALID,
      { label, machineName },
      undefined,
      "Use a name with at least one letter or digit.",
    );
  }

  const config = await loadConfig(projectRoot);

  const destinationDir = path.resolve(
    projectRoot,
    input.destinationRoot ?? config.destinationRoot,
    machineName,
  );

  const sourceLocation = await resolveSourceLocation(input, deps, config, projectRoot);
  const remote = isRemote(sourceLocation);

  if (!remote) {
    assertNotNested(sourceLocation, destinationDir);
  }

  logger.debug("Resolved bake request", {
    machineName,
    sourceLocation,
    remote,
    destinationDir,
  });

  const request: ScaffoldRequest = {
    rawLabel: label,
    machineName,
    sourceLocation,
    destinationDir,
  };

  const result = await runPipeline(request, {
    logger: deps.logger,
    workspaces: new WorkspaceManager(
      deps.workspacesDir ?? resolveAppPaths().workspacesDir,
      deps.logger.withContext({ step: Step.WORKSPACE }),
    ),
    fetcher: new ArtifactFetcher(deps.fetchImpl),
    extractors: deps.extractors ?? new DefaultArchiveExtractorFactory(),
    generator: deps.generator ?? new SubThemeGenerator(config.placeholders),
  });

  if (result.error) {
    throw result.error;
  }
  if (!result.state.generated) {
    throw new ScaffoldError(
      `Bake stopped at ${result.failedStep ?? "an unknown step"}`,
      ErrorCode.INTERNAL_ERROR,
      { stepsRun: result.stepsRun },
    );
  }

  return {
    label,
    machineName,
    sourceLocation,
    remote,
    destinationDir,
    filesCopied: result.state.mirrored?.files ?? [],
    generated: result.state.generated,
  };
}

/**
 * Picks the starter location. Local paths are made absolute against the
 * project root.
 */
async function resolveSourceLocation(
  input: BakeInput,
  deps: BakeDependencies,
  config: ThemebakeConfig,
  projectRoot: string,
): Promise<string> {
  const explicit = input.source ?? deps.env?.[SOURCE_ENV_VAR] ?? config.source;

  if (explicit !== undefined && explicit.trim() !== "") {
    return isRemote(explicit) ? explicit : path.resolve(projectRoot, explicit);
  }

  const themePaths =
    deps.themePaths ?? new ProjectThemePathResolver(projectRoot, config.themeSearchPaths);
  const baseThemeDir = await themePaths.resolve(input.baseTheme ?? config.baseTheme);
  return path.join(baseThemeDir, config.starterDir);
}

/**
 * Mirroring a directory into itself would never finish.
 */
function assertNotNested(sourceDir: string, destinationDir: string): void {
  const relative = path.relative(sourceDir, destinationDir);
  const inside = relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));

  if (inside) {
    throw new ScaffoldError(
      "Destination is inside the starter directory",
      ErrorCode.INPUT_INVALID,
      { sourceDir, destinationDir },
      undefined,
      "Choose a starter outside the project's theme destination, or change --dest-root.",
    );
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Formats a bake result as detail lines for the CLI.
 *
 * @param verbose - Also list every copied and rewritten file
 */
export function formatBakeOutput(result: BakeResult, verbose = false): string[] {
  const lines = [
    `Machine name: ${result.machineName}`,
    `Location: ${result.destinationDir}`,
    `Starter: ${result.sourceLocation}`,
    `Files copied: ${result.filesCopied.length}`,
    `Files customized: ${result.generated.filesRewritten.length}`,
  ];

  if (result.generated.filesRenamed.length > 0) {
    lines.push(`Files renamed: ${result.generated.filesRenamed.length}`);
  }

  if (verbose) {
    for (const file of result.filesCopied) {
      lines.push(`  copied ${file}`);
    }
    for (const file of result.generated.filesRewritten) {
      lines.push(`  customized ${file}`);
    }
    for (const { from, to } of result.generated.filesRenamed) {
      lines.push(`  renamed ${from} -> ${to}`);
    }
  }

  return lines;
}
