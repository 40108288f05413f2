/**
 * Pipeline steps.
 *
 * Every step catches its own failures, logs them at error level and returns
 * {@link StepStatus.FAILED}; none of them throws.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ScaffoldError, wrapError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { Step } from "../logging/Step.js";
import { deriveFileName } from "../source/SourceResolver.js";
import { collapseTopLevelDir } from "../archive/topLevelDir.js";
import { mirrorDirectory } from "../fs/mirror.js";
import { WorkspaceLayout } from "../workspace/WorkspaceManager.js";
import {
  StepStatus,
  type PipelineState,
  type PipelineStep,
  type StepContext,
} from "./PipelineState.js";

// =============================================================================
// FetchAndExtract
// =============================================================================

/**
 * Downloads the remote starter into `<workspace>/pack/` and extracts it into
 * `<workspace>/recipe/`.
 */
export class FetchAndExtractStep implements PipelineStep {
  readonly name = Step.FETCH_EXTRACT;

  async run(state: PipelineState, context: StepContext): Promise<StepStatus> {
    const logger = context.logger.withContext({ step: this.name });
    const url = context.request.sourceLocation;

    logger.debug("Downloading starter", { recipeUrl: url });

    const packDir = path.join(state.workspacePath, WorkspaceLayout.PACK);
    const packPath = path.join(packDir, deriveFileName(url));

    try {
      await fs.mkdir(packDir, { recursive: true });
      await context.fetcher.fetch(url, packPath);
    } catch (error) {
      const err = wrapError(error, ErrorCode.SOURCE_FETCH_FAILED, "Failed to download starter", {
        url,
      });
      logger.error(err.message, { error: err });
      return context.fail(err);
    }
    state.packedArtifactPath = packPath;

    const recipeDir = path.join(state.workspacePath, WorkspaceLayout.RECIPE);
    logger.debug("Extracting starter", { packPath, recipeDir });

    try {
      const extractor = await context.extractors.forFile(packPath);
      if (!extractor) {
        throw new ScaffoldError(
          `Unsupported archive format: ${path.basename(packPath)}`,
          ErrorCode.ARCHIVE_UNSUPPORTED,
          { packPath },
          undefined,
          "Starter archives must be .zip, .tar, .tar.gz or .tgz files.",
        );
      }
      await extractor.extractTo(recipeDir);
    } catch (error) {
      const err = wrapError(error, ErrorCode.ARCHIVE_EXTRACT_FAILED, "Failed to extract starter", {
        packPath,
      });
      logger.error(err.message, { error: err });
      return context.fail(err);
    }

    state.resolvedSourceDir = recipeDir;
    return StepStatus.OK;
  }
}

// =============================================================================
// CollapseTopLevel
// =============================================================================

/**
 * Points the source at the single wrapper directory of an extracted archive,
 * when there is one.
 */
export class CollapseTopLevelStep implements PipelineStep {
  readonly name = Step.COLLAPSE;

  async run(state: PipelineState, context: StepContext): Promise<StepStatus> {
    const logger = context.logger.withContext({ step: this.name });

    try {
      const collapsed = await collapseTopLevelDir(state.resolvedSourceDir);
      if (collapsed !== state.resolvedSourceDir) {
        logger.debug("Skipping wrapper directory", { srcDir: collapsed });
        state.resolvedSourceDir = collapsed;
      }
    } catch (error) {
      const err = wrapError(error, ErrorCode.ARCHIVE_EXTRACT_FAILED, "Failed to inspect extracted starter", {
        srcDir: state.resolvedSourceDir,
      });
      logger.error(err.message, { error: err });
      return context.fail(err);
    }

    return StepStatus.OK;
  }
}

// =============================================================================
// Mirror
// =============================================================================

/**
 * Copies the starter into the destination directory.
 */
export class MirrorStep implements PipelineStep {
  readonly name = Step.MIRROR;

  async run(state: PipelineState, context: StepContext): Promise<StepStatus> {
    const logger = context.logger.withContext({ step: this.name });
    logger.debug("Copying starter", {
      srcDir: state.resolvedSourceDir,
      dstDir: state.destinationDir,
    });

    try {
      state.mirrored = await mirrorDirectory(state.resolvedSourceDir, state.destinationDir);
    } catch (error) {
      const err = wrapError(
        error,
        ErrorCode.MIRROR_FAILED,
        "Failed to copy starter",
        { srcDir: state.resolvedSourceDir, dstDir: state.destinationDir },
        `Check that ${state.destinationDir} is writable and that the starter directory exists.`,
      );
      logger.error(err.message, { error: err });
      return context.fail(err);
    }

    return StepStatus.OK;
  }
}

// =============================================================================
// Finalize
// =============================================================================

/**
 * Rewrites placeholders in the destination through the generator.
 */
export class FinalizeStep implements PipelineStep {
  readonly name = Step.FINALIZE;

  async run(state: PipelineState, context: StepContext): Promise<StepStatus> {
    const logger = context.logger.withContext({ step: this.name });
    logger.debug("Customizing starter", { dstDir: state.destinationDir });

    try {
      state.generated = await context.generator.generate({
        destinationDir: state.destinationDir,
        machineName: context.request.machineName,
        displayName: context.request.rawLabel,
      });
    } catch (error) {
      const err = wrapError(error, ErrorCode.GENERATE_FAILED, "Failed to customize sub-theme", {
        dstDir: state.destinationDir,
      });
      logger.error(err.message, { error: err });
      return context.fail(err);
    }

    return StepStatus.OK;
  }
}
