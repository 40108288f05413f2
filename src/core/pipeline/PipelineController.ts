/**
 * Pipeline Controller.
 *
 * Runs the bake steps in order over a single {@link PipelineState}:
 *
 * ```
 * remote: FetchAndExtract -> CollapseTopLevel -> Mirror -> Finalize
 * local:                                         Mirror -> Finalize
 * ```
 *
 * The first step returning FAILED halts the run. Files already written to
 * the destination stay there. The workspace is removed on every exit path.
 *
 * @module
 */

import * as path from "node:path";
import type { ScaffoldError } from "../errors/errors.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { Step } from "../logging/Step.js";
import type { ArtifactFetcher } from "../source/ArtifactFetcher.js";
import { isRemote } from "../source/SourceResolver.js";
import type { ArchiveExtractorFactory } from "../archive/ArchiveExtractor.js";
import type { ThemeGenerator } from "../generate/SubThemeGenerator.js";
import type { WorkspaceManager } from "../workspace/WorkspaceManager.js";
import {
  StepStatus,
  type PipelineResult,
  type PipelineState,
  type PipelineStep,
  type ScaffoldRequest,
  type StepContext,
} from "./PipelineState.js";
import {
  CollapseTopLevelStep,
  FetchAndExtractStep,
  FinalizeStep,
  MirrorStep,
} from "./steps.js";

/**
 * Collaborators of a pipeline run.
 */
export interface PipelineDependencies {
  readonly logger: ContextualLogger;
  readonly workspaces: WorkspaceManager;
  readonly fetcher: ArtifactFetcher;
  readonly extractors: ArchiveExtractorFactory;
  readonly generator: ThemeGenerator;
}

/**
 * Builds the ordered step list for a source location.
 */
export function planSteps(sourceLocation: string): PipelineStep[] {
  const steps: PipelineStep[] = [];
  if (isRemote(sourceLocation)) {
    steps.push(new FetchAndExtractStep(), new CollapseTopLevelStep());
  }
  steps.push(new MirrorStep(), new FinalizeStep());
  return steps;
}

/**
 * Runs the bake pipeline for one request.
 *
 * @throws ScaffoldError (WORKSPACE_FAILED) only if the workspace cannot be
 *   created; step failures are reported through the result
 */
export async function runPipeline(
  request: ScaffoldRequest,
  deps: PipelineDependencies,
): Promise<PipelineResult> {
  const workspacePath = await deps.workspaces.create();
  const logger = deps.logger.withContext({ runId: path.basename(workspacePath) });

  const state: PipelineState = {
    workspacePath,
    resolvedSourceDir: request.sourceLocation,
    destinationDir: request.destinationDir,
  };

  let failure: ScaffoldError | undefined;
  const context: StepContext = {
    request,
    logger,
    fetcher: deps.fetcher,
    extractors: deps.extractors,
    generator: deps.generator,
    fail(error) {
      failure = error;
      return StepStatus.FAILED;
    },
  };

  const stepsRun: Step[] = [];
  try {
    for (const step of planSteps(request.sourceLocation)) {
      stepsRun.push(step.name);
      const status = await step.run(state, context);

      if (status !== StepStatus.OK) {
        logger.debug("Pipeline halted", { step: step.name });
        return {
          status: StepStatus.FAILED,
          stepsRun,
          failedStep: step.name,
          error: failure,
          state,
        };
      }
    }

    return { status: StepStatus.OK, stepsRun, state };
  } finally {
    await deps.workspaces.cleanup(workspacePath);
  }
}
