/**
 * Pipeline data model.
 *
 * @module
 */

import type { ScaffoldError } from "../errors/errors.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import type { Step } from "../logging/Step.js";
import type { ArtifactFetcher } from "../source/ArtifactFetcher.js";
import type { ArchiveExtractorFactory } from "../archive/ArchiveExtractor.js";
import type { GenerateResult, ThemeGenerator } from "../generate/SubThemeGenerator.js";
import type { MirrorResult } from "../fs/mirror.js";

/**
 * One bake request, fixed before the pipeline starts.
 */
export interface ScaffoldRequest {
  /** Label as typed by the user */
  readonly rawLabel: string;

  /** Machine name derived from the label */
  readonly machineName: string;

  /** Starter URL or absolute local directory */
  readonly sourceLocation: string;

  /** Absolute destination directory, never recomputed */
  readonly destinationDir: string;
}

/**
 * Scratch state handed from step to step.
 *
 * Owned by the controller for one invocation; steps mutate it in order and
 * never concurrently.
 */
export interface PipelineState {
  /** Temporary workspace of this invocation */
  readonly workspacePath: string;

  /** Downloaded archive, set by the fetch step */
  packedArtifactPath?: string;

  /** Directory the mirror step copies from */
  resolvedSourceDir: string;

  readonly destinationDir: string;

  /** Set by the mirror step */
  mirrored?: MirrorResult;

  /** Set by the finalize step */
  generated?: GenerateResult;
}

/**
 * Outcome of a step: 0 to continue, 1 to halt the pipeline.
 */
export const StepStatus = {
  OK: 0,
  FAILED: 1,
} as const;

export type StepStatus = (typeof StepStatus)[keyof typeof StepStatus];

/**
 * Collaborators and request data shared by every step.
 */
export interface StepContext {
  readonly request: ScaffoldRequest;
  readonly logger: ContextualLogger;
  readonly fetcher: ArtifactFetcher;
  readonly extractors: ArchiveExtractorFactory;
  readonly generator: ThemeGenerator;

  /** Records the error that made the current step fail */
  fail(error: ScaffoldError): StepStatus;
}

/**
 * A unit of work over the pipeline state.
 */
export interface PipelineStep {
  readonly name: Step;
  run(state: PipelineState, context: StepContext): Promise<StepStatus>;
}

/**
 * Result of a pipeline run.
 */
export interface PipelineResult {
  readonly status: StepStatus;

  /** Steps that ran, in order, including the failing one */
  readonly stepsRun: Step[];

  /** The step that returned FAILED */
  readonly failedStep?: Step;

  /** Error logged by the failing step */
  readonly error?: ScaffoldError;

  /** Final state (the workspace it names no longer exists) */
  readonly state: PipelineState;
}
