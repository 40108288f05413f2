/**
 * Integration tests for the bake pipeline.
 *
 * Runs real steps against temp directories; remote starters are served
 * from memory through an injected fetch.
 *
 * @module
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import JSZip from "jszip";
import { runPipeline, planSteps, type PipelineDependencies } from "../src/core/pipeline/PipelineController.js";
import { StepStatus, type ScaffoldRequest } from "../src/core/pipeline/PipelineState.js";
import { createLogger, nullSink } from "../src/core/logging/ContextualLogger.js";
import { Step } from "../src/core/logging/Step.js";
import { WorkspaceManager } from "../src/core/workspace/WorkspaceManager.js";
import { ArtifactFetcher, type FetchLike } from "../src/core/source/ArtifactFetcher.js";
import { DefaultArchiveExtractorFactory } from "../src/core/archive/ArchiveExtractor.js";
import { SubThemeGenerator, type ThemeGenerator } from "../src/core/generate/SubThemeGenerator.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";

// =============================================================================
// Test Helpers
// =============================================================================

async function zipBytes(files: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "uint8array" });
}

function serve(body: Uint8Array | string): FetchLike {
  return async () => new Response(body);
}

// =============================================================================
// planSteps
// =============================================================================

describe("planSteps", () => {
  it("runs fetch and collapse only for remote sources", () => {
    expect(planSteps("https://example.com/starter.zip").map((s) => s.name)).toEqual([
      Step.FETCH_EXTRACT,
      Step.COLLAPSE,
      Step.MIRROR,
      Step.FINALIZE,
    ]);
    expect(planSteps("/srv/starter").map((s) => s.name)).toEqual([Step.MIRROR, Step.FINALIZE]);
  });
});

// =============================================================================
// runPipeline
// =============================================================================

describe("runPipeline", () => {
  let baseDir: string;
  let workspacesDir: string;
  let destinationDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "themebake-pipeline-test-"));
    workspacesDir = path.join(baseDir, "workspaces");
    destinationDir = path.join(baseDir, "project", "themes", "custom", "my_theme");
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  function request(sourceLocation: string): ScaffoldRequest {
    return { rawLabel: "My Theme", machineName: "my_theme", sourceLocation, destinationDir };
  }

  function deps(overrides: Partial<PipelineDependencies> = {}): PipelineDependencies {
    return {
      logger: createLogger({ sink: nullSink }),
      workspaces: new WorkspaceManager(workspacesDir),
      fetcher: new ArtifactFetcher(serve("")),
      extractors: new DefaultArchiveExtractorFactory(),
      generator: new SubThemeGenerator({ machineName: "whisk", displayName: "Whisk" }),
      ...overrides,
    };
  }

  async function createLocalStarter(): Promise<string> {
    const starter = path.join(baseDir, "starter");
    await fs.mkdir(path.join(starter, "templates"), { recursive: true });
    await fs.writeFile(path.join(starter, "whisk.info.yml"), "name: Whisk\n");
    await fs.writeFile(path.join(starter, "templates", "page.twig"), "<main></main>\n");
    return starter;
  }

  it("mirrors and customizes a local starter", async () => {
    const starter = await createLocalStarter();

    const result = await runPipeline(request(starter), deps());

    expect(result.status).toBe(StepStatus.OK);
    expect(result.stepsRun).toEqual([Step.MIRROR, Step.FINALIZE]);
    expect(result.state.mirrored?.files).toEqual(["templates/page.twig", "whisk.info.yml"]);
    expect(await fs.readFile(path.join(destinationDir, "my_theme.info.yml"), "utf-8")).toBe(
      "name: My Theme\n",
    );
    expect(await fs.readFile(path.join(destinationDir, "templates", "page.twig"), "utf-8")).toBe(
      "<main></main>\n",
    );
  });

  it("downloads, extracts and collapses a remote zip", async () => {
    const bytes = await zipBytes({
      "whisk-main/whisk.info.yml": "name: Whisk\n",
      "whisk-main/templates/page.twig": "<main></main>\n",
    });

    const result = await runPipeline(
      request("https://example.com/starter.zip"),
      deps({ fetcher: new ArtifactFetcher(serve(bytes)) }),
    );

    expect(result.status).toBe(StepStatus.OK);
    expect(result.stepsRun).toEqual([
      Step.FETCH_EXTRACT,
      Step.COLLAPSE,
      Step.MIRROR,
      Step.FINALIZE,
    ]);
    expect(await fs.readFile(path.join(destinationDir, "my_theme.info.yml"), "utf-8")).toBe(
      "name: My Theme\n",
    );
    await expect(fs.access(path.join(destinationDir, "whisk-main"))).rejects.toThrow();
  });

  it("halts with SOURCE_FETCH_FAILED when the download fails", async () => {
    const generator: ThemeGenerator = { generate: vi.fn() };
    const fetcher = new ArtifactFetcher(
      async () => new Response("", { status: 404, statusText: "Not Found" }),
    );

    const result = await runPipeline(
      request("https://example.com/starter.zip"),
      deps({ fetcher, generator }),
    );

    expect(result.status).toBe(StepStatus.FAILED);
    expect(result.failedStep).toBe(Step.FETCH_EXTRACT);
    expect(result.stepsRun).toEqual([Step.FETCH_EXTRACT]);
    expect(result.error?.code).toBe(ErrorCode.SOURCE_FETCH_FAILED);
    expect(generator.generate).not.toHaveBeenCalled();
    await expect(fs.access(destinationDir)).rejects.toThrow();
  });

  it("halts with ARCHIVE_UNSUPPORTED when the download is not an archive", async () => {
    const result = await runPipeline(
      request("https://example.com/download"),
      deps({ fetcher: new ArtifactFetcher(serve("<html></html>")) }),
    );

    expect(result.failedStep).toBe(Step.FETCH_EXTRACT);
    expect(result.error?.code).toBe(ErrorCode.ARCHIVE_UNSUPPORTED);
    expect(result.error?.message).toBe("Unsupported archive format: download");
  });

  it("halts with MIRROR_FAILED before customizing", async () => {
    const generator: ThemeGenerator = { generate: vi.fn() };

    const result = await runPipeline(
      request(path.join(baseDir, "missing-starter")),
      deps({ generator }),
    );

    expect(result.failedStep).toBe(Step.MIRROR);
    expect(result.error?.code).toBe(ErrorCode.MIRROR_FAILED);
    expect(result.error?.message).toMatch(/^Failed to copy starter: /);
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it("reports GENERATE_FAILED and keeps the mirrored files", async () => {
    const starter = await createLocalStarter();
    const generator: ThemeGenerator = {
      generate: vi.fn(async () => {
        throw new Error("boom");
      }),
    };

    const result = await runPipeline(request(starter), deps({ generator }));

    expect(result.failedStep).toBe(Step.FINALIZE);
    expect(result.error?.code).toBe(ErrorCode.GENERATE_FAILED);
    expect(result.error?.message).toBe("Failed to customize sub-theme: boom");
    expect(await fs.readFile(path.join(destinationDir, "whisk.info.yml"), "utf-8")).toBe(
      "name: Whisk\n",
    );
  });

  it("passes the label and machine name to the generator", async () => {
    const starter = await createLocalStarter();
    const generate = vi.fn(async () => ({ filesRewritten: [], filesRenamed: [] }));

    await runPipeline(request(starter), deps({ generator: { generate } }));

    expect(generate).toHaveBeenCalledWith({
      destinationDir,
      machineName: "my_theme",
      displayName: "My Theme",
    });
  });

  it("removes the workspace on success and on failure", async () => {
    const bytes = await zipBytes({ "whisk.info.yml": "name: Whisk\n" });

    await runPipeline(
      request("https://example.com/starter.zip"),
      deps({ fetcher: new ArtifactFetcher(serve(bytes)) }),
    );
    await runPipeline(
      request("https://example.com/download"),
      deps({ fetcher: new ArtifactFetcher(serve("<html></html>")) }),
    );

    expect(await fs.readdir(workspacesDir)).toEqual([]);
  });

  it("rejects with WORKSPACE_FAILED when no workspace can be created", async () => {
    await fs.writeFile(path.join(baseDir, "blocker"), "");
    const starter = await createLocalStarter();

    await expect(
      runPipeline(
        request(starter),
        deps({ workspaces: new WorkspaceManager(path.join(baseDir, "blocker")) }),
      ),
    ).rejects.toMatchObject({ code: ErrorCode.WORKSPACE_FAILED });
    await expect(fs.access(destinationDir)).rejects.toThrow();
  });
});
