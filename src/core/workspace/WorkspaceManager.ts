/**
 * Workspace Manager - per-invocation temporary directories.
 *
 * Every bake gets a fresh workspace under `<baseDir>/<timestamp>-<random>/`
 * holding the downloaded archive (`pack/`) and its extraction (`recipe/`).
 * The workspace is never reused and is deleted when the pipeline ends,
 * whatever the outcome.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { ScaffoldError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Logger interface for workspace operations.
 */
export interface WorkspaceLogger {
  debug(message: string, ctx?: Record<string, unknown>): void;
  warn(message: string, ctx?: Record<string, unknown>): void;
}

/**
 * Subdirectory names inside a workspace.
 */
export const WorkspaceLayout = {
  /** Downloaded archive */
  PACK: "pack",

  /** Extracted archive */
  RECIPE: "recipe",
} as const;

// =============================================================================
// WorkspaceManager Class
// =============================================================================

/**
 * Creates and removes workspaces.
 *
 * @example
 * ```typescript
 * const manager = new WorkspaceManager(resolveAppPaths().workspacesDir);
 * const workspace = await manager.create();
 * try {
 *   // ... download and extract under workspace ...
 * } finally {
 *   await manager.cleanup(workspace);
 * }
 * ```
 */
export class WorkspaceManager {
  constructor(
    private readonly baseDir: string,
    private readonly logger?: WorkspaceLogger,
  ) {}

  /**
   * Creates a new unique workspace directory.
   *
   * @returns Absolute path of the workspace
   * @throws ScaffoldError (WORKSPACE_FAILED) if the directory cannot be created
   */
  async create(): Promise<string> {
    const name = `${Date.now()}-${randomBytes(4).toString("hex")}`;
    const workspace = path.resolve(this.baseDir, name);

    try {
      await fs.mkdir(workspace, { recursive: true });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ScaffoldError(
        `Failed to create workspace: ${cause.message}`,
        ErrorCode.WORKSPACE_FAILED,
        { baseDir: this.baseDir, workspace },
        undefined,
        `Could not create a temporary directory under ${this.baseDir}. Check its permissions.`,
        cause,
      );
    }

    this.logger?.debug("Created workspace", { workspace });
    return workspace;
  }

  /**
   * Removes a workspace and everything in it.
   *
   * A failure is logged as a warning and not rethrown, so it never masks
   * the pipeline outcome.
   */
  async cleanup(workspace: string): Promise<void> {
    try {
      await fs.rm(workspace, { recursive: true, force: true });
      this.logger?.debug("Removed workspace", { workspace });
    } catch (error) {
      this.logger?.warn("Failed to remove workspace", {
        workspace,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
