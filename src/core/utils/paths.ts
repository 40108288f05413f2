/**
 * Application path resolution.
 *
 * All knowledge about where themebake keeps its own files lives here.
 * `env-paths` picks the platform convention:
 * - Linux: `/tmp/<user>/themebake`
 * - macOS: `/var/folders/.../T/themebake`
 * - Windows: `%LOCALAPPDATA%\Temp\themebake`
 *
 * @module
 */

import * as path from "node:path";
import envPaths from "env-paths";

/**
 * Name under which the tool's directories are created.
 */
export const APP_NAME = "themebake";

/**
 * Resolved paths used by the CLI.
 */
export interface AppPaths {
  /** Parent directory of per-invocation workspaces */
  readonly workspacesDir: string;
}

/**
 * Resolves the application paths.
 *
 * Pure: nothing is created on disk.
 */
export function resolveAppPaths(): AppPaths {
  // suffix: "" prevents the "-nodejs" suffix env-paths adds by default
  const { temp } = envPaths(APP_NAME, { suffix: "" });
  return Object.freeze({
    workspacesDir: path.join(path.normalize(temp), "workspaces"),
  });
}
