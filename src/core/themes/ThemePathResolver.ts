/**
 * Installed theme lookup.
 *
 * The default starter lives inside the base theme (`<baseTheme>/whisk`), so
 * the CLI needs the base theme's installed path. A theme is a directory
 * named after its machine name that holds `<machineName>.info.yml`.
 *
 * @module
 */

import * as path from "node:path";
import fg from "fast-glob";
import { ScaffoldError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

/**
 * Resolves a theme's installed directory.
 */
export interface ThemePathResolver {
  /**
   * @returns Absolute path of the theme directory
   * @throws ScaffoldError (THEME_NOT_FOUND) when the theme is not installed
   */
  resolve(themeId: string): Promise<string>;
}

/**
 * How deep below a search path a theme directory may sit
 * (`themes/contrib/<id>` or `themes/contrib/vendor/<id>`).
 */
const SEARCH_DEPTH = 3;

/**
 * Finds themes by scanning search paths under a project root.
 *
 * Search paths are tried in order; the first match wins.
 */
export class ProjectThemePathResolver implements ThemePathResolver {
  constructor(
    private readonly projectRoot: string,
    private readonly searchPaths: readonly string[],
  ) {}

  async resolve(themeId: string): Promise<string> {
    const infoFile = `${themeId}.info.yml`;

    for (const searchPath of this.searchPaths) {
      const cwd = path.resolve(this.projectRoot, searchPath);
      const matches = await fg(`**/${fg.escapePath(themeId)}/${fg.escapePath(infoFile)}`, {
        cwd,
        deep: SEARCH_DEPTH,
        onlyFiles: true,
        ignore: ["**/node_modules/**"],
        suppressErrors: true,
      });

      if (matches.length > 0) {
        // Shallowest match first, then alphabetical for a stable pick
        matches.sort((a, b) => a.split("/").length - b.split("/").length || a.localeCompare(b));
        return path.join(cwd, path.dirname(matches[0]));
      }
    }

    throw new ScaffoldError(
      `Theme "${themeId}" is not installed`,
      ErrorCode.THEME_NOT_FOUND,
      { themeId, projectRoot: this.projectRoot, searchPaths: [...this.searchPaths] },
      undefined,
      `No ${infoFile} found under ${this.searchPaths.join(", ")}. ` +
        `Install the base theme, set "baseTheme" in themebake.config.yaml, or pass --source.`,
    );
  }
}
