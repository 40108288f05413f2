/**
 * Sub-theme Generator.
 *
 * Turns a freshly mirrored starter into a named sub-theme by rewriting its
 * placeholder tokens in place.
 *
 * ## Process
 *
 * 1. Enumerate every file under the destination (dotfiles included,
 *    `node_modules/` and `.git/` skipped)
 * 2. Replace each placeholder in text files, longest placeholder first
 * 3. Rename files whose basename carries the machine-name placeholder
 *    (`whisk.info.yml` -> `my_theme.info.yml`)
 *
 * Binary files (a NUL byte in the first 8 KiB) are never rewritten.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

// =============================================================================
// Types
// =============================================================================

/**
 * Values a generator writes into the baked theme.
 */
export interface GenerateParams {
  /** Absolute path of the mirrored starter */
  readonly destinationDir: string;

  /** Machine name of the new theme */
  readonly machineName: string;

  /** Human-readable name of the new theme */
  readonly displayName: string;
}

/**
 * A file rename performed by the generator.
 */
export interface RenamedFile {
  readonly from: string;
  readonly to: string;
}

/**
 * Result of a generate run. Paths are relative to the destination.
 */
export interface GenerateResult {
  /** Files whose content changed (paths before renaming) */
  readonly filesRewritten: string[];

  /** Files renamed after their content was rewritten */
  readonly filesRenamed: RenamedFile[];
}

/**
 * Rewrites placeholders inside a baked theme.
 */
export interface ThemeGenerator {
  generate(params: GenerateParams): Promise<GenerateResult>;
}

/**
 * Tokens the starter uses in place of the new theme's names.
 */
export interface Placeholders {
  readonly machineName: string;
  readonly displayName: string;
}

// =============================================================================
// Helpers
// =============================================================================

const BINARY_CHECK_SIZE = 8192;

const IGNORED = ["**/node_modules/**", "**/.git/**"];

async function isBinaryFile(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(BINARY_CHECK_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_CHECK_SIZE, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Replaces every occurrence of each key in a single pass. Longer keys win
 * where keys overlap, and inserted values are never scanned again.
 */
export function replaceTokens(input: string, replacements: Record<string, string>): string {
  const keys = Object.keys(replacements)
    .filter((key) => key.length > 0)
    .sort((a, b) => b.length - a.length);
  if (keys.length === 0) {
    return input;
  }

  const pattern = new RegExp(keys.map(escapeRegExp).join("|"), "g");
  return input.replace(pattern, (match) => replacements[match] ?? match);
}

// =============================================================================
// SubThemeGenerator
// =============================================================================

export class SubThemeGenerator implements ThemeGenerator {
  constructor(private readonly placeholders: Placeholders) {}

  async generate(params: GenerateParams): Promise<GenerateResult> {
    const { destinationDir, machineName, displayName } = params;
    const replacements: Record<string, string> = {
      [this.placeholders.machineName]: machineName,
      [this.placeholders.displayName]: displayName,
    };

    const files = await fg("**/*", {
      cwd: destinationDir,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: IGNORED,
    });
    files.sort();

    const filesRewritten: string[] = [];
    const filesRenamed: RenamedFile[] = [];

    for (const relativePath of files) {
      const absolutePath = path.join(destinationDir, relativePath);

      if (!(await isBinaryFile(absolutePath))) {
        const content = await fs.readFile(absolutePath, "utf-8");
        const rewritten = replaceTokens(content, replacements);
        if (rewritten !== content) {
          await fs.writeFile(absolutePath, rewritten, "utf-8");
          filesRewritten.push(relativePath);
        }
      }

      const basename = path.posix.basename(relativePath);
      const renamed = basename
        .split(this.placeholders.machineName)
        .join(machineName);
      if (renamed !== basename) {
        const to = path.posix.join(path.posix.dirname(relativePath), renamed);
        await fs.rename(absolutePath, path.join(destinationDir, to));
        filesRenamed.push({ from: relativePath, to });
      }
    }

    return { filesRewritten, filesRenamed };
  }
}
