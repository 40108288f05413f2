/**
 * Recursive additive directory copy.
 *
 * `mirrorDirectory` makes every file of the source exist in the destination
 * with the same content. Destination files with the same relative path are
 * overwritten; destination files the source does not have are left alone.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Result of a mirror operation.
 */
export interface MirrorResult {
  /** Relative (POSIX) paths of the files and links written */
  readonly files: string[];

  /** Relative (POSIX) paths of the directories created or reused */
  readonly directories: string[];
}

/**
 * Copies `sourceDir` into `destDir`, creating `destDir` and any missing
 * intermediate directories.
 *
 * File modes are preserved. Symbolic links are recreated as links rather
 * than followed.
 *
 * @throws The underlying filesystem error (permission, ENOTDIR, disk full)
 */
export async function mirrorDirectory(sourceDir: string, destDir: string): Promise<MirrorResult> {
  // The destination is only created once the source is known to be a directory
  const source = await fs.stat(sourceDir);
  if (!source.isDirectory()) {
    throw new Error(`Starter is not a directory: ${sourceDir}`);
  }

  const result: MirrorResult = { files: [], directories: [] };
  await copyTree(sourceDir, destDir, "", result);
  return result;
}

async function copyTree(
  src: string,
  dest: string,
  relative: string,
  result: MirrorResult,
): Promise<void> {
  await fs.mkdir(dest, { recursive: true });

  const entries = await fs.readdir(src, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const srcPath = path.join(src, entry.name);
    const destPath = path.join(dest, entry.name);
    const relPath = relative ? `${relative}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      result.directories.push(relPath);
      await copyTree(srcPath, destPath, relPath, result);
    } else if (entry.isSymbolicLink()) {
      const linkTarget = await fs.readlink(srcPath);
      await fs.rm(destPath, { force: true });
      await fs.symlink(linkTarget, destPath);
      result.files.push(relPath);
    } else {
      await fs.copyFile(srcPath, destPath);
      const { mode } = await fs.stat(srcPath);
      await fs.chmod(destPath, mode);
      result.files.push(relPath);
    }
  }
}
