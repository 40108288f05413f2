import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Resolves the real template root of an extracted archive.
 *
 * Release archives usually wrap their content in one folder named after the
 * tag (`starter-1.2.0/`). When `extractedDir` holds exactly one entry and it
 * is a directory, that directory is returned; otherwise `extractedDir`
 * itself. Only direct children are inspected.
 */
export async function collapseTopLevelDir(extractedDir: string): Promise<string> {
  const entries = await fs.readdir(extractedDir, { withFileTypes: true });

  if (entries.length === 1 && entries[0].isDirectory()) {
    return path.join(extractedDir, entries[0].name);
  }

  return extractedDir;
}
