import * as fs from "node:fs/promises";
import * as path from "node:path";
import JSZip from "jszip";
import { ScaffoldError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ArchiveExtractor } from "./ArchiveExtractor.js";

/**
 * Extracts `.zip` archives with JSZip.
 */
export class ZipExtractor implements ArchiveExtractor {
  readonly format = "zip" as const;

  constructor(private readonly filePath: string) {}

  async extractTo(destDir: string): Promise<void> {
    const zip = await JSZip.loadAsync(await fs.readFile(this.filePath));
    const root = path.resolve(destDir);
    await fs.mkdir(root, { recursive: true });

    for (const entry of Object.values(zip.files)) {
      const target = path.resolve(root, entry.name);

      // Entry must stay inside the extraction root
      if (target !== root && !target.startsWith(root + path.sep)) {
        throw new ScaffoldError(
          `Archive entry escapes extraction directory: ${entry.name}`,
          ErrorCode.ARCHIVE_EXTRACT_FAILED,
          { archive: this.filePath, entry: entry.name },
          undefined,
          `The archive ${path.basename(this.filePath)} contains unsafe paths and was not extracted.`,
        );
      }

      if (entry.dir) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }

      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await entry.async("nodebuffer"));

      const mode = typeof entry.unixPermissions === "number" ? entry.unixPermissions & 0o777 : 0;
      if (mode !== 0) {
        await fs.chmod(target, mode);
      }
    }
  }
}
