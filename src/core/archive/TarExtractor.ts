import * as fs from "node:fs/promises";
import * as tar from "tar";
import type { ArchiveExtractor, ArchiveFormat } from "./ArchiveExtractor.js";

/**
 * Extracts `.tar`, `.tar.gz` and `.tgz` archives with node-tar.
 *
 * `strict` turns tar warnings (unsafe paths, bad headers) into errors.
 */
export class TarExtractor implements ArchiveExtractor {
  constructor(
    private readonly filePath: string,
    readonly format: Extract<ArchiveFormat, "tar" | "tar.gz">,
  ) {}

  async extractTo(destDir: string): Promise<void> {
    await fs.mkdir(destDir, { recursive: true });
    await tar.x({ file: this.filePath, cwd: destDir, strict: true });
  }
}
