/**
 * Archive extraction contracts and the default extractor factory.
 *
 * The pipeline never decodes archive formats itself: it asks an
 * {@link ArchiveExtractorFactory} for an extractor bound to the downloaded
 * file and tells it where to extract.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { ZipExtractor } from "./ZipExtractor.js";
import { TarExtractor } from "./TarExtractor.js";

// =============================================================================
// Types
// =============================================================================

export type ArchiveFormat = "zip" | "tar" | "tar.gz";

/**
 * Extracts one archive file.
 */
export interface ArchiveExtractor {
  /** Format this extractor decodes */
  readonly format: ArchiveFormat;

  /**
   * Extracts the archive into `destDir`, creating it if missing.
   * Rejects when the archive is corrupt or an entry escapes `destDir`.
   */
  extractTo(destDir: string): Promise<void>;
}

/**
 * Resolves an extractor for an archive file.
 */
export interface ArchiveExtractorFactory {
  /**
   * @returns An extractor bound to `filePath`, or `undefined` when the
   *   format is not recognised
   */
  forFile(filePath: string): Promise<ArchiveExtractor | undefined>;
}

// =============================================================================
// Format Detection
// =============================================================================

const EXTENSION_FORMATS: ReadonlyArray<readonly [string, ArchiveFormat]> = [
  [".tar.gz", "tar.gz"],
  [".tgz", "tar.gz"],
  [".tar", "tar"],
  [".zip", "zip"],
];

/** Bytes needed to see the `ustar` magic at offset 257 */
const SNIFF_SIZE = 262;

/**
 * Detects the format from the file name alone.
 */
export function formatFromFileName(filePath: string): ArchiveFormat | undefined {
  const lower = filePath.toLowerCase();
  for (const [extension, format] of EXTENSION_FORMATS) {
    if (lower.endsWith(extension)) {
      return format;
    }
  }
  return undefined;
}

/**
 * Detects the format from the leading bytes of a file.
 */
export function formatFromMagic(header: Buffer): ArchiveFormat | undefined {
  if (header.length >= 4 && header.readUInt32BE(0) === 0x504b0304) {
    return "zip";
  }
  if (header.length >= 2 && header[0] === 0x1f && header[1] === 0x8b) {
    return "tar.gz";
  }
  if (header.length >= 262 && header.toString("latin1", 257, 262) === "ustar") {
    return "tar";
  }
  return undefined;
}

async function readHeader(filePath: string): Promise<Buffer> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(SNIFF_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_SIZE, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

// =============================================================================
// Default Factory
// =============================================================================

/**
 * Recognises zip and tar archives, by extension first and by content when
 * the name carries no known extension (download URLs often lack one).
 */
export class DefaultArchiveExtractorFactory implements ArchiveExtractorFactory {
  async forFile(filePath: string): Promise<ArchiveExtractor | undefined> {
    const format = formatFromFileName(filePath) ?? formatFromMagic(await readHeader(filePath));

    switch (format) {
      case "zip":
        return new ZipExtractor(filePath);
      case "tar":
      case "tar.gz":
        return new TarExtractor(filePath, format);
      default:
        return undefined;
    }
  }
}
