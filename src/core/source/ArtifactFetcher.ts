/**
 * Artifact Fetcher.
 *
 * Downloads a remote starter archive into the workspace.
 *
 * ## Usage
 *
 * ```typescript
 * const fetcher = new ArtifactFetcher();
 * await fetcher.fetch("https://example.com/starter.zip", "/tmp/ws/pack/starter.zip");
 * ```
 *
 * The HTTP client is injectable so tests can serve bytes from memory.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import * as path from "node:path";
import { ScaffoldError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * The subset of the global `fetch` the fetcher relies on.
 */
export type FetchLike = (url: string) => Promise<Response>;

/**
 * Result of a successful download.
 */
export interface FetchedArtifact {
  /** Absolute path of the written file */
  readonly filePath: string;

  /** Number of bytes written */
  readonly size: number;
}

// =============================================================================
// Constants
// =============================================================================

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

// =============================================================================
// ArtifactFetcher
// =============================================================================

/**
 * Downloads starter archives over HTTP(S), streaming the body to disk.
 *
 * All failures surface as `SOURCE_FETCH_FAILED`. There is no retry and no
 * timeout: a hung request hangs the command.
 */
export class ArtifactFetcher {
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = (url) => fetch(url)) {
    this.fetchImpl = fetchImpl;
  }

  /**
   * Downloads `url` to `destFile`, creating its parent directory.
   *
   * @throws ScaffoldError (SOURCE_FETCH_FAILED) on unsupported protocol,
   *   network error, non-2xx status or write failure
   */
  async fetch(url: string, destFile: string): Promise<FetchedArtifact> {
    const protocol = new URL(url).protocol;
    if (!SUPPORTED_PROTOCOLS.has(protocol)) {
      throw new ScaffoldError(
        `Unsupported protocol "${protocol}" for starter download`,
        ErrorCode.SOURCE_FETCH_FAILED,
        { url, protocol },
        undefined,
        `Only http:// and https:// starters can be downloaded. ` +
          `Download the archive manually and pass the extracted directory with --source.`,
      );
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw this.wrapFetchError(url, error);
    }

    if (!response.ok) {
      throw new ScaffoldError(
        `Failed to download starter: ${response.status} ${response.statusText}`.trim(),
        ErrorCode.SOURCE_FETCH_FAILED,
        { url, status: response.status },
        undefined,
        `The server at ${url} answered with HTTP ${response.status}. Check that the URL is correct.`,
      );
    }

    try {
      await fs.mkdir(path.dirname(destFile), { recursive: true });
      if (response.body) {
        await pipeline(Readable.fromWeb(response.body), createWriteStream(destFile));
      } else {
        await fs.writeFile(destFile, "");
      }
      const { size } = await fs.stat(destFile);
      return { filePath: destFile, size };
    } catch (error) {
      throw this.wrapFetchError(url, error);
    }
  }

  private wrapFetchError(url: string, error: unknown): ScaffoldError {
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ScaffoldError(
      `Failed to download starter: ${cause.message}`,
      ErrorCode.SOURCE_FETCH_FAILED,
      { url, reason: cause.message },
      undefined,
      `Could not download ${url}. Check network connectivity and that the URL is reachable.`,
      cause,
      true,
    );
  }
}
