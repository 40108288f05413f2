/**
 * Source location classification.
 *
 * A starter location is either a remote URL (downloaded and extracted) or a
 * local directory (mirrored as-is).
 *
 * @module
 */

import * as path from "node:path";

/**
 * File name used when a URL path has no basename.
 */
export const FALLBACK_ARTIFACT_NAME = "starter-pack";

/**
 * Checks whether a location is a well-formed absolute URL with a host.
 *
 * Filesystem paths (relative, absolute, Windows drive paths) and
 * `file:///` URLs have no host and are treated as local.
 */
export function isRemote(location: string): boolean {
  let url: URL;
  try {
    url = new URL(location);
  } catch {
    return false;
  }
  return url.protocol.length > 1 && url.hostname.length > 0;
}

/**
 * Derives the local file name for a downloaded artifact from its URL.
 *
 * Query string and fragment are ignored.
 *
 * @example
 * ```typescript
 * deriveFileName("https://example.com/path/to/pack.zip?x=1"); // "pack.zip"
 * ```
 */
export function deriveFileName(url: string): string {
  const pathname = new URL(url).pathname;
  const basename = path.posix.basename(pathname);

  let decoded: string;
  try {
    decoded = decodeURIComponent(basename);
  } catch {
    decoded = basename;
  }

  // A decoded name must still be a single path segment
  const safe = decoded.replace(/[\\/]/g, "_");
  if (safe === "" || safe === "." || safe === "..") {
    return FALLBACK_ARTIFACT_NAME;
  }
  return safe;
}
