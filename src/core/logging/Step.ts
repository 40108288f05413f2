/**
 * Pipeline step identifiers for structured logging.
 *
 * Source steps are namespaced as `source.<action>`; the others carry a
 * single word.
 *
 * @module
 */

export const Step = {
  /** Loading configuration and resolving the starter location */
  SETUP: "setup",

  /** Creating and removing the temporary workspace */
  WORKSPACE: "workspace",

  /** Downloading the starter archive and extracting it */
  FETCH_EXTRACT: "source.fetch_extract",

  /** Skipping a single wrapper directory in the extracted archive */
  COLLAPSE: "source.collapse",

  /** Copying the starter into the destination */
  MIRROR: "mirror",

  /** Rewriting placeholders in the destination */
  FINALIZE: "finalize",
} as const;

export type Step = (typeof Step)[keyof typeof Step];
