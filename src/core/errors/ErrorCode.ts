/**
 * Standardized error codes for themebake.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All themebake error codes.
 *
 * Codes are grouped by domain:
 * - SOURCE_* : Locating and downloading the starter
 * - ARCHIVE_* : Extracting a downloaded starter
 * - MIRROR_* : Copying the starter into the destination
 * - GENERATE_* : Placeholder substitution in the baked theme
 * - WORKSPACE_* : Temporary workspace lifecycle
 * - THEME_* : Base theme lookup
 * - CONFIG_* : Configuration file
 * - INPUT_* / USER_* : Command input
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Source errors
  SOURCE_FETCH_FAILED: "SOURCE_FETCH_FAILED",

  // Archive errors
  ARCHIVE_UNSUPPORTED: "ARCHIVE_UNSUPPORTED",
  ARCHIVE_EXTRACT_FAILED: "ARCHIVE_EXTRACT_FAILED",

  // Mirror errors
  MIRROR_FAILED: "MIRROR_FAILED",

  // Generation errors
  GENERATE_FAILED: "GENERATE_FAILED",

  // Workspace errors
  WORKSPACE_FAILED: "WORKSPACE_FAILED",

  // Theme lookup errors
  THEME_NOT_FOUND: "THEME_NOT_FOUND",

  // Configuration errors
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",

  // Input errors
  INPUT_REQUIRED: "INPUT_REQUIRED",
  INPUT_INVALID: "INPUT_INVALID",
  USER_CANCELLED: "USER_CANCELLED",

  // Internal errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
