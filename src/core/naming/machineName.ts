/**
 * Machine name derivation for sub-theme labels.
 *
 * A machine name is the identifier-safe form of a human label: it names the
 * theme directory and replaces the starter's machine-name placeholder.
 *
 * @module
 */

/**
 * Every maximal run of characters outside `[a-z0-9_]`.
 */
const DISALLOWED_RUN = /[^a-z0-9_]+/g;

/**
 * Converts a label to a machine name.
 *
 * The label is lowered first (locale-independent), then runs of
 * disallowed characters collapse to a single `_`. Leading and trailing
 * underscores are kept.
 *
 * @example
 * ```typescript
 * toMachineName("My Theme!!"); // "my_theme_"
 * toMachineName("");           // ""
 * ```
 */
export function toMachineName(label: string): string {
  return label.toLowerCase().replace(DISALLOWED_RUN, "_");
}

/**
 * Whether a machine name can name a theme directory.
 * It must carry at least one letter or digit.
 */
export function isUsableMachineName(machineName: string): boolean {
  return /[a-z0-9]/.test(machineName);
}
