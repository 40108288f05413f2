/**
 * Configuration Loader for themebake.
 *
 * Reads the optional `themebake.config.yaml` from the project root and
 * validates it. A missing file yields the defaults.
 *
 * ## Example
 *
 * ```yaml
 * baseTheme: emulsify
 * starterDir: whisk
 * destinationRoot: web/themes/custom
 * placeholders:
 *   machineName: whisk
 *   displayName: Whisk
 * ```
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { ScaffoldError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILENAME = "themebake.config.yaml";

/**
 * Environment variable overriding the configured source.
 */
export const SOURCE_ENV_VAR = "THEMEBAKE_SOURCE";

// =============================================================================
// Zod Schemas
// =============================================================================

const nonEmptyString = (fieldName: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, { message: `${fieldName} cannot be empty` });

const themeIdSchema = nonEmptyString("baseTheme").refine((s) => /^[a-z0-9_]+$/.test(s), {
  message: "baseTheme must be a machine name ([a-z0-9_])",
});

const PlaceholdersSchema = z
  .object({
    machineName: nonEmptyString("placeholders.machineName").default("whisk"),
    displayName: nonEmptyString("placeholders.displayName").default("Whisk"),
  })
  .strict();

const ConfigSchema = z
  .object({
    baseTheme: themeIdSchema.default("emulsify"),
    starterDir: nonEmptyString("starterDir").default("whisk"),
    source: nonEmptyString("source").optional(),
    destinationRoot: nonEmptyString("destinationRoot").default("themes/custom"),
    themeSearchPaths: z
      .array(nonEmptyString("themeSearchPaths entry"))
      .min(1)
      .default(["themes/contrib", "themes", "web/themes/contrib", "web/themes"]),
    placeholders: PlaceholdersSchema.default({}),
  })
  .strict();

/**
 * Validated configuration with defaults applied.
 */
export type ThemebakeConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Returns the configuration with every default applied.
 */
export function defaultConfig(): ThemebakeConfig {
  return ConfigSchema.parse({});
}

/**
 * Loads `themebake.config.yaml` from `projectRoot`.
 *
 * @throws ScaffoldError (CONFIG_PARSE_FAILED) on unreadable file or bad YAML
 * @throws ScaffoldError (CONFIG_INVALID) when the schema does not match
 */
export async function loadConfig(projectRoot: string): Promise<ThemebakeConfig> {
  const configPath = path.join(projectRoot, CONFIG_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return defaultConfig();
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ScaffoldError(
      "Failed to read configuration file",
      ErrorCode.CONFIG_PARSE_FAILED,
      { configPath, reason: cause.message },
      undefined,
      `Could not read ${configPath}. ${cause.message}`,
      cause,
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const details: Record<string, unknown> = { configPath };
    if (error instanceof YAMLParseError) {
      details.line = error.linePos?.[0]?.line;
      details.column = error.linePos?.[0]?.col;
    }
    throw new ScaffoldError(
      "Invalid YAML syntax in configuration",
      ErrorCode.CONFIG_PARSE_FAILED,
      details,
      undefined,
      `Failed to parse ${CONFIG_FILENAME}: ${cause.message}`,
      cause,
    );
  }

  // An empty file parses to null and means "all defaults"
  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${fieldPath}: ${issue.message}`;
    });

    throw new ScaffoldError(
      "Invalid configuration",
      ErrorCode.CONFIG_INVALID,
      { configPath, issues },
      undefined,
      `Fix ${CONFIG_FILENAME}: ${issues.join("; ")}`,
    );
  }

  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
