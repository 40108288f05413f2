/**
 * Interactive prompt for the sub-theme label.
 *
 * Used when `bake` is run in a terminal without a name argument.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import { ScaffoldError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { isUsableMachineName, toMachineName } from "../../core/naming/machineName.js";

/**
 * Options for a LabelPrompt (primarily for testing).
 */
export interface LabelPromptOptions {
  /**
   * Replaces the clack prompt. Receives the validator clack would use and
   * returns the entered value, or a clack cancel symbol.
   */
  readonly promptFn?: (validate: (value: string) => string | undefined) => Promise<string | symbol>;
}

/**
 * Validates a label as typed.
 *
 * @returns An error message, or undefined when the label is acceptable
 */
export function validateLabel(value: string): string | undefined {
  if (value.trim().length === 0) {
    return "A name is required";
  }
  if (!isUsableMachineName(toMachineName(value))) {
    return "The name must contain at least one letter or digit";
  }
  return undefined;
}

export class LabelPrompt {
  constructor(private readonly options: LabelPromptOptions = {}) {}

  /**
   * Asks for the label until a valid one is entered.
   *
   * @throws ScaffoldError (USER_CANCELLED) if the user cancels
   */
  async ask(): Promise<string> {
    const value = this.options.promptFn
      ? await this.options.promptFn(validateLabel)
      : await clack.text({
          message: "Sub-theme name",
          placeholder: "My Theme",
          validate: validateLabel,
        });

    if (clack.isCancel(value) || typeof value !== "string") {
      throw new ScaffoldError(
        "Cancelled",
        ErrorCode.USER_CANCELLED,
        undefined,
        undefined,
        "Run the command again with the sub-theme name as an argument.",
      );
    }

    return value;
  }
}
