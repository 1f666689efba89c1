/**
 * Helpers for building test inputs from layout definitions
 */

import { checkProgram } from "#checker";
import { parse } from "#parser";
import { Result } from "#result";
import type { Declarations } from "#types";

/**
 * Resolved declarations of a definitions source that must be valid
 */
export function declarations(source: string): Declarations {
  const parsed = parse(source);
  if (!parsed.success) {
    throw new Error(
      `Parse failed: ${Result.errors(parsed)
        .map((error) => error.message)
        .join("; ")}`,
    );
  }

  const checked = checkProgram(parsed.value);
  if (!checked.success) {
    throw new Error(
      `Check failed: ${Result.errors(checked)
        .map((error) => error.message)
        .join("; ")}`,
    );
  }
  return checked.value;
}
