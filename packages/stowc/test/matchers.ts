/**
 * Custom matchers for Result values
 *
 *   expect(result).toHaveMessage({ severity: Severity.Error, code: "LAYOUT002" })
 */

import { expect } from "vitest";

import type { StowError } from "#errors";
import { Severity, type Result } from "#result";

export interface MessageExpectation {
  severity?: Severity;
  code?: string;
  /** Substring of the message */
  message?: string;
}

interface CustomMatchers<R = unknown> {
  toHaveMessage(expected: MessageExpectation): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-empty-object-type
  interface Assertion<T = any> extends CustomMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}

function messagesOf(
  result: Result<unknown>,
  severity?: Severity,
): StowError[] {
  const severities = severity
    ? [severity]
    : [Severity.Error, Severity.Warning];
  return severities.flatMap((s) => result.messages[s] ?? []);
}

function isResult(value: unknown): value is Result<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "success" in value &&
    "messages" in value
  );
}

expect.extend({
  toHaveMessage(received: unknown, expected: MessageExpectation) {
    if (!isResult(received)) {
      return {
        pass: false,
        message: () => "expected a Result value",
      };
    }

    const candidates = messagesOf(received, expected.severity);
    const pass = candidates.some(
      (candidate) =>
        (expected.code === undefined || candidate.code === expected.code) &&
        (expected.message === undefined ||
          candidate.message.includes(expected.message)),
    );

    const described = candidates
      .map((candidate) => `  [${candidate.code}] ${candidate.message}`)
      .join("\n");

    return {
      pass,
      message: () =>
        pass
          ? `expected result not to have a message matching ${JSON.stringify(expected)}`
          : `expected result to have a message matching ${JSON.stringify(expected)}, found:\n${described || "  (none)"}`,
    };
  },
});
