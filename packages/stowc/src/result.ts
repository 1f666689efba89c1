/**
 * Result type shared by every compiler pass.
 *
 * A result either carries a value or it does not; in both cases it carries
 * the diagnostics produced on the way, grouped by severity.
 */

import type { StowError } from "./errors.js";

export enum Severity {
  Error = "error",
  Warning = "warning",
}

export type MessagesBySeverity<E extends StowError = StowError> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends StowError = StowError> =
  | Result.Success<T, E>
  | Result.Failure<E>;

export namespace Result {
  export interface Success<T, E extends StowError = StowError> {
    success: true;
    value: T;
    messages: MessagesBySeverity<E>;
  }

  export interface Failure<E extends StowError = StowError> {
    success: false;
    messages: MessagesBySeverity<E>;
  }

  export function ok<T, E extends StowError = StowError>(
    value: T,
  ): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function err<T = never, E extends StowError = StowError>(
    errors: E | readonly E[],
  ): Result<T, E> {
    const list: readonly E[] = isList(errors) ? errors : [errors];
    return { success: false, messages: group(list) };
  }

  export function map<T, U, E extends StowError>(
    result: Result<T, E>,
    f: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return {
      success: true,
      value: f(result.value),
      messages: result.messages,
    };
  }

  export function errors<E extends StowError>(result: Result<unknown, E>) {
    return result.messages[Severity.Error] ?? [];
  }

  export function warnings<E extends StowError>(result: Result<unknown, E>) {
    return result.messages[Severity.Warning] ?? [];
  }

  function group<E extends StowError>(
    messages: readonly E[],
  ): MessagesBySeverity<E> {
    const grouped: MessagesBySeverity<E> = {};
    for (const message of messages) {
      const bucket = grouped[message.severity] ?? [];
      bucket.push(message);
      grouped[message.severity] = bucket;
    }
    return grouped;
  }

  function isList<E>(value: E | readonly E[]): value is readonly E[] {
    return Array.isArray(value);
  }
}
