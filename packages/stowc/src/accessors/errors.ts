/**
 * Errors raised while reading or writing storage at run time
 */

import { StowError } from "#errors";

export enum ErrorCode {
  EMPTY_ENTRY = "STORAGE001",
  UNDECODABLE_ENTRY = "STORAGE002",
  UNKNOWN_FIELD = "STORAGE003",
  WRONG_FIELD_KIND = "STORAGE004",
  LAYOUT_UNAVAILABLE = "STORAGE005",
}

export const ErrorMessages = {
  EMPTY_ENTRY: "storage entry was empty",
  UNDECODABLE_ENTRY: "could not properly decode storage entry",
  UNKNOWN_FIELD: (owner: string, field: string) =>
    `\`${owner}\` has no cell field \`${field}\``,
  WRONG_FIELD_KIND: (owner: string, field: string, expected: string) =>
    `field \`${field}\` of \`${owner}\` is not ${expected}`,
  LAYOUT_UNAVAILABLE: (name: string) =>
    `no resolved storage layout for \`${name}\``,
};

export class Error extends StowError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly reason?: unknown,
  ) {
    super(message, code);
    this.name = "StorageError";
  }
}

export { Error as StorageError };
