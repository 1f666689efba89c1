/**
 * Layout diagnostics shared by every resolution stage
 */

import { StowError, type SourceLocation } from "#errors";
import { Severity } from "#result";

export enum ErrorCode {
  MISSING_CODEC_SUPPORT = "LAYOUT001",
  ILLEGAL_CONTAINER_NESTING = "LAYOUT002",
  MANUAL_KEY_COLLISION = "LAYOUT003",
  INFINITE_LAYOUT = "LAYOUT004",
  DUPLICATE_DECLARATION = "LAYOUT005",
}

export const ErrorNames: Record<ErrorCode, string> = {
  [ErrorCode.MISSING_CODEC_SUPPORT]: "MissingCodecSupport",
  [ErrorCode.ILLEGAL_CONTAINER_NESTING]: "IllegalContainerNesting",
  [ErrorCode.MANUAL_KEY_COLLISION]: "ManualKeyCollision",
  [ErrorCode.INFINITE_LAYOUT]: "InfiniteLayout",
  [ErrorCode.DUPLICATE_DECLARATION]: "DuplicateDeclaration",
};

export const ErrorMessages = {
  UNKNOWN_TYPE: (name: string) =>
    `the type \`${name}\` is not declared and has no codec`,
  UNSUPPORTED_TYPE: (name: string, reason: string) =>
    `the type \`${name}\` has no codec: ${reason}`,
  WRONG_ARITY: (name: string, expected: number, actual: number) =>
    `\`${name}\` takes ${expected} type argument${expected === 1 ? "" : "s"} but ${actual} ${actual === 1 ? "was" : "were"} supplied`,
  ILLEGAL_NESTING: (container: string, value: string) =>
    `container \`${container}\` requires a packed value type, but \`${value}\` is non-packed`,
  KEY_COLLISION: (key: string, first: string, second: string) =>
    `storage key ${key} is used by both \`${first}\` and \`${second}\``,
  INFINITE_LAYOUT: (name: string, cycle: string[]) =>
    `the type \`${name}\` contains itself (${cycle.join(" -> ")})`,
  DUPLICATE_TYPE: (name: string) => `the type \`${name}\` is declared twice`,
  DUPLICATE_FIELD: (owner: string, name: string) =>
    `\`${owner}\` declares \`${name}\` twice`,
  TOO_MANY_VARIANTS: (name: string, count: number) =>
    `the type \`${name}\` has no codec: an enum holds at most 256 variants, found ${count}`,
};

/**
 * One step of a diagnostic chain, innermost first
 */
export interface Frame {
  type: string;
  field?: string;
  note: string;
}

export namespace Frame {
  /** The value type of a container that could not hold it */
  export const container = (container: string, value: string): Frame => ({
    type: container,
    note: `\`${value}\` is stored as an element of \`${container}\``,
  });

  /** A field whose type caused the failure */
  export const field = (owner: string, field: string): Frame => ({
    type: owner,
    field,
    note: `required by field \`${field}\` of \`${owner}\``,
  });

  /** The declaration whose layout derivation failed */
  export const declaration = (owner: string): Frame => ({
    type: owner,
    note: `required by the storage layout of \`${owner}\``,
  });
}

export class Error extends StowError {
  public readonly rule: ErrorCode;
  public readonly frames: readonly Frame[];

  constructor(
    code: ErrorCode,
    message: string,
    frames: readonly Frame[] = [],
    location?: SourceLocation,
  ) {
    super(message, code, location, Severity.Error);
    this.rule = code;
    this.frames = frames;
  }

  get ruleName(): string {
    return ErrorNames[this.rule];
  }

  /**
   * The same error seen from one level further out
   */
  within(...frames: Frame[]): Error {
    return new Error(
      this.rule,
      this.message,
      [...this.frames, ...frames],
      this.location,
    );
  }

  /**
   * Outermost type named in the chain
   */
  get declaration(): string | undefined {
    return this.frames[this.frames.length - 1]?.type;
  }
}

export { Error as LayoutError };
