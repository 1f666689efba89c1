/**
 * Codec errors raised while encoding or decoding values
 */

import { StowError } from "#errors";

export enum ErrorCode {
  INVALID_VALUE = "CODEC001",
  UNEXPECTED_END = "CODEC002",
  INVALID_ENCODING = "CODEC003",
  TRAILING_BYTES = "CODEC004",
  NOT_INLINE = "CODEC005",
}

export class Error extends StowError {
  constructor(code: ErrorCode, message: string) {
    super(message, code);
    this.name = "CodecError";
  }
}

export { Error as CodecError };
