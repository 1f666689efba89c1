/**
 * Parser-specific errors
 */

import { StowError, type SourceLocation } from "#errors";

/**
 * Parse errors
 */
export class Error extends StowError {
  public readonly expected?: string[];

  constructor(message: string, location?: SourceLocation, expected?: string[]) {
    super(message, "PARSE_ERROR", location);
    this.expected = expected;
  }
}

export { Error as ParseError };
