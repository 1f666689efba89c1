/**
 * Base error class for every diagnostic stowc produces
 */

import { Severity } from "./result.js";

export interface SourceLocation {
  offset: number;
  length: number;
}

export class StowError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = "StowError";
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}

export const isStowError = (value: unknown): value is StowError =>
  value instanceof StowError;
