/**
 * Where the CLI reads from and writes to
 */

import { readFileSync, writeFileSync } from "fs";

import { logger } from "#debug";
import type { StowError } from "#errors";
import { Result } from "#result";

import { formatMessage, type SourceContext } from "./error-formatter.js";

export interface CliIo {
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const nodeIo: CliIo = {
  readFile: (path) => readFileSync(path, "utf-8"),
  writeFile: (path, content) => writeFileSync(path, content),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

export function displayErrors(
  result: Result<unknown, StowError>,
  context: SourceContext,
  io: CliIo = nodeIo,
): void {
  for (const error of Result.errors(result)) {
    io.stderr(formatMessage(error, context));
  }
}

export function displayWarnings(
  result: Result<unknown, StowError>,
  context: SourceContext,
  io: CliIo = nodeIo,
): void {
  for (const warning of Result.warnings(result)) {
    io.stderr(formatMessage(warning, context));
  }
}

/**
 * Writes to `path`, or to stdout when there is none
 */
export function writeOutput(
  content: string,
  path: string | undefined,
  io: CliIo = nodeIo,
): void {
  if (path === undefined) {
    io.stdout(content);
    return;
  }
  io.writeFile(path, `${content}\n`);
  logger.cli("wrote %s", path);
}
