/**
 * The `stowc` command: compile a definitions file to the requested target
 * and print the result
 */

import { compile, type CompileInput } from "#compiler";
import { logger } from "#debug";
import type { StowError } from "#errors";
import { Result } from "#result";

import { VERSION } from "../index.js";
import {
  formatDeclarations,
  formatDerivedTypes,
  formatLayouts,
  formatProgram,
} from "./formatters.js";
import {
  cliConfig,
  formatHelp,
  parseCliArgs,
  UsageError,
  type CliOptions,
} from "./options.js";
import {
  displayErrors,
  displayWarnings,
  nodeIo,
  writeOutput,
  type CliIo,
} from "./output.js";

export enum ExitCode {
  Success = 0,
  Failure = 1,
  Usage = 2,
}

/**
 * Runs the command with `args` (without the node and script paths)
 */
export async function handleCompileCommand(
  args: string[],
  io: CliIo = nodeIo,
): Promise<ExitCode> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      return usage(error.message, io);
    }
    throw error;
  }

  if (options.help) {
    io.stdout(formatHelp());
    return ExitCode.Success;
  }
  if (options.version) {
    io.stdout(`${cliConfig.name} ${VERSION}`);
    return ExitCode.Success;
  }
  if (options.input === undefined) {
    return usage("Expected a definitions file", io);
  }

  let source: string;
  try {
    source = io.readFile(options.input);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    io.stderr(`error: Could not read '${options.input}': ${reason}`);
    return ExitCode.Failure;
  }

  logger.cli("compiling %s to %s", options.input, options.target);
  const result = await render(options, {
    source,
    sourcePath: options.input,
    root: options.root,
    rootKey: options.rootKey,
    storageMapPrefix: options.storageMapPrefix,
  });

  const context = { source, path: options.input };
  displayWarnings(result, context, io);
  displayErrors(result, context, io);

  if (!result.success) {
    logger.cli(
      "%s failed with %d error(s)",
      options.input,
      Result.errors(result).length,
    );
    return ExitCode.Failure;
  }

  writeOutput(result.value, options.output, io);
  return ExitCode.Success;
}

async function render(
  options: CliOptions,
  input: CompileInput,
): Promise<Result<string, StowError>> {
  const { format } = options;

  switch (options.target) {
    case "descriptors":
      return Result.map(
        await compile({ ...input, to: "descriptors" }),
        ({ program }) => formatProgram(program, format),
      );
    case "types":
      return Result.map(
        await compile({ ...input, to: "types" }),
        ({ declarations }) => formatDeclarations(declarations, format),
      );
    case "derive":
      return Result.map(
        await compile({ ...input, to: "derive" }),
        ({ derived }) => formatDerivedTypes(derived, format),
      );
    case "layout":
      return Result.map(
        await compile({ ...input, to: "layout" }),
        ({ layouts }) => formatLayouts(layouts, format),
      );
  }
}

function usage(message: string, io: CliIo): ExitCode {
  io.stderr(`error: ${message}`);
  io.stderr(`Run '${cliConfig.name} --help' for usage`);
  return ExitCode.Usage;
}
