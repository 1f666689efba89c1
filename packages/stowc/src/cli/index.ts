/**
 * CLI module exports
 */

export { ExitCode, handleCompileCommand } from "./compile.js";
export {
  formatDeclarations,
  formatDerivedTypes,
  formatJson,
  formatLayouts,
  formatProgram,
} from "./formatters.js";
export {
  cliConfig,
  commonOptions,
  formatHelp,
  parseCliArgs,
  parseStorageKey,
  UsageError,
  type CliOptions,
  type OutputFormat,
} from "./options.js";
export {
  displayErrors,
  displayWarnings,
  nodeIo,
  writeOutput,
  type CliIo,
} from "./output.js";
export {
  formatError,
  formatMessage,
  formatWarning,
  lineColumn,
  type SourceContext,
} from "./error-formatter.js";
