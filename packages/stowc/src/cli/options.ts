/**
 * Command line options of `stowc`
 */

import { parseArgs, type ParseArgsConfig } from "util";

import { isStorageKey, type StorageKey } from "#keys";
import { targetSequences, type Target } from "#compiler";

export type OutputFormat = "text" | "json";

export interface OptionConfig {
  type: "string" | "boolean";
  short?: string;
  default?: string | boolean;
  description: string;
  /** Placeholder shown in help for string options */
  value?: string;
}

export interface CliConfig {
  name: string;
  description: string;
  options: Record<string, OptionConfig>;
  examples: string[];
}

export interface CliOptions {
  input?: string;
  target: Target;
  format: OutputFormat;
  root?: string;
  rootKey?: StorageKey;
  storageMapPrefix?: string;
  output?: string;
  help: boolean;
  version: boolean;
}

export const commonOptions: Record<string, OptionConfig> = {
  target: {
    type: "string",
    short: "t",
    default: "layout",
    value: "target",
    description: `Stop after this stage (${Object.keys(targetSequences).join(", ")})`,
  },
  format: {
    type: "string",
    short: "f",
    default: "text",
    value: "format",
    description: "Output format (text, json)",
  },
  root: {
    type: "string",
    value: "type",
    description: "Type to lay out at the root of storage",
  },
  "root-key": {
    type: "string",
    value: "key",
    description: "Key of the root cell, decimal or 0x-prefixed hex",
  },
  "storage-map-prefix": {
    type: "string",
    value: "prefix",
    description: "Hashing prefix of storage map entries",
  },
  output: {
    type: "string",
    short: "o",
    value: "file",
    description: "Write output to a file instead of stdout",
  },
  help: {
    type: "boolean",
    short: "h",
    description: "Show this help message",
  },
  version: {
    type: "boolean",
    short: "v",
    description: "Show the version",
  },
};

export const cliConfig: CliConfig = {
  name: "stowc",
  description: "Resolve the storage layout of YAML type definitions",
  options: commonOptions,
  examples: [
    "stowc definitions.yaml",
    "stowc --target derive definitions.yaml",
    "stowc --format json --root Bank --root-key 0x100 -o layout.json definitions.yaml",
  ],
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parses command line arguments (without the node and script paths)
 *
 * @throws UsageError for unknown options or invalid values
 */
export function parseCliArgs(
  args: string[],
  config: CliConfig = cliConfig,
): CliOptions {
  const options: NonNullable<ParseArgsConfig["options"]> = {};
  for (const [name, option] of Object.entries(config.options)) {
    options[name] = {
      type: option.type,
      ...(option.short !== undefined ? { short: option.short } : {}),
      ...(option.default !== undefined ? { default: option.default } : {}),
    };
  }

  const { values, positionals } = parse(args, options);
  if (positionals.length > 1) {
    throw new UsageError(
      `Expected one definitions file, got ${positionals.length}`,
    );
  }

  const target = stringOption(values.target) ?? "layout";
  if (!isTarget(target)) {
    throw new UsageError(
      `Unknown target '${target}' (expected one of: ${Object.keys(targetSequences).join(", ")})`,
    );
  }

  const format = stringOption(values.format) ?? "text";
  if (format !== "text" && format !== "json") {
    throw new UsageError(`Unknown format '${format}' (expected text or json)`);
  }

  const rootKey = stringOption(values["root-key"]);

  return {
    input: positionals[0],
    target,
    format,
    root: stringOption(values.root),
    rootKey: rootKey === undefined ? undefined : parseStorageKey(rootKey),
    storageMapPrefix: stringOption(values["storage-map-prefix"]),
    output: stringOption(values.output),
    help: values.help === true,
    version: values.version === true,
  };
}

/**
 * A key written in decimal or as 0x-prefixed hex
 */
export function parseStorageKey(text: string): StorageKey {
  const key = /^(0x[0-9a-fA-F]+|[0-9]+)$/.test(text) ? Number(text) : NaN;
  if (!isStorageKey(key)) {
    throw new UsageError(
      `Invalid storage key '${text}': expected an unsigned 32-bit integer`,
    );
  }
  return key;
}

export function formatHelp(config: CliConfig = cliConfig): string {
  const lines = [
    config.description,
    "",
    `Usage: ${config.name} [options] <definitions.yaml>`,
    "",
    "Options:",
  ];

  for (const [name, option] of Object.entries(config.options)) {
    const short = option.short ? `-${option.short}, ` : "    ";
    const flag = option.value ? `--${name} <${option.value}>` : `--${name}`;
    const defaultValue =
      option.default !== undefined ? ` (default: ${option.default})` : "";
    lines.push(`  ${short}${flag.padEnd(30)} ${option.description}${defaultValue}`);
  }

  if (config.examples.length > 0) {
    lines.push("", "Examples:");
    for (const example of config.examples) {
      lines.push(`  ${example}`);
    }
  }
  return lines.join("\n");
}

function parse(
  args: string[],
  options: NonNullable<ParseArgsConfig["options"]>,
): { values: Record<string, unknown>; positionals: string[] } {
  try {
    const { values, positionals } = parseArgs({
      args,
      options,
      allowPositionals: true,
      strict: true,
    });
    return { values, positionals };
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function isTarget(value: string): value is Target {
  return Object.keys(targetSequences).includes(value);
}

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
