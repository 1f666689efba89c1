/**
 * Renders diagnostics for the terminal:
 *
 *   error[LAYOUT002]: container `vec<Slot>` requires a packed value type, ...
 *    --> bank.yaml:5:7
 *     |
 *   5 |       entries: vec<Slot>
 *     |       ^^^^^^^
 *     = note: required by field `entries` of `Registry`
 */

import { LayoutError } from "#checker";
import type { SourceLocation, StowError } from "#errors";
import { Severity } from "#result";

export interface SourceContext {
  source: string;
  path?: string;
}

export function formatError(error: StowError, context?: SourceContext): string {
  return format("error", error, context);
}

export function formatWarning(
  warning: StowError,
  context?: SourceContext,
): string {
  return format("warning", warning, context);
}

export function formatMessage(
  message: StowError,
  context?: SourceContext,
): string {
  return message.severity === Severity.Warning
    ? formatWarning(message, context)
    : formatError(message, context);
}

/**
 * 1-based line and column of an offset
 */
export function lineColumn(
  source: string,
  offset: number,
): { line: number; column: number } {
  const before = source.slice(0, Math.min(offset, source.length));
  const lines = before.split("\n");
  return {
    line: lines.length,
    column: lines[lines.length - 1].length + 1,
  };
}

function format(
  label: string,
  error: StowError,
  context: SourceContext | undefined,
): string {
  const lines = [`${label}[${error.code}]: ${error.message}`];

  if (context && error.location) {
    lines.push(...snippet(error.location, context));
  }

  if (error instanceof LayoutError) {
    for (const frame of error.frames) {
      lines.push(`  = note: ${frame.note}`);
    }
  }
  return lines.join("\n");
}

function snippet(location: SourceLocation, context: SourceContext): string[] {
  const { line, column } = lineColumn(context.source, location.offset);
  const text = context.source.split("\n")[line - 1] ?? "";
  const gutter = " ".repeat(String(line).length);
  const width = Math.max(
    1,
    Math.min(location.length, text.length - column + 1),
  );

  return [
    `${gutter}--> ${context.path ?? "<source>"}:${line}:${column}`,
    `${gutter} |`,
    `${line} | ${text}`,
    `${gutter} | ${" ".repeat(column - 1)}${"^".repeat(width)}`,
  ];
}
