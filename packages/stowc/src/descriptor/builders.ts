/**
 * Programmatic construction of type descriptors.
 *
 * These mirror what the definitions parser produces, for callers that
 * declare their types in code:
 *
 *   const account = struct("Account", [
 *     field("owner", "[u8; 32]"),
 *     field("history", "vec<u64>", { key: 0x100 }),
 *   ]);
 */

import { parseTypeExpression } from "#parser";
import { Result } from "#result";

import type { Descriptor, Program, TypeExpression } from "./descriptor.js";

export interface FieldOptions {
  key?: number;
}

export function field(
  name: string,
  type: string | TypeExpression,
  options: FieldOptions = {},
): Descriptor.Field {
  return Object.freeze({
    name,
    type: typeof type === "string" ? expression(type) : type,
    ...(options.key !== undefined ? { key: options.key } : {}),
    loc: null,
  });
}

export function struct(
  name: string,
  fields: readonly Descriptor.Field[],
): Descriptor.Struct {
  return Object.freeze({
    kind: "struct",
    name,
    fields: Object.freeze([...fields]),
    tuple: false,
    loc: null,
  });
}

export function tuple(
  name: string,
  types: readonly (string | TypeExpression)[],
): Descriptor.Struct {
  return Object.freeze({
    kind: "struct",
    name,
    fields: Object.freeze(types.map((type, index) => field(`${index}`, type))),
    tuple: true,
    loc: null,
  });
}

export function variant(
  name: string,
  fields: readonly (Descriptor.Field | string | TypeExpression)[] = [],
): Omit<Descriptor.Variant, "discriminant"> {
  const positional = fields.every(
    (entry) => typeof entry === "string" || !("loc" in entry),
  );
  const normalized = fields.map((entry, index) =>
    typeof entry === "string" || !("loc" in entry)
      ? field(`${index}`, entry)
      : entry,
  );

  return {
    name,
    fields: Object.freeze(normalized),
    tuple: positional && fields.length > 0,
    loc: null,
  };
}

export function enum_(
  name: string,
  variants: readonly Omit<Descriptor.Variant, "discriminant">[],
): Descriptor.Enum {
  return Object.freeze({
    kind: "enum",
    name,
    variants: Object.freeze(
      variants.map((entry, discriminant) =>
        Object.freeze({ ...entry, discriminant }),
      ),
    ),
    loc: null,
  });
}

export function program(
  types: readonly Descriptor[],
  options: { root?: string; rootKey?: number } = {},
): Program {
  return Object.freeze({ types: Object.freeze([...types]), ...options });
}

function expression(text: string): TypeExpression {
  const result = parseTypeExpression(text);
  if (!result.success) {
    const [error] = Result.errors(result);
    throw new TypeError(
      `Invalid type expression '${text}': ${error?.message ?? "parse failed"}`,
    );
  }
  return result.value;
}
