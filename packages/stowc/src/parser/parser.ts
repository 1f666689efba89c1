/**
 * Parser for storage layout definitions written in YAML
 *
 *   root: Ledger
 *   rootKey: 0x00000000
 *   types:
 *     Ledger:
 *       struct:
 *         owner: "[u8; 32]"
 *         balances: storage_map<u32, u128>
 *         audit:
 *           type: vec<u64>
 *           key: 0x00000100
 *     Point:
 *       tuple: [i32, i32]
 *     Shape:
 *       enum:
 *         Empty:
 *         Circle: [Point, u32]
 *         Rect:
 *           origin: Point
 *           corner: Point
 */

import { isMap, isNode, isScalar, isSeq, parseDocument, Scalar } from "yaml";

import type { SourceLocation } from "#errors";
import type { Descriptor, Program } from "#descriptor";
import { Result } from "#result";

import { Error as ParseError } from "./errors.js";
import { parseTypeExpression } from "./type-expression.js";

export function parse(source: string): Result<Program, ParseError> {
  const document = parseDocument(source);

  if (document.errors.length > 0) {
    return Result.err(
      document.errors.map(
        (error) =>
          new ParseError(error.message, {
            offset: error.pos[0],
            length: Math.max(error.pos[1] - error.pos[0], 1),
          }),
      ),
    );
  }

  const parser = new DefinitionParser();
  const program = parser.program(document.contents);

  if (parser.errors.length > 0 || !program) {
    return Result.err(parser.errors);
  }
  return Result.ok(program);
}

class DefinitionParser {
  readonly errors: ParseError[] = [];

  program(contents: unknown): Program | undefined {
    if (contents === null || contents === undefined) {
      return { types: [] };
    }
    if (!isMap(contents)) {
      this.fail("Definitions must be a mapping", contents);
      return undefined;
    }

    const types: Descriptor[] = [];
    let root: string | undefined;
    let rootKey: number | undefined;

    for (const pair of contents.items) {
      const key = this.keyOf(pair.key);
      switch (key) {
        case "types":
          types.push(...this.types(pair.value));
          break;
        case "root":
          root = this.string(pair.value, "root");
          break;
        case "rootKey":
          rootKey = this.storageKey(pair.value, "rootKey");
          break;
        default:
          this.fail(`Unknown top-level entry '${key}'`, pair.key, [
            "types",
            "root",
            "rootKey",
          ]);
      }
    }

    return {
      types: Object.freeze(types),
      ...(root !== undefined ? { root } : {}),
      ...(rootKey !== undefined ? { rootKey } : {}),
    };
  }

  private types(node: unknown): Descriptor[] {
    if (node === null || node === undefined) {
      return [];
    }
    if (!isMap(node)) {
      this.fail("'types' must map type names to definitions", node);
      return [];
    }

    const descriptors: Descriptor[] = [];
    for (const pair of node.items) {
      const name = this.keyOf(pair.key);
      const descriptor = this.descriptor(name, pair.value, pair.key);
      if (descriptor) {
        descriptors.push(Object.freeze(descriptor));
      }
    }
    return descriptors;
  }

  private descriptor(
    name: string,
    node: unknown,
    nameNode: unknown,
  ): Descriptor | undefined {
    if (!isMap(node) || node.items.length !== 1) {
      this.fail(
        `Type '${name}' must have exactly one of 'struct', 'tuple' or 'enum'`,
        node ?? nameNode,
        ["struct", "tuple", "enum"],
      );
      return undefined;
    }

    const [pair] = node.items;
    const kind = this.keyOf(pair.key);
    const loc = this.locate(nameNode);

    switch (kind) {
      case "struct":
        return {
          kind: "struct",
          name,
          fields: this.namedFields(pair.value),
          tuple: false,
          loc,
        };
      case "tuple":
        return {
          kind: "struct",
          name,
          fields: this.positionalFields(pair.value),
          tuple: true,
          loc,
        };
      case "enum":
        return {
          kind: "enum",
          name,
          variants: this.variants(pair.value),
          loc,
        };
      default:
        this.fail(`Unknown type kind '${kind}'`, pair.key, [
          "struct",
          "tuple",
          "enum",
        ]);
        return undefined;
    }
  }

  private variants(node: unknown): Descriptor.Variant[] {
    if (!isMap(node)) {
      this.fail("'enum' must map variant names to their fields", node);
      return [];
    }

    return node.items.map((pair, discriminant) => {
      const name = this.keyOf(pair.key);
      const tuple = isSeq(pair.value);
      const fields =
        pair.value === null || pair.value === undefined
          ? []
          : tuple
            ? this.positionalFields(pair.value)
            : this.namedFields(pair.value);

      return Object.freeze({
        name,
        discriminant,
        fields: Object.freeze(fields),
        tuple,
        loc: this.locate(pair.key),
      });
    });
  }

  private namedFields(node: unknown): Descriptor.Field[] {
    if (node === null || node === undefined) {
      return [];
    }
    if (!isMap(node)) {
      this.fail("Struct fields must be a mapping of names to types", node);
      return [];
    }

    const fields: Descriptor.Field[] = [];
    for (const pair of node.items) {
      const field = this.field(this.keyOf(pair.key), pair.value, pair.key);
      if (field) {
        fields.push(field);
      }
    }
    return fields;
  }

  private positionalFields(node: unknown): Descriptor.Field[] {
    if (!isSeq(node)) {
      this.fail("Tuple fields must be a sequence of types", node);
      return [];
    }

    const fields: Descriptor.Field[] = [];
    node.items.forEach((item, index) => {
      const field = this.field(String(index), item, item);
      if (field) {
        fields.push(field);
      }
    });
    return fields;
  }

  private field(
    name: string,
    node: unknown,
    nameNode: unknown,
  ): Descriptor.Field | undefined {
    if (isScalar(node) && typeof node.value === "string") {
      const type = this.typeExpression(node);
      return type
        ? Object.freeze({ name, type, loc: this.locate(nameNode) })
        : undefined;
    }

    if (isMap(node)) {
      let typeNode: unknown;
      let key: number | undefined;

      for (const pair of node.items) {
        const entry = this.keyOf(pair.key);
        if (entry === "type") {
          typeNode = pair.value;
        } else if (entry === "key") {
          key = this.storageKey(pair.value, `key of field '${name}'`);
        } else {
          this.fail(`Unknown field property '${entry}'`, pair.key, [
            "type",
            "key",
          ]);
        }
      }

      if (!isScalar(typeNode) || typeof typeNode.value !== "string") {
        this.fail(`Field '${name}' is missing its type`, node, ["type"]);
        return undefined;
      }

      const type = this.typeExpression(typeNode);
      if (!type) {
        return undefined;
      }
      return Object.freeze({
        name,
        type,
        ...(key !== undefined ? { key } : {}),
        loc: this.locate(nameNode),
      });
    }

    this.fail(`Field '${name}' must be a type or a mapping with 'type'`, node);
    return undefined;
  }

  private typeExpression(node: Scalar) {
    const text = String(node.value);
    const quoted =
      node.type === Scalar.QUOTE_DOUBLE || node.type === Scalar.QUOTE_SINGLE;
    const base = (node.range?.[0] ?? 0) + (quoted ? 1 : 0);

    const result = parseTypeExpression(text, base);
    if (!result.success) {
      this.errors.push(...Result.errors(result));
      return undefined;
    }
    return result.value;
  }

  private storageKey(node: unknown, what: string): number | undefined {
    if (
      isScalar(node) &&
      typeof node.value === "number" &&
      Number.isInteger(node.value) &&
      node.value >= 0 &&
      node.value <= 0xffffffff
    ) {
      return node.value;
    }
    this.fail(`The ${what} must be an unsigned 32-bit integer`, node);
    return undefined;
  }

  private string(node: unknown, what: string): string | undefined {
    if (isScalar(node) && typeof node.value === "string") {
      return node.value;
    }
    this.fail(`'${what}' must be a string`, node);
    return undefined;
  }

  private keyOf(node: unknown): string {
    return isScalar(node) ? String(node.value) : String(node);
  }

  private locate(node: unknown): SourceLocation | null {
    if (!isNode(node) || !node.range) {
      return null;
    }
    const [start, end] = node.range;
    return { offset: start, length: Math.max(end - start, 1) };
  }

  private fail(message: string, node: unknown, expected?: string[]) {
    this.errors.push(
      new ParseError(message, this.locate(node) ?? undefined, expected),
    );
  }
}

