/**
 * Type descriptors: the static description of user types as declared.
 *
 * Descriptors are produced once per declared type by the parser (or by the
 * builder functions below) and never mutated afterwards.
 */

import type { SourceLocation } from "#errors";

export interface Program {
  types: readonly Descriptor[];
  /** Name of the type laid out at the root of contract storage */
  root?: string;
  rootKey?: number;
}

export type Descriptor = Descriptor.Struct | Descriptor.Enum;

export namespace Descriptor {
  export interface Base {
    name: string;
    loc: SourceLocation | null;
  }

  export interface Struct extends Descriptor.Base {
    kind: "struct";
    fields: readonly Field[];
    /** Fields are positional rather than named */
    tuple: boolean;
  }

  export interface Enum extends Descriptor.Base {
    kind: "enum";
    variants: readonly Variant[];
  }

  export interface Field {
    /** Declared name, or the position for tuple-like fields */
    name: string;
    type: TypeExpression;
    key?: number;
    loc: SourceLocation | null;
  }

  export interface Variant {
    name: string;
    discriminant: number;
    fields: readonly Field[];
    tuple: boolean;
    loc: SourceLocation | null;
  }

  export const isStruct = (descriptor: Descriptor): descriptor is Struct =>
    descriptor.kind === "struct";

  export const isEnum = (descriptor: Descriptor): descriptor is Enum =>
    descriptor.kind === "enum";
}

/**
 * Parsed form of a field's declared type, e.g. `map<u32, vec<Account>>`
 */
export type TypeExpression =
  | TypeExpression.Named
  | TypeExpression.Generic
  | TypeExpression.Array
  | TypeExpression.Tuple;

export namespace TypeExpression {
  export interface Named {
    kind: "named";
    name: string;
  }

  export interface Generic {
    kind: "generic";
    name: string;
    args: TypeExpression[];
  }

  export interface Array {
    kind: "array";
    element: TypeExpression;
    size: number;
  }

  export interface Tuple {
    kind: "tuple";
    elements: TypeExpression[];
  }

  export function format(expression: TypeExpression): string {
    switch (expression.kind) {
      case "named":
        return expression.name;
      case "generic":
        return `${expression.name}<${expression.args.map(format).join(", ")}>`;
      case "array":
        return `[${format(expression.element)}; ${expression.size}]`;
      case "tuple":
        return `(${expression.elements.map(format).join(", ")})`;
    }
  }
}
