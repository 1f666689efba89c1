/**
 * Type definitions for storable data structures
 */

export interface Type {
  kind: Type.Kind;
  bits?: number; // For integer types
  toString(): string;
  equals(other: Type): boolean;
}

export namespace Type {
  export type Kind =
    | Type.Elementary.Kind
    | Type.Array.Kind
    | Type.Mapping.Kind
    | Type.Option.Kind
    | Type.Tuple.Kind
    | Type.Lazy.Kind
    | Type.StorageMap.Kind
    | Type.Reference.Kind
    | Type.Struct.Kind
    | Type.Enum.Kind;

  // Elementary types
  export class Elementary implements Type {
    constructor(
      public kind: Type.Elementary.Kind,
      public bits?: number,
    ) {}

    toString(): string {
      if (this.kind === "uint") {
        return `u${this.bits}`;
      }
      if (this.kind === "int") {
        return `i${this.bits}`;
      }
      return this.kind;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Elementary &&
        other.kind === this.kind &&
        other.bits === this.bits
      );
    }
  }

  export const isElementary = (type: Type): type is Type.Elementary =>
    type instanceof Type.Elementary;

  export namespace Elementary {
    export type Kind = "uint" | "int" | "bool" | "str";

    // Singleton instances for elementary types
    export const u8 = new Type.Elementary("uint", 8);
    export const u16 = new Type.Elementary("uint", 16);
    export const u32 = new Type.Elementary("uint", 32);
    export const u64 = new Type.Elementary("uint", 64);
    export const u128 = new Type.Elementary("uint", 128);
    export const i8 = new Type.Elementary("int", 8);
    export const i16 = new Type.Elementary("int", 16);
    export const i32 = new Type.Elementary("int", 32);
    export const i64 = new Type.Elementary("int", 64);
    export const i128 = new Type.Elementary("int", 128);
    export const bool = new Type.Elementary("bool");
    export const str = new Type.Elementary("str");

    const makeIsKind =
      <K extends Type.Elementary.Kind>(kind: K) =>
      (type: Type.Elementary): type is Type.Elementary & { kind: K } =>
        type.kind === kind;

    export const isUint = makeIsKind("uint" as const);
    export const isInt = makeIsKind("int" as const);
    export const isBool = makeIsKind("bool" as const);
    export const isStr = makeIsKind("str" as const);

    export const isNumeric = (type: Type.Elementary) =>
      Type.Elementary.isUint(type) || Type.Elementary.isInt(type);

    /**
     * Integers wider than 32 bits are represented as bigint values
     */
    export const isWide = (type: Type.Elementary) =>
      Type.Elementary.isNumeric(type) && (type.bits ?? 0) > 32;
  }

  /**
   * Fixed-size arrays (`[T; N]`) and dynamic sequences (`vec<T>`)
   */
  export class Array implements Type {
    kind = "array" as const;

    constructor(
      public elementType: Type,
      public size?: number, // undefined for dynamic sequences
    ) {}

    toString(): string {
      return this.size !== undefined
        ? `[${this.elementType.toString()}; ${this.size}]`
        : `vec<${this.elementType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Array &&
        this.elementType.equals(other.elementType) &&
        this.size === other.size
      );
    }
  }

  export const isArray = (type: Type): type is Type.Array =>
    type instanceof Type.Array;

  export namespace Array {
    export type Kind = "array";
  }

  /**
   * Ordered map, encoded inline as a sorted sequence of entries
   */
  export class Mapping implements Type {
    kind = "mapping" as const;

    constructor(
      public keyType: Type,
      public valueType: Type,
    ) {}

    toString(): string {
      return `map<${this.keyType.toString()}, ${this.valueType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Mapping &&
        this.keyType.equals(other.keyType) &&
        this.valueType.equals(other.valueType)
      );
    }
  }

  export const isMapping = (type: Type): type is Type.Mapping =>
    type instanceof Type.Mapping;

  export namespace Mapping {
    export type Kind = "mapping";
  }

  export class Option implements Type {
    kind = "option" as const;

    constructor(public innerType: Type) {}

    toString(): string {
      return `option<${this.innerType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Option && this.innerType.equals(other.innerType)
      );
    }
  }

  export const isOption = (type: Type): type is Type.Option =>
    type instanceof Type.Option;

  export namespace Option {
    export type Kind = "option";
  }

  export class Tuple implements Type {
    kind = "tuple" as const;

    constructor(public elementTypes: Type[]) {}

    toString(): string {
      return `(${this.elementTypes.map((t) => t.toString()).join(", ")})`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Tuple &&
        other.elementTypes.length === this.elementTypes.length &&
        this.elementTypes.every((t, i) => t.equals(other.elementTypes[i]))
      );
    }
  }

  export const isTuple = (type: Type): type is Type.Tuple =>
    type instanceof Type.Tuple;

  export namespace Tuple {
    export type Kind = "tuple";
  }

  /**
   * A value stored in a storage cell of its own, loaded on demand
   */
  export class Lazy implements Type {
    kind = "lazy" as const;

    constructor(public valueType: Type) {}

    toString(): string {
      return `lazy<${this.valueType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Lazy && this.valueType.equals(other.valueType)
      );
    }
  }

  export const isLazy = (type: Type): type is Type.Lazy =>
    type instanceof Type.Lazy;

  export namespace Lazy {
    export type Kind = "lazy";
  }

  /**
   * Mapping whose entries each live in their own hashed storage cell
   */
  export class StorageMap implements Type {
    kind = "storage_map" as const;

    constructor(
      public keyType: Type,
      public valueType: Type,
    ) {}

    toString(): string {
      return `storage_map<${this.keyType.toString()}, ${this.valueType.toString()}>`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.StorageMap &&
        this.keyType.equals(other.keyType) &&
        this.valueType.equals(other.valueType)
      );
    }
  }

  export const isStorageMap = (type: Type): type is Type.StorageMap =>
    type instanceof Type.StorageMap;

  export namespace StorageMap {
    export type Kind = "storage_map";
  }

  /**
   * Reference to a user-declared struct or enum by name.
   *
   * Composite types refer to each other only through references, so a
   * self-referential declaration is still a finite object graph.
   */
  export class Reference implements Type {
    kind = "reference" as const;

    constructor(public name: string) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Reference && other.name === this.name;
    }
  }

  export const isReference = (type: Type): type is Type.Reference =>
    type instanceof Type.Reference;

  export namespace Reference {
    export type Kind = "reference";
  }

  export interface Field {
    /** Field name; the position for tuple-like fields */
    name: string;
    index: number;
    type: Type;
    /** Manual storage key overriding the derived one */
    key?: number;
  }

  export class Struct implements Type {
    kind = "struct" as const;

    constructor(
      public name: string,
      public fields: Field[],
      public tuple: boolean = false,
    ) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      if (!(other instanceof Type.Struct) || other.name !== this.name) {
        return false;
      }

      return fieldsEqual(this.fields, other.fields);
    }
  }

  export const isStruct = (type: Type): type is Type.Struct =>
    type instanceof Type.Struct;

  export namespace Struct {
    export type Kind = "struct";
  }

  export interface Variant {
    name: string;
    discriminant: number;
    fields: Field[];
    tuple: boolean;
  }

  export class Enum implements Type {
    kind = "enum" as const;

    constructor(
      public name: string,
      public variants: Variant[],
    ) {}

    toString(): string {
      return this.name;
    }

    equals(other: Type): boolean {
      if (!(other instanceof Type.Enum) || other.name !== this.name) {
        return false;
      }

      return (
        this.variants.length === other.variants.length &&
        this.variants.every((variant, i) => {
          const otherVariant = other.variants[i];
          return (
            variant.name === otherVariant.name &&
            variant.discriminant === otherVariant.discriminant &&
            fieldsEqual(variant.fields, otherVariant.fields)
          );
        })
      );
    }

    getVariant(name: string): Variant | undefined {
      return this.variants.find((variant) => variant.name === name);
    }

    getVariantByDiscriminant(discriminant: number): Variant | undefined {
      return this.variants.find(
        (variant) => variant.discriminant === discriminant,
      );
    }
  }

  export const isEnum = (type: Type): type is Type.Enum =>
    type instanceof Type.Enum;

  export namespace Enum {
    export type Kind = "enum";
  }

  /**
   * User-declared composite types
   */
  export type Composite = Type.Struct | Type.Enum;

  export const isComposite = (type: Type): type is Type.Composite =>
    Type.isStruct(type) || Type.isEnum(type);

  /**
   * Types whose instances own storage cells of their own
   */
  export type StorageContainer = Type.Lazy | Type.StorageMap;

  export const isStorageContainer = (
    type: Type,
  ): type is Type.StorageContainer =>
    Type.isLazy(type) || Type.isStorageMap(type);

  function fieldsEqual(left: Field[], right: Field[]): boolean {
    return (
      left.length === right.length &&
      left.every(
        (field, i) =>
          field.name === right[i].name &&
          field.key === right[i].key &&
          field.type.equals(right[i].type),
      )
    );
  }
}
