/**
 * Layout metadata: a JSON description of where every part of a type lives
 * in storage, for tools that read storage without the codec
 */

import { stringToU8a, u8aToHex } from "@polkadot/util";

import { DEFAULT_STORAGE_MAP_PREFIX } from "#accessors";
import type { LayoutError } from "#checker";
import { Strategy, type Hint, type Storable, type StorableLookup } from "#hints";
import { formatKey, type StorageKey } from "#keys";
import { Packedness, Type } from "#types";
import { Result } from "#result";

export type Layout =
  | Layout.Root
  | Layout.Struct
  | Layout.Enum
  | Layout.Cell
  | Layout.Hash;

export namespace Layout {
  export interface Root {
    root: { rootKey: string; layout: Layout };
  }

  export interface Field {
    /** null for positional fields */
    name: string | null;
    layout: Layout;
  }

  export interface Struct {
    struct: { name: string; fields: Field[] };
  }

  export interface Variant {
    name: string;
    fields: Field[];
  }

  export interface Enum {
    enum: {
      name: string;
      dispatchKey: string;
      variants: Record<string, Variant>;
    };
  }

  export interface Cell {
    cell: { key: string; ty: number };
  }

  export interface HashingStrategy {
    hasher: "Blake2x256";
    prefix: string;
    postfix: string;
  }

  export interface Hash {
    hash: { offset: string; strategy: HashingStrategy; layout: Layout };
  }
}

export interface PortableType {
  id: number;
  type: string;
}

export interface LayoutMetadata {
  layout: Layout;
  types: PortableType[];
}

export interface LayoutOptions {
  lookup: StorableLookup;
  storageMapPrefix?: string;
}

/**
 * Layout of a type whose own cell is `key`
 */
export function layoutOf(
  storable: Storable,
  key: StorageKey,
  options: LayoutOptions,
): Result<LayoutMetadata, LayoutError> {
  const builder = new LayoutBuilder(options);
  const layout = builder.root(key, builder.composite(storable, key));

  if (builder.errors.length > 0) {
    return Result.err(builder.errors);
  }
  return Result.ok({ layout, types: builder.types });
}

class LayoutBuilder {
  readonly errors: LayoutError[] = [];
  readonly types: PortableType[] = [];
  private readonly ids = new Map<string, number>();

  constructor(private readonly options: LayoutOptions) {}

  root(key: StorageKey, layout: Layout): Layout.Root {
    return { root: { rootKey: formatKey(key), layout } };
  }

  composite(storable: Storable, key: StorageKey): Layout {
    const result = storable.hintsAt(key);
    if (!result.success) {
      this.errors.push(...Result.errors(result));
      return this.cell(storable.type, key);
    }
    const hints = result.value;
    const type = storable.type;

    if (Type.isStruct(type)) {
      return {
        struct: {
          name: type.name,
          fields: hints.map((hint) => this.field(hint, key, type.tuple)),
        },
      };
    }

    const variants: Record<string, Layout.Variant> = {};
    for (const variant of type.variants) {
      variants[String(variant.discriminant)] = {
        name: variant.name,
        fields: hints
          .filter((hint) => hint.variant?.name === variant.name)
          .map((hint) => this.field(hint, key, variant.tuple)),
      };
    }
    return {
      enum: { name: type.name, dispatchKey: formatKey(key), variants },
    };
  }

  private field(hint: Hint, ownKey: StorageKey, tuple: boolean): Layout.Field {
    const name = tuple ? null : hint.field.name;
    const type = hint.field.type;

    if (Strategy.isInline(hint.strategy)) {
      return { name, layout: this.inline(type, ownKey) };
    }

    const key = hint.strategy.key;
    if (Type.isLazy(type)) {
      return { name, layout: this.root(key, this.inline(type.valueType, key)) };
    }
    if (Type.isStorageMap(type)) {
      return { name, layout: this.root(key, this.hash(key, type.valueType)) };
    }

    const target = this.nonPacked(type);
    return {
      name,
      layout: this.root(
        key,
        target ? this.composite(target, key) : this.inline(type, key),
      ),
    };
  }

  /**
   * Packed composites are described field by field; any other packed type
   * is a single cell entry
   */
  private inline(type: Type, key: StorageKey): Layout {
    if (Type.isReference(type)) {
      const target = this.options.lookup(type.name);
      if (target) {
        return this.composite(target, key);
      }
    }
    return this.cell(type, key);
  }

  private hash(key: StorageKey, valueType: Type): Layout.Hash {
    const prefix = this.options.storageMapPrefix ?? DEFAULT_STORAGE_MAP_PREFIX;
    return {
      hash: {
        offset: formatKey(key),
        strategy: {
          hasher: "Blake2x256",
          prefix: u8aToHex(stringToU8a(prefix)),
          postfix: "",
        },
        layout: this.inline(valueType, key),
      },
    };
  }

  private cell(type: Type, key: StorageKey): Layout.Cell {
    return { cell: { key: formatKey(key), ty: this.id(type) } };
  }

  private nonPacked(type: Type): Storable | undefined {
    if (!Type.isReference(type)) {
      return undefined;
    }
    const target = this.options.lookup(type.name);
    return target?.packedness === Packedness.NonPacked ? target : undefined;
  }

  private id(type: Type): number {
    const name = type.toString();
    const existing = this.ids.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.types.length;
    this.ids.set(name, id);
    this.types.push({ id, type: name });
    return id;
  }
}
