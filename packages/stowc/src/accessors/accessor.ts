/**
 * Storage accessors
 *
 * An accessor binds a resolved type to a store and the key of its own cell.
 * The cell holds the inline encoding; every field with a cell hint is read
 * and written through its own cell, a nested accessor or a map.
 */

import { Value, typeCodec, type Codec } from "#codec";
import { Strategy, type Hint, type Storable, type StorableLookup } from "#hints";
import { formatKey, type StorageKey } from "#keys";
import { Packedness, Type } from "#types";
import { Result } from "#result";

import {
  Error as StorageError,
  ErrorCode,
  ErrorMessages,
} from "./errors.js";
import {
  DEFAULT_STORAGE_MAP_PREFIX,
  cellStoreKey,
  mapEntryStoreKey,
  type KeyValueStore,
} from "./store.js";

export interface Accessor {
  readonly name: string;
  readonly key: StorageKey;
  /** Reads the inline value; throws when the cell is empty or undecodable */
  pull(): Value;
  pullOrInit(init?: () => Value): Value;
  push(value: Value): void;
  /** Removes the value's own cell; cells of its fields are left alone */
  clear(): void;
  /** Cell of a `lazy<T>` field, or of a packed field with a manual key */
  cell(field: string): Cell;
  /** Map of a `storage_map<K, V>` field */
  map(field: string): StorageMapAccessor;
  /** Accessor of a non-packed composite field */
  nested(field: string): Accessor;
}

export interface Cell {
  readonly key: StorageKey;
  get(): Value | undefined;
  set(value: Value): void;
  remove(): void;
}

export interface StorageMapAccessor {
  readonly key: StorageKey;
  get(entryKey: Value): Value | undefined;
  insert(entryKey: Value, value: Value): void;
  remove(entryKey: Value): void;
  contains(entryKey: Value): boolean;
}

export interface AccessorOptions {
  lookup: StorableLookup;
  storageMapPrefix?: string;
}

export function createAccessor(
  storable: Storable,
  store: KeyValueStore,
  key: StorageKey,
  options: AccessorOptions,
): Accessor {
  const prefix = options.storageMapPrefix ?? DEFAULT_STORAGE_MAP_PREFIX;
  const resolve = (name: string): Codec => {
    const target = options.lookup(name);
    if (!target) {
      throw new StorageError(
        ErrorCode.LAYOUT_UNAVAILABLE,
        ErrorMessages.LAYOUT_UNAVAILABLE(name),
      );
    }
    return target.codec;
  };

  let hints: Hint[] | undefined;
  const cellHint = (field: string): Hint & { strategy: Strategy.Cell } => {
    if (!hints) {
      const result = storable.hintsAt(key);
      if (!result.success) {
        const [error] = Result.errors(result);
        throw new StorageError(
          ErrorCode.LAYOUT_UNAVAILABLE,
          `${ErrorMessages.LAYOUT_UNAVAILABLE(storable.name)} at ${formatKey(key)}: ${error?.message ?? "unknown error"}`,
          error,
        );
      }
      hints = result.value;
    }

    const hint = hints.find((candidate) => candidate.label === field);
    if (!hint || !Strategy.isCell(hint.strategy)) {
      throw new StorageError(
        ErrorCode.UNKNOWN_FIELD,
        ErrorMessages.UNKNOWN_FIELD(storable.name, field),
      );
    }
    return { ...hint, strategy: hint.strategy };
  };

  const own = codecCell(store, key, storable.codec);

  return {
    name: storable.name,
    key,

    pull() {
      return pull(own);
    },

    pullOrInit(init) {
      try {
        return pull(own);
      } catch (error) {
        if (error instanceof StorageError) {
          return init ? init() : storable.codec.defaultValue();
        }
        throw error;
      }
    },

    push(value) {
      own.set(value);
    },

    clear() {
      own.remove();
    },

    cell(field) {
      const hint = cellHint(field);
      const type = hint.field.type;
      if (Type.isStorageMap(type) || isCompositeReference(type, options)) {
        throw new StorageError(
          ErrorCode.WRONG_FIELD_KIND,
          ErrorMessages.WRONG_FIELD_KIND(storable.name, field, "a single cell"),
        );
      }
      const valueType = Type.isLazy(type) ? type.valueType : type;
      return codecCell(store, hint.strategy.key, typeCodec(valueType, resolve));
    },

    map(field) {
      const hint = cellHint(field);
      const type = hint.field.type;
      if (!Type.isStorageMap(type)) {
        throw new StorageError(
          ErrorCode.WRONG_FIELD_KIND,
          ErrorMessages.WRONG_FIELD_KIND(storable.name, field, "a storage map"),
        );
      }
      return storageMap(
        store,
        hint.strategy.key,
        prefix,
        typeCodec(type.keyType, resolve),
        typeCodec(type.valueType, resolve),
      );
    },

    nested(field) {
      const hint = cellHint(field);
      const type = hint.field.type;
      const target = Type.isReference(type)
        ? options.lookup(type.name)
        : undefined;
      if (!target) {
        throw new StorageError(
          ErrorCode.WRONG_FIELD_KIND,
          ErrorMessages.WRONG_FIELD_KIND(storable.name, field, "a composite"),
        );
      }
      return createAccessor(target, store, hint.strategy.key, options);
    },
  };
}

function isCompositeReference(type: Type, options: AccessorOptions): boolean {
  if (!Type.isReference(type)) {
    return false;
  }
  const target = options.lookup(type.name);
  return target !== undefined && target.packedness === Packedness.NonPacked;
}

function pull(cell: Cell): Value {
  const value = cell.get();
  if (value === undefined) {
    throw new StorageError(ErrorCode.EMPTY_ENTRY, ErrorMessages.EMPTY_ENTRY);
  }
  return value;
}

/**
 * A single cell holding one encoded value.
 * `get` is undefined for an empty cell and throws on undecodable bytes.
 */
function codecCell(
  store: KeyValueStore,
  key: StorageKey,
  codec: Codec,
): Cell {
  const storeKey = cellStoreKey(key);
  return {
    key,
    get() {
      const bytes = store.get(storeKey);
      return bytes === undefined ? undefined : decode(codec, bytes);
    },
    set(value) {
      store.set(storeKey, codec.encode(value));
    },
    remove() {
      store.remove(storeKey);
    },
  };
}

function storageMap(
  store: KeyValueStore,
  key: StorageKey,
  prefix: string,
  keyCodec: Codec,
  valueCodec: Codec,
): StorageMapAccessor {
  const entryKey = (entry: Value) =>
    mapEntryStoreKey(prefix, key, keyCodec.encode(entry));

  return {
    key,
    get(entry) {
      const bytes = store.get(entryKey(entry));
      return bytes === undefined ? undefined : decode(valueCodec, bytes);
    },
    insert(entry, value) {
      store.set(entryKey(entry), valueCodec.encode(value));
    },
    remove(entry) {
      store.remove(entryKey(entry));
    },
    contains(entry) {
      return store.get(entryKey(entry)) !== undefined;
    },
  };
}

function decode(codec: Codec, bytes: Uint8Array): Value {
  try {
    return codec.decode(bytes);
  } catch (error) {
    throw new StorageError(
      ErrorCode.UNDECODABLE_ENTRY,
      ErrorMessages.UNDECODABLE_ENTRY,
      error,
    );
  }
}
