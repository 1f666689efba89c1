import { u8aToHex, hexToU8a, stringToU8a, u8aConcat } from "@polkadot/util";
import { blake2b } from "ethereum-cryptography/blake2b";

import type { StorageKey } from "#keys";

/**
 * Persistent key-value store the accessors read and write
 */
export interface KeyValueStore {
  get(key: Uint8Array): Uint8Array | undefined;
  set(key: Uint8Array, value: Uint8Array): void;
  remove(key: Uint8Array): void;
}

export const DEFAULT_STORAGE_MAP_PREFIX = "stowc storage map";

/**
 * Store key of a storage cell: the cell key, little-endian
 */
export function cellStoreKey(key: StorageKey): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, key, true);
  return bytes;
}

/**
 * Store key of one `storage_map` entry
 */
export function mapEntryStoreKey(
  prefix: string,
  key: StorageKey,
  encodedEntryKey: Uint8Array,
): Uint8Array {
  return blake2b(
    u8aConcat(stringToU8a(prefix), cellStoreKey(key), encodedEntryKey),
    32,
  );
}

/**
 * In-process store
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, Uint8Array>();

  get(key: Uint8Array): Uint8Array | undefined {
    return this.entries.get(u8aToHex(key));
  }

  set(key: Uint8Array, value: Uint8Array): void {
    this.entries.set(u8aToHex(key), value.slice());
  }

  remove(key: Uint8Array): void {
    this.entries.delete(u8aToHex(key));
  }

  has(key: Uint8Array): boolean {
    return this.entries.has(u8aToHex(key));
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): Uint8Array[] {
    return [...this.entries.keys()].map((key) => hexToU8a(key));
  }
}
