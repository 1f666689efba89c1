/**
 * Storage key allocation
 *
 * Every storage cell is addressed by an unsigned 32-bit key. A cell's key is
 * either the manual key its field declares, or derived from the key of the
 * cell that contains it and a stable hash of the field's structural path.
 */

import { keccak256 } from "ethereum-cryptography/keccak";
import { concatBytes, utf8ToBytes } from "ethereum-cryptography/utils";

export type StorageKey = number;

/**
 * Key of the cell at the root of a top-level storage layout
 */
export const ROOT_KEY: StorageKey = 0;

/**
 * Version of the key derivation scheme. Changing `stableHash` or `derive`
 * remaps every stored cell, so any change must bump this.
 */
export const KEY_DERIVATION_VERSION = 1;

const DOMAIN = `stowc:key:v${KEY_DERIVATION_VERSION}:`;

/**
 * Structural path of a field: owning type, variant (for enums), field
 */
export type FieldPath = readonly string[];

export namespace FieldPath {
  export const struct = (type: string, field: string): FieldPath => [
    type,
    field,
  ];

  export const variant = (
    type: string,
    variant: string,
    discriminant: number,
    field: string,
  ): FieldPath => [type, `${variant}#${discriminant}`, field];

  export const format = (path: FieldPath): string => path.join("::");
}

export function isStorageKey(value: unknown): value is StorageKey {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 0xffffffff
  );
}

/**
 * Fixed, versioned hash of a field's structural path
 */
export function stableHash(path: FieldPath): StorageKey {
  return readKey(keccak256(utf8ToBytes(DOMAIN + FieldPath.format(path))));
}

/**
 * Combine the key of the containing cell with a field hash.
 * Fields of the root cell take the field hash as their key unchanged.
 */
export function derive(parent: StorageKey, hash: StorageKey): StorageKey {
  if (parent === ROOT_KEY) {
    return hash;
  }
  return readKey(keccak256(concatBytes(be32(parent), be32(hash))));
}

/**
 * Key of the cell introduced by a field
 */
export function allocate(
  parent: StorageKey,
  path: FieldPath,
  manualKey?: StorageKey,
): StorageKey {
  if (manualKey !== undefined) {
    return manualKey;
  }
  return derive(parent, stableHash(path));
}

/**
 * Render a key as `0x` followed by eight hex digits
 */
export function formatKey(key: StorageKey): string {
  return `0x${key.toString(16).padStart(8, "0")}`;
}

function be32(value: StorageKey): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, false);
  return bytes;
}

function readKey(digest: Uint8Array): StorageKey {
  return new DataView(digest.buffer, digest.byteOffset, 4).getUint32(0, false);
}
