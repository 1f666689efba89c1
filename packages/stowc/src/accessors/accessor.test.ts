import { describe, it, expect, beforeEach } from "vitest";
import { hexToU8a, u8aToHex } from "@polkadot/util";

import { Deriver, type Derived } from "#derive";
import { declarations } from "#test/fixtures";

import { Error as StorageError, ErrorCode } from "./errors.js";
import { MemoryStore, cellStoreKey, mapEntryStoreKey } from "./store.js";

const source = `
types:
  Bank:
    struct:
      owner: "[u8; 4]"
      ledgers: storage_map<u32, Ledger>
      vault: Vault
      limit:
        type: u32
        key: 0x100
      notes: lazy<str>
  Ledger:
    struct:
      balance: u64
  Vault:
    struct:
      history: lazy<u64>
`;

function derive(storageMapPrefix?: string): Derived {
  const result = new Deriver(declarations(source), {
    storageMapPrefix,
  }).derive("Bank");
  if (!result.success) {
    throw new Error("derivation failed");
  }
  return result.value;
}

function storageError(action: () => unknown): StorageError {
  try {
    action();
  } catch (error) {
    if (error instanceof StorageError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a storage error");
}

describe("Store keys", () => {
  it("stores cells under their key, little-endian", () => {
    expect(u8aToHex(cellStoreKey(0x100))).toBe("0x00010000");
    expect(u8aToHex(cellStoreKey(0xf8c3d40b))).toBe("0x0bd4c3f8");
  });

  it("hashes map entries with the prefix, the cell and the entry key", () => {
    expect(
      u8aToHex(
        mapEntryStoreKey(
          "stowc storage map",
          0xf8c3d40b,
          new Uint8Array([7, 0, 0, 0]),
        ),
      ),
    ).toBe(
      "0x3b1a717e17d3b396745d88f8f56845518c99ecc9995332a47ea3e5f94155f441",
    );
  });
});

describe("MemoryStore", () => {
  it("keeps copies of values by key bytes", () => {
    const store = new MemoryStore();
    const value = new Uint8Array([1, 2]);
    store.set(hexToU8a("0x0a0b"), value);
    value[0] = 9;

    expect(store.get(new Uint8Array([0x0a, 0x0b]))).toEqual(
      new Uint8Array([1, 2]),
    );
    expect(store.has(hexToU8a("0x0a0b"))).toBe(true);
    expect(store.size).toBe(1);
    expect(store.keys()).toEqual([new Uint8Array([0x0a, 0x0b])]);

    store.remove(hexToU8a("0x0a0b"));
    expect(store.get(hexToU8a("0x0a0b"))).toBeUndefined();
  });
});

describe("Accessor", () => {
  let store: MemoryStore;
  let bank: Derived;

  beforeEach(() => {
    store = new MemoryStore();
    bank = derive();
  });

  it("reports an empty cell", () => {
    const error = storageError(() => bank.accessor(store).pull());
    expect(error.code).toBe(ErrorCode.EMPTY_ENTRY);
    expect(error.message).toBe("storage entry was empty");
  });

  it("writes and reads the inline fields in its own cell", () => {
    const accessor = bank.accessor(store);
    accessor.push({ owner: [1, 2, 3, 4] });

    expect(store.get(cellStoreKey(0))).toEqual(new Uint8Array([1, 2, 3, 4]));
    expect(accessor.pull()).toEqual({ owner: [1, 2, 3, 4] });
    expect(accessor.key).toBe(0);
    expect(accessor.name).toBe("Bank");
  });

  it("reports bytes that do not decode", () => {
    store.set(cellStoreKey(0), new Uint8Array([1, 2]));
    const error = storageError(() => bank.accessor(store).pull());

    expect(error.code).toBe(ErrorCode.UNDECODABLE_ENTRY);
    expect(error.message).toBe("could not properly decode storage entry");
    expect(error.reason).toBeInstanceOf(Error);
  });

  it("falls back to a default for an empty cell", () => {
    const accessor = bank.accessor(store);
    expect(accessor.pullOrInit()).toEqual({ owner: [0, 0, 0, 0] });
    expect(accessor.pullOrInit(() => ({ owner: [5, 5, 5, 5] }))).toEqual({
      owner: [5, 5, 5, 5],
    });
  });

  it("clears its own cell only", () => {
    const accessor = bank.accessor(store);
    accessor.push({ owner: [1, 2, 3, 4] });
    accessor.cell("limit").set(3);
    accessor.clear();

    expect(store.has(cellStoreKey(0))).toBe(false);
    expect(store.has(cellStoreKey(0x100))).toBe(true);
  });

  it("reads and writes a manually keyed cell", () => {
    const limit = bank.accessor(store).cell("limit");
    expect(limit.key).toBe(0x100);
    expect(limit.get()).toBeUndefined();

    limit.set(42);
    expect(store.get(cellStoreKey(0x100))).toEqual(
      new Uint8Array([42, 0, 0, 0]),
    );
    expect(limit.get()).toBe(42);

    limit.remove();
    expect(limit.get()).toBeUndefined();
  });

  it("stores lazy values in their derived cell", () => {
    const notes = bank.accessor(store).cell("notes");
    expect(notes.key).toBe(0xd9f9da62);

    notes.set("hi");
    expect(store.get(cellStoreKey(0xd9f9da62))).toEqual(
      new Uint8Array([0x08, 0x68, 0x69]),
    );
    expect(notes.get()).toBe("hi");
  });

  it("hashes storage map entries into their own cells", () => {
    const ledgers = bank.accessor(store).map("ledgers");
    expect(ledgers.key).toBe(0xf8c3d40b);

    ledgers.insert(7, { balance: 5n });
    expect(
      store.get(
        hexToU8a(
          "0x3b1a717e17d3b396745d88f8f56845518c99ecc9995332a47ea3e5f94155f441",
        ),
      ),
    ).toEqual(new Uint8Array([5, 0, 0, 0, 0, 0, 0, 0]));

    expect(ledgers.get(7)).toEqual({ balance: 5n });
    expect(ledgers.contains(7)).toBe(true);
    expect(ledgers.contains(8)).toBe(false);
    expect(ledgers.get(8)).toBeUndefined();

    ledgers.remove(7);
    expect(ledgers.contains(7)).toBe(false);
    expect(store.size).toBe(0);
  });

  it("uses the configured storage map prefix", () => {
    const ledgers = derive("custom").accessor(store).map("ledgers");
    ledgers.insert(7, { balance: 1n });

    expect(store.keys().map((key) => u8aToHex(key))).toEqual([
      "0x5b3e0b3ed9821fcb8263d2c7e3704cb5c615465c92bb81af93203b7eb889da63",
    ]);
  });

  it("reaches non-packed fields through a nested accessor", () => {
    const vault = bank.accessor(store).nested("vault");
    expect(vault.name).toBe("Vault");
    expect(vault.key).toBe(0x7802eb6b);

    const history = vault.cell("history");
    expect(history.key).toBe(0x596d187c);
    history.set(9n);
    expect(history.get()).toBe(9n);
  });

  it("opens an accessor at another key", () => {
    const accessor = bank.accessor(store, 0x200);
    expect(accessor.key).toBe(0x200);
    expect(accessor.cell("limit").key).toBe(0x100);
  });

  it("refuses a key whose layout collides", () => {
    const accessor = bank.accessor(store, 0x100);
    const error = storageError(() => accessor.cell("limit"));

    expect(error.code).toBe(ErrorCode.LAYOUT_UNAVAILABLE);
    expect(error.message).toBe(
      "no resolved storage layout for `Bank` at 0x00000100: storage key 0x00000100 is used by both `Bank (own cell)` and `limit`",
    );
  });

  it("rejects fields that are not cells of the requested kind", () => {
    const accessor = bank.accessor(store);

    const inline = storageError(() => accessor.cell("owner"));
    expect(inline.code).toBe(ErrorCode.UNKNOWN_FIELD);
    expect(inline.message).toBe("`Bank` has no cell field `owner`");

    expect(storageError(() => accessor.cell("ledgers")).message).toBe(
      "field `ledgers` of `Bank` is not a single cell",
    );
    expect(storageError(() => accessor.cell("vault")).message).toBe(
      "field `vault` of `Bank` is not a single cell",
    );
    expect(storageError(() => accessor.map("limit")).message).toBe(
      "field `limit` of `Bank` is not a storage map",
    );
    expect(storageError(() => accessor.nested("notes")).code).toBe(
      ErrorCode.WRONG_FIELD_KIND,
    );
  });
});
