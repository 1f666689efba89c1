import { describe, it, expect } from "vitest";

import {
  FieldPath,
  ROOT_KEY,
  allocate,
  derive,
  formatKey,
  isStorageKey,
  stableHash,
} from "./allocator.js";

describe("Storage key allocator", () => {
  describe("stableHash", () => {
    it("hashes the structural path of a field", () => {
      expect(stableHash(FieldPath.struct("Bank", "ledgers"))).toBe(0xf8c3d40b);
      expect(stableHash(FieldPath.struct("Account", "balance"))).toBe(
        0x7aecd609,
      );
    });

    it("is deterministic", () => {
      const path = FieldPath.struct("Bank", "ledgers");
      expect(stableHash(path)).toBe(stableHash([...path]));
    });

    it("qualifies enum fields with their variant", () => {
      const first = stableHash(FieldPath.variant("E", "A", 0, "x"));
      const second = stableHash(FieldPath.variant("E", "B", 1, "x"));

      expect(first).toBe(0x25cab17c);
      expect(second).toBe(0xdf2a90a8);
      expect(first).not.toBe(second);
    });
  });

  describe("derive", () => {
    it("keeps the field hash under the root key", () => {
      expect(derive(ROOT_KEY, 0xf8c3d40b)).toBe(0xf8c3d40b);
    });

    it("combines a non-root parent with the field hash", () => {
      expect(derive(1, 2)).toBe(0xea1f3305);
      expect(derive(0xdeadbeef, 0x01020304)).toBe(0x27cf77a5);
      expect(derive(0x00000100, 0xf8c3d40b)).toBe(0x10999191);
    });
  });

  describe("allocate", () => {
    it("returns a manual key unchanged", () => {
      expect(allocate(0x1234, FieldPath.struct("Bank", "ledgers"), 7)).toBe(7);
      expect(allocate(ROOT_KEY, FieldPath.struct("Bank", "ledgers"), 0)).toBe(
        0,
      );
    });

    it("derives from the parent key without a manual key", () => {
      expect(allocate(ROOT_KEY, FieldPath.struct("Bank", "ledgers"))).toBe(
        0xf8c3d40b,
      );
      expect(allocate(0x100, FieldPath.struct("Bank", "ledgers"))).toBe(
        0x10999191,
      );
    });

    it("does not collide across many synthetic fields", () => {
      const keys = new Set<number>();
      for (let i = 0; i < 10_000; i++) {
        keys.add(allocate(ROOT_KEY, FieldPath.struct("Wide", `field_${i}`)));
      }
      expect(keys.size).toBe(10_000);
    });
  });

  describe("formatKey", () => {
    it("renders eight lower-case hex digits", () => {
      expect(formatKey(345)).toBe("0x00000159");
      expect(formatKey(0)).toBe("0x00000000");
      expect(formatKey(0xdeadbeef)).toBe("0xdeadbeef");
    });
  });

  it("recognizes unsigned 32-bit keys", () => {
    expect(isStorageKey(0)).toBe(true);
    expect(isStorageKey(0xffffffff)).toBe(true);
    expect(isStorageKey(0x100000000)).toBe(false);
    expect(isStorageKey(-1)).toBe(false);
    expect(isStorageKey(1.5)).toBe(false);
    expect(isStorageKey("1")).toBe(false);
  });
});
