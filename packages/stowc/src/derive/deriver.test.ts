import { describe, it, expect } from "vitest";
import "#test/matchers";

import { ErrorCode } from "#checker";
import { Strategy } from "#hints";
import { Packedness } from "#types";
import { Result } from "#result";
import { declarations } from "#test/fixtures";

import { Deriver } from "./deriver.js";
import { formatDerived } from "./formatter.js";
import { State } from "./registry.js";

const bank = `
types:
  Bank:
    struct:
      owner: "[u8; 4]"
      ledgers: storage_map<u32, Ledger>
  Ledger:
    struct:
      balance: u128
`;

describe("Deriver", () => {
  it("derives referenced types before their dependents", () => {
    const deriver = new Deriver(declarations(bank));
    const result = deriver.deriveAll();
    if (!result.success) throw new Error("derivation failed");

    expect(
      result.value.map(({ name, packedness, key }) => ({
        name,
        packedness,
        key,
      })),
    ).toEqual([
      { name: "Ledger", packedness: Packedness.Packed, key: 0 },
      { name: "Bank", packedness: Packedness.NonPacked, key: 0 },
    ]);
  });

  it("derives long reference chains from the bottom up", () => {
    const links = Array.from(
      { length: 999 },
      (_, index) => `  T${index}:\n    struct:\n      next: T${index + 1}`,
    );
    const deriver = new Deriver(
      declarations(
        ["types:", ...links, "  T999:", "    struct:", "      value: u8"].join(
          "\n",
        ),
      ),
    );

    const result = deriver.derive("T0");
    if (!result.success) throw new Error("derivation failed");

    expect(result.value.packedness).toBe(Packedness.Packed);
    const resolved = deriver.registry.resolved().map(({ name }) => name);
    expect(resolved).toHaveLength(1000);
    expect(resolved.slice(0, 2)).toEqual(["T999", "T998"]);
    expect(resolved[999]).toBe("T0");
  });

  it("reuses a type that is already resolved", () => {
    const deriver = new Deriver(declarations(bank));
    const first = deriver.derive("Ledger");
    const second = deriver.derive("Ledger");
    if (!first.success || !second.success) throw new Error("derivation failed");

    expect(second.value).toBe(first.value);
  });

  it("resolves hints at the configured root key", () => {
    const deriver = new Deriver(declarations(bank), { rootKey: 0x100 });
    const result = deriver.derive("Bank");
    if (!result.success) throw new Error("derivation failed");

    expect(result.value.key).toBe(0x100);
    expect(result.value.hints.map((hint) => hint.strategy)).toEqual([
      { kind: "inline", position: 0, offset: 0 },
      { kind: "cell", key: 0x10999191, manual: false },
    ]);
  });

  it("builds a codec over the inline fields", () => {
    const result = new Deriver(declarations(bank)).derive("Bank");
    if (!result.success) throw new Error("derivation failed");

    const { codec } = result.value;
    expect(codec.encode({ owner: [1, 2, 3, 4] })).toEqual(
      new Uint8Array([1, 2, 3, 4]),
    );
    expect(codec.decode(new Uint8Array([9, 8, 7, 6]))).toEqual({
      owner: [9, 8, 7, 6],
    });
  });

  it("encodes packed references through their own codec", () => {
    const types = declarations(`
types:
  Wallet:
    struct:
      main: Ledger
      spare: option<Ledger>
  Ledger:
    struct:
      balance: u16
`);
    const result = new Deriver(types).derive("Wallet");
    if (!result.success) throw new Error("derivation failed");

    const encoded = result.value.codec.encode({
      main: { balance: 0x0102 },
      spare: { some: { balance: 3 } },
    });
    expect(encoded).toEqual(new Uint8Array([0x02, 0x01, 0x01, 0x03, 0x00]));
  });

  it("keeps inline maps packed and keyless", () => {
    const types = declarations(`
types:
  Counter:
    struct:
      counts: map<u32, u32>
`);
    const result = new Deriver(types).derive("Counter");
    if (!result.success) throw new Error("derivation failed");

    expect(result.value.packedness).toBe(Packedness.Packed);
    expect(
      result.value.hints.every((hint) => Strategy.isInline(hint.strategy)),
    ).toBe(true);
  });

  it("rejects a non-packed type in an inline container", () => {
    const types = declarations(`
types:
  Bank:
    struct:
      vaults: vec<Vault>
  Vault:
    struct:
      history: lazy<u64>
`);
    const deriver = new Deriver(types);
    const result = deriver.deriveAll();

    expect(result).toHaveMessage({
      code: ErrorCode.ILLEGAL_CONTAINER_NESTING,
      message:
        "container `vec<Vault>` requires a packed value type, but `Vault` is non-packed",
    });
    const [error] = Result.errors(result);
    expect(error.frames.map((frame) => frame.note)).toEqual([
      "required by field `vaults` of `Bank`",
      "required by the storage layout of `Bank`",
    ]);

    expect(deriver.registry.state("Bank")).toBe(State.Rejected);
    expect(deriver.registry.state("Vault")).toBe(State.Resolved);
  });

  it("reports a rejected dependency through its dependents", () => {
    const types = declarations(`
types:
  Outer:
    struct:
      inner: Inner
  Inner:
    struct:
      cells: vec<lazy<u8>>
`);
    const deriver = new Deriver(types);
    const result = deriver.deriveAll();
    const errors = Result.errors(result);

    expect(errors).toHaveLength(2);
    expect(errors[0].frames.map((frame) => frame.note)).toEqual([
      "required by field `cells` of `Inner`",
      "required by the storage layout of `Inner`",
      "required by field `inner` of `Outer`",
      "required by the storage layout of `Outer`",
    ]);
    expect(errors[0].declaration).toBe("Outer");
    expect(errors[1].declaration).toBe("Inner");
    expect([...deriver.registry.rejected().keys()]).toEqual([
      "Inner",
      "Outer",
    ]);
  });

  it("rejects a type that contains itself", () => {
    const types = declarations(`
types:
  Node:
    struct:
      value: u32
      next: option<Node>
`);
    const result = new Deriver(types).derive("Node");

    expect(result).toHaveMessage({
      code: ErrorCode.INFINITE_LAYOUT,
      message: "the type `Node` contains itself (Node -> Node)",
    });
  });

  it("rejects cycles through storage containers", () => {
    const types = declarations(`
types:
  A:
    struct:
      b: B
  B:
    struct:
      back: lazy<A>
`);
    const result = new Deriver(types).deriveAll();

    expect(result).toHaveMessage({
      code: ErrorCode.INFINITE_LAYOUT,
      message: "the type `A` contains itself (A -> B -> A)",
    });
  });

  it("reports unknown types", () => {
    const result = new Deriver(declarations(bank)).derive("Missing");
    expect(result).toHaveMessage({
      code: ErrorCode.MISSING_CODEC_SUPPORT,
      message: "the type `Missing` is not declared and has no codec",
    });
  });

  it("renders a readable summary", () => {
    const types = declarations(`
types:
  Shape:
    enum:
      Empty:
      Circle: [u32]
  Config:
    struct:
      limit:
        type: u32
        key: 7
`);
    const result = new Deriver(types).deriveAll();
    if (!result.success) throw new Error("derivation failed");

    expect(formatDerived(result.value)).toBe(
      [
        "=== Storage Layout ===",
        "",
        "Shape (packed) @ 0x00000000",
        "  Empty#0:",
        "  Circle#1:",
        "    0: u32  inline #0 @ +1",
        "",
        "Config (non-packed) @ 0x00000000",
        "  limit: u32  cell 0x00000007 (manual)",
      ].join("\n"),
    );
  });
});
