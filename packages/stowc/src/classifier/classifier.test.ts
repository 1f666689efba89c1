import { describe, it, expect } from "vitest";
import "#test/matchers";

import { ErrorCode, type LayoutError } from "#checker";
import { Packedness, Type, Types, type Declarations } from "#types";
import { Result, Severity } from "#result";
import { declarations } from "#test/fixtures";

import { Classifier } from "./classifier.js";

function classifier(types: Declarations): Classifier {
  return Classifier.over((name) => types.get(name));
}

function classify(source: string, name: string) {
  const types = declarations(source);
  return classifier(types).classify(Types.ref(name));
}

function only(result: Result<unknown, LayoutError>): LayoutError {
  const errors = Result.errors(result);
  expect(errors).toHaveLength(1);
  return errors[0];
}

describe("Packedness classifier", () => {
  const none = classifier(new Map());

  it("classifies elementary types as packed", () => {
    for (const type of [
      Type.Elementary.u8,
      Type.Elementary.i128,
      Type.Elementary.bool,
      Type.Elementary.str,
    ]) {
      expect(none.classify(type)).toEqual(Result.ok(Packedness.Packed));
    }
  });

  it("classifies inline containers of packed types as packed", () => {
    const map = Types.map(Type.Elementary.u32, Type.Elementary.u32);
    expect(none.classify(map)).toEqual(Result.ok(Packedness.Packed));
    expect(
      none.classify(Types.array(Type.Elementary.u8, 32)),
    ).toEqual(Result.ok(Packedness.Packed));
    expect(
      none.classify(
        Types.vec(Types.option(Types.tuple([Type.Elementary.bool]))),
      ),
    ).toEqual(Result.ok(Packedness.Packed));
  });

  it("classifies storage containers as non-packed", () => {
    expect(none.classify(Types.lazy(Type.Elementary.u64))).toEqual(
      Result.ok(Packedness.NonPacked),
    );
    expect(
      none.classify(Types.storageMap(Type.Elementary.u32, Type.Elementary.u128)),
    ).toEqual(Result.ok(Packedness.NonPacked));
  });

  it("classifies a struct of packed fields as packed", () => {
    const result = classify(
      `
types:
  Point:
    struct:
      x: i32
      y: i32
  Segment:
    struct:
      from: Point
      to: Point
`,
      "Segment",
    );
    expect(result).toEqual(Result.ok(Packedness.Packed));
  });

  it("makes a struct with a storage container non-packed", () => {
    const result = classify(
      `
types:
  Bank:
    struct:
      owner: "[u8; 32]"
      balances: storage_map<u32, u128>
`,
      "Bank",
    );
    expect(result).toEqual(Result.ok(Packedness.NonPacked));
  });

  it("makes a struct with a manual key non-packed", () => {
    const result = classify(
      `
types:
  Config:
    struct:
      limit: u32
      owner:
        type: "[u8; 32]"
        key: 0x10
`,
      "Config",
    );
    expect(result).toEqual(Result.ok(Packedness.NonPacked));
  });

  it("propagates non-packedness through references", () => {
    const result = classify(
      `
types:
  Ledger:
    struct:
      entries: storage_map<u32, u64>
  Account:
    struct:
      ledger: Ledger
`,
      "Account",
    );
    expect(result).toEqual(Result.ok(Packedness.NonPacked));
  });

  it("classifies enums from the fields of every variant", () => {
    const source = `
types:
  Packed:
    enum:
      Empty:
      Pair: [u8, u8]
  Mixed:
    enum:
      Empty:
      Stored:
        value: lazy<u64>
`;
    expect(classify(source, "Packed")).toEqual(Result.ok(Packedness.Packed));
    expect(classify(source, "Mixed")).toEqual(Result.ok(Packedness.NonPacked));
  });

  it("rejects a non-packed value inside a container", () => {
    const result = classify(
      `
types:
  Ledger:
    struct:
      entries: storage_map<u32, u64>
  Bank:
    struct:
      ledgers: storage_map<u32, Ledger>
`,
      "Bank",
    );

    expect(result.success).toBe(false);
    expect(result).toHaveMessage({
      severity: Severity.Error,
      code: ErrorCode.ILLEGAL_CONTAINER_NESTING,
      message:
        "container `storage_map<u32, Ledger>` requires a packed value type, but `Ledger` is non-packed",
    });

    const error = only(result);
    expect(error.frames.map((frame) => frame.note)).toEqual([
      "required by field `ledgers` of `Bank`",
      "required by the storage layout of `Bank`",
    ]);
  });

  it("rejects storage containers nested in inline containers", () => {
    const result = classify(
      `
types:
  Wallet:
    struct:
      history: vec<lazy<u64>>
`,
      "Wallet",
    );

    const error = only(result);
    expect(error.rule).toBe(ErrorCode.ILLEGAL_CONTAINER_NESTING);
    expect(error.message).toBe(
      "container `vec<lazy<u64>>` requires a packed value type, but `lazy<u64>` is non-packed",
    );
    expect(error.declaration).toBe("Wallet");
  });

  it("reports the enclosing container of a nested violation", () => {
    const result = classify(
      `
types:
  Ledger:
    struct:
      entries: storage_map<u32, u64>
  Vault:
    struct:
      slots: "vec<[Ledger; 2]>"
`,
      "Vault",
    );

    const error = only(result);
    expect(error.message).toBe(
      "container `[Ledger; 2]` requires a packed value type, but `Ledger` is non-packed",
    );
    expect(error.frames.map((frame) => frame.note)).toEqual([
      "`[Ledger; 2]` is stored as an element of `vec<[Ledger; 2]>`",
      "required by field `slots` of `Vault`",
      "required by the storage layout of `Vault`",
    ]);
  });

  it("rejects a type that contains itself", () => {
    const result = classify(
      `
types:
  Node:
    struct:
      value: u32
      next: option<Node>
`,
      "Node",
    );

    const error = only(result);
    expect(error.rule).toBe(ErrorCode.INFINITE_LAYOUT);
    expect(error.message).toBe(
      "the type `Node` contains itself (Node -> Node)",
    );
  });

  it("rejects mutually recursive types", () => {
    const result = classify(
      `
types:
  Left:
    struct:
      right: Right
  Right:
    struct:
      left: lazy<Left>
`,
      "Left",
    );

    const error = only(result);
    expect(error.message).toBe(
      "the type `Left` contains itself (Left -> Right -> Left)",
    );
    expect(error.frames.map((frame) => frame.note)).toEqual([
      "`Left` is stored as an element of `lazy<Left>`",
      "required by field `left` of `Right`",
      "required by the storage layout of `Right`",
      "required by field `right` of `Left`",
      "required by the storage layout of `Left`",
    ]);
  });

  it("caches results by type", () => {
    const types = declarations(`
types:
  Point:
    struct:
      x: i32
`);
    const instance = classifier(types);
    const first = instance.classify(Types.ref("Point"));
    const second = instance.classify(Types.ref("Point"));
    expect(first).toEqual(second);
    expect(instance.classifying).toEqual([]);
  });
});
