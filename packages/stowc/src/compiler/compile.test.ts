import { describe, it, expect } from "vitest";
import "#test/matchers";

import { ErrorCode } from "#checker";
import { Result, Severity } from "#result";

import { compile } from "./compile.js";
import { layoutSequence, typesSequence } from "./sequences/index.js";

const source = `
root: Bank
types:
  Bank:
    struct:
      owner: "[u8; 4]"
      ledgers: storage_map<u32, Ledger>
  Ledger:
    struct:
      balance: u128
`;

describe("compile", () => {
  it("names its passes in order", () => {
    expect(typesSequence.passes).toEqual(["parse", "check"]);
    expect(layoutSequence.passes).toEqual([
      "parse",
      "check",
      "derive",
      "layout",
    ]);
  });

  it("stops after parsing", async () => {
    const result = await compile({ source, to: "descriptors" });
    if (!result.success) throw new Error("compilation failed");

    expect(result.value.program.root).toBe("Bank");
    expect(result.value.program.types.map((type) => type.name)).toEqual([
      "Bank",
      "Ledger",
    ]);
  });

  it("derives every declaration", async () => {
    const result = await compile({ source, to: "derive" });
    if (!result.success) throw new Error("compilation failed");

    expect([...result.value.declarations.keys()]).toEqual(["Bank", "Ledger"]);
    expect(result.value.derived.map((derived) => derived.name)).toEqual([
      "Ledger",
      "Bank",
    ]);
  });

  it("overrides the root key", async () => {
    const result = await compile({ source, to: "derive", rootKey: 0x100 });
    if (!result.success) throw new Error("compilation failed");

    expect(result.value.derived.map((derived) => derived.key)).toEqual([
      0x100, 0x100,
    ]);
  });

  it("lays out the declared root", async () => {
    const result = await compile({ source, to: "layout" });
    if (!result.success) throw new Error("compilation failed");

    expect([...result.value.layouts.keys()]).toEqual(["Bank"]);
  });

  it("lays out every type without a root", async () => {
    const result = await compile({
      source: source.replace("root: Bank\n", ""),
      to: "layout",
    });
    if (!result.success) throw new Error("compilation failed");

    expect([...result.value.layouts.keys()]).toEqual(["Ledger", "Bank"]);
  });

  it("lays out an explicitly requested root", async () => {
    const result = await compile({ source, to: "layout", root: "Ledger" });
    if (!result.success) throw new Error("compilation failed");

    expect([...result.value.layouts.keys()]).toEqual(["Ledger"]);
  });

  it("reports an unknown root", async () => {
    const result = await compile({ source, to: "layout", root: "Nope" });

    expect(result.success).toBe(false);
    expect(result).toHaveMessage({
      code: ErrorCode.MISSING_CODEC_SUPPORT,
      message: "the type `Nope` is not declared and has no codec",
    });
  });

  it("stops at the first failing pass", async () => {
    const result = await compile({ source: "types: [", to: "layout" });

    expect(result.success).toBe(false);
    expect(result).toHaveMessage({ severity: Severity.Error });
    expect(Result.errors(result).every((error) => error.code === "PARSE_ERROR"))
      .toBe(true);
  });

  it("reports layout diagnostics", async () => {
    const result = await compile({
      source: `
types:
  Config:
    struct:
      a:
        type: u8
        key: 1
      b:
        type: u8
        key: 1
`,
      to: "derive",
    });

    expect(result).toHaveMessage({
      code: ErrorCode.MANUAL_KEY_COLLISION,
      message: "storage key 0x00000001 is used by both `a` and `b`",
    });
  });
});
