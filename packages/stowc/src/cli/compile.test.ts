import { describe, it, expect } from "vitest";

import { ExitCode, handleCompileCommand } from "./compile.js";
import type { CliIo } from "./output.js";

const flag = `
types:
  Flag:
    struct:
      on: bool
`;

function memoryIo(files: Record<string, string>) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const written = new Map<string, string>();

  const io: CliIo = {
    readFile(path) {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file '${path}'`);
      }
      return content;
    },
    writeFile(path, content) {
      written.set(path, content);
    },
    stdout(text) {
      stdout.push(text);
    },
    stderr(text) {
      stderr.push(text);
    },
  };
  return { io, stdout, stderr, written };
}

describe("handleCompileCommand", () => {
  it("prints help", async () => {
    const { io, stdout } = memoryIo({});

    expect(await handleCompileCommand(["--help"], io)).toBe(ExitCode.Success);
    expect(stdout[0].split("\n")[2]).toBe(
      "Usage: stowc [options] <definitions.yaml>",
    );
  });

  it("prints the version", async () => {
    const { io, stdout } = memoryIo({});

    expect(await handleCompileCommand(["-v"], io)).toBe(ExitCode.Success);
    expect(stdout).toEqual(["stowc 0.1.0"]);
  });

  it("requires a definitions file", async () => {
    const { io, stderr } = memoryIo({});

    expect(await handleCompileCommand([], io)).toBe(ExitCode.Usage);
    expect(stderr).toEqual([
      "error: Expected a definitions file",
      "Run 'stowc --help' for usage",
    ]);
  });

  it("reports usage errors", async () => {
    const { io, stderr } = memoryIo({});

    expect(await handleCompileCommand(["-t", "wasm", "flag.yaml"], io)).toBe(
      ExitCode.Usage,
    );
    expect(stderr[0]).toBe(
      "error: Unknown target 'wasm' (expected one of: descriptors, types, derive, layout)",
    );
  });

  it("reports unreadable files", async () => {
    const { io, stderr } = memoryIo({});

    expect(await handleCompileCommand(["missing.yaml"], io)).toBe(
      ExitCode.Failure,
    );
    expect(stderr).toEqual([
      "error: Could not read 'missing.yaml': ENOENT: no such file 'missing.yaml'",
    ]);
  });

  it("prints the requested target", async () => {
    const { io, stdout, stderr } = memoryIo({ "flag.yaml": flag });

    expect(await handleCompileCommand(["-t", "types", "flag.yaml"], io)).toBe(
      ExitCode.Success,
    );
    expect(stdout).toEqual(["struct Flag\n  on: bool"]);
    expect(stderr).toEqual([]);
  });

  it("lays out the root by default", async () => {
    const { io, stdout } = memoryIo({ "flag.yaml": flag });

    expect(await handleCompileCommand(["flag.yaml"], io)).toBe(
      ExitCode.Success,
    );
    expect(stdout).toEqual([
      [
        "Flag",
        "  root 0x00000000",
        "    struct Flag",
        "      on: cell 0x00000000 (bool)",
      ].join("\n"),
    ]);
  });

  it("writes to the output file", async () => {
    const { io, stdout, written } = memoryIo({ "flag.yaml": flag });

    expect(
      await handleCompileCommand(
        ["-f", "json", "--root-key", "0x10", "-o", "out.json", "flag.yaml"],
        io,
      ),
    ).toBe(ExitCode.Success);
    expect(stdout).toEqual([]);

    const output = written.get("out.json");
    expect(output?.endsWith("}\n")).toBe(true);
    const parsed: unknown = JSON.parse(output ?? "");
    expect(parsed).toEqual({
      Flag: {
        layout: {
          root: {
            rootKey: "0x00000010",
            layout: {
              struct: {
                name: "Flag",
                fields: [
                  {
                    name: "on",
                    layout: { cell: { key: "0x00000010", ty: 0 } },
                  },
                ],
              },
            },
          },
        },
        types: [{ id: 0, type: "bool" }],
      },
    });
  });

  it("prints diagnostics and fails", async () => {
    const { io, stdout, stderr } = memoryIo({
      "broken.yaml": flag.replace("bool", "Missing"),
    });

    expect(await handleCompileCommand(["broken.yaml"], io)).toBe(
      ExitCode.Failure,
    );
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0].split("\n")[0]).toBe(
      "error[LAYOUT001]: the type `Missing` is not declared and has no codec",
    );
  });
});
