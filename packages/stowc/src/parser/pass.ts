import type { Program } from "#descriptor";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { ParseError } from "./errors.js";
import { parse } from "./parser.js";

/**
 * Parsing pass - converts definition source to type descriptors
 */
export const pass: Pass<{
  needs: {
    source: string;
    sourcePath?: string;
  };
  adds: {
    program: Program;
  };
  error: ParseError;
}> = {
  async run({ source }) {
    const result = parse(source);
    return Result.map(result, (program) => ({ program }));
  },
};
