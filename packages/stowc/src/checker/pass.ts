import type { Program } from "#descriptor";
import type { Declarations } from "#types";
import { Result } from "#result";
import type { Pass } from "#compiler";

import type { Error as LayoutError } from "./errors.js";
import { checkProgram } from "./checker.js";

/**
 * Declaration checking pass - resolves descriptors into types
 */
export const pass: Pass<{
  needs: {
    program: Program;
  };
  adds: {
    declarations: Declarations;
  };
  error: LayoutError;
}> = {
  async run({ program }) {
    return Result.map(checkProgram(program), (declarations) => ({
      declarations,
    }));
  },
};
