import type { LayoutError } from "#checker";
import type { Pass } from "#compiler";
import type { Program } from "#descriptor";
import type { Declarations } from "#types";
import { Result } from "#result";

import type { Derived } from "./derived.js";
import { Deriver } from "./deriver.js";
import type { Registry } from "./registry.js";

/**
 * Derive pass - resolves the storage layout of every declaration.
 * An explicit `rootKey` overrides the one the definitions declare.
 */
export const pass: Pass<{
  needs: {
    program: Program;
    declarations: Declarations;
    rootKey?: number;
    storageMapPrefix?: string;
  };
  adds: {
    derived: Derived[];
    registry: Registry;
  };
  error: LayoutError;
}> = {
  async run({ program, declarations, rootKey, storageMapPrefix }) {
    const deriver = new Deriver(declarations, {
      rootKey: rootKey ?? program.rootKey,
      storageMapPrefix,
    });
    return Result.map(deriver.deriveAll(), (derived) => ({
      derived,
      registry: deriver.registry,
    }));
  },
};
