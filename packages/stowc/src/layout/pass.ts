import {
  LayoutError,
  ErrorCode,
  ErrorMessages,
} from "#checker";
import type { Pass } from "#compiler";
import type { Program } from "#descriptor";
import type { Derived, Registry } from "#derive";
import { Result } from "#result";

import { layoutOf, type LayoutMetadata } from "./metadata.js";

/**
 * Layout pass - renders layout metadata for the root type, or for every
 * type when no root is named
 */
export const pass: Pass<{
  needs: {
    program: Program;
    derived: Derived[];
    registry: Registry;
    root?: string;
    storageMapPrefix?: string;
  };
  adds: {
    layouts: Map<string, LayoutMetadata>;
  };
  error: LayoutError;
}> = {
  async run({ program, derived, registry, root, storageMapPrefix }) {
    const name = root ?? program.root;
    const targets = name
      ? derived.filter((entry) => entry.name === name)
      : derived;

    if (name && targets.length === 0) {
      return Result.err(
        new LayoutError(
          ErrorCode.MISSING_CODEC_SUPPORT,
          ErrorMessages.UNKNOWN_TYPE(name),
        ),
      );
    }

    const layouts = new Map<string, LayoutMetadata>();
    const errors: LayoutError[] = [];
    for (const target of targets) {
      const result = layoutOf(target, target.key, {
        lookup: (reference) => registry.derived(reference),
        storageMapPrefix,
      });
      if (!result.success) {
        errors.push(...Result.errors(result));
        continue;
      }
      layouts.set(target.name, result.value);
    }

    if (errors.length > 0) {
      return Result.err(errors);
    }
    return Result.ok({ layouts });
  },
};
