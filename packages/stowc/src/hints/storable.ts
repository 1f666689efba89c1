import type { Codec } from "#codec";
import type { LayoutError } from "#checker";
import type { StorageKey } from "#keys";
import type { Packedness, Type } from "#types";
import type { Result } from "#result";

import type { Hint } from "./resolver.js";

/**
 * A user type whose storage layout has been resolved
 */
export interface Storable {
  name: string;
  type: Type.Composite;
  packedness: Packedness;
  /** Encodes and decodes the inline fields only */
  codec: Codec;
  /** Hints of the type when its own cell is `key` */
  hintsAt(key: StorageKey): Result<Hint[], LayoutError>;
}

export type StorableLookup = (name: string) => Storable | undefined;
