/**
 * Type system for storable data structures
 *
 * This module contains the core type definitions used throughout the
 * resolver. It is separate from the checker to allow other modules to use
 * types without depending on the checking logic.
 */

export { Type } from "./definitions.js";
export { Types, type Lookup } from "./factories.js";

import type { Type } from "./definitions.js";

/**
 * All composite types of a program, by name, in declaration order
 */
export type Declarations = ReadonlyMap<string, Type.Composite>;

export { Packedness } from "./packedness.js";
