export {
  Strategy,
  cellHints,
  inlineFields,
  resolveHints,
  type Hint,
  type ResolveOptions,
} from "./resolver.js";
export type { Storable, StorableLookup } from "./storable.js";
