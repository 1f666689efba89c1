export const VERSION = "0.1.0";

// Re-export type descriptors and their builders
export { Build, Descriptor, TypeExpression, type Program } from "#descriptor";

// Re-export parser functionality
export { parse, parseTypeExpression, ParseError } from "#parser";

// Re-export type system
export { Type, Types, Packedness, type Declarations } from "#types";

// Re-export declaration checking and layout diagnostics
export {
  checkProgram,
  resolveType,
  LayoutError,
  ErrorCode as LayoutErrorCode,
  ErrorMessages as LayoutErrorMessages,
  Frame,
} from "#checker";

// Re-export layout resolution
export { Classifier } from "#classifier";
export { checkCollection } from "#collections";
export * from "#keys";
export { Strategy, resolveHints, type Hint, type Storable } from "#hints";
export { Deriver, Registry, formatDerived, type Derived } from "#derive";

// Re-export encoding and storage access
export * as Codec from "#codec";
export * from "#accessors";
export { layoutOf, type Layout, type LayoutMetadata } from "#layout";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export { compile, type CompileOptions, type Target } from "#compiler";

// CLI utilities are not exported so the library loads without Node.js APIs
// They should be imported directly from ./cli when needed
