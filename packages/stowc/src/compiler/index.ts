/**
 * Compiler pass system for composing compilation passes
 */

export * from "./pass.js";
export * from "./sequence.js";
export * from "./sequences/index.js";
export { compile, type CompileOptions } from "./compile.js";
