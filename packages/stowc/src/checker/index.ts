export { checkProgram, resolveType } from "./checker.js";
export * from "./errors.js";
export { pass } from "./pass.js";
