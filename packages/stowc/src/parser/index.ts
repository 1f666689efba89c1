/**
 * Parser module for layout definitions
 */

export { parse } from "./parser.js";
export { parseTypeExpression } from "./type-expression.js";
export * from "./errors.js";
export { pass } from "./pass.js";
