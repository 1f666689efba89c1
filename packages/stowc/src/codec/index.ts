export * from "./value.js";
export * from "./primitives.js";
export * from "./generate.js";
export { Error as CodecError, ErrorCode as CodecErrorCode } from "./errors.js";
