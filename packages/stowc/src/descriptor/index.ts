export * from "./descriptor.js";
export * as Build from "./builders.js";
