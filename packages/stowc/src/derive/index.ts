export { Deriver, type DeriveOptions } from "./deriver.js";
export type { Derived } from "./derived.js";
export { Registry, State, type Entry } from "./registry.js";
export { Formatter, formatDerived } from "./formatter.js";
export { pass } from "./pass.js";
