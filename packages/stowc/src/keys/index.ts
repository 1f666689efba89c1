export * from "./allocator.js";
