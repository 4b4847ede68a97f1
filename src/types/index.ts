// Domain types and the small helpers that operate on them
export * from "./items.js";
export * from "./platform.js";
export * from "./archive.js";
export * from "./summary.js";
