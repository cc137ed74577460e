/**
 * Frame module - engine-neutral columns, expressions and native adapters.
 */

export * from "./cell.ts";
export * from "./expr.ts";
export * from "./column-frame.ts";
export * from "./adapter.ts";
export * from "./adapters/index.ts";
