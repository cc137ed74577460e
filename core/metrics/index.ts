/**
 * Metrics module - loss registry, built-in ratio losses and the public
 * functions that run them on native datasets.
 */

export * from "./interface.ts";
export * from "./helpers.ts";
export * from "./registry.ts";
export * from "./builtin/index.ts";
export * from "./native.ts";
export * from "./evaluate.ts";
