/**
 * forecast-ratio-metrics - WAPE and relative bias for forecast evaluation.
 */

export * from "./config.ts";
export * from "./errors.ts";
export * from "./registry/index.ts";
export * from "./frame/index.ts";
export * from "./metrics/index.ts";
