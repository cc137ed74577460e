/**
 * Built-in loss functions, registered by default in the loss registry.
 *
 * - wape: Weighted Absolute Percentage Error
 * - bias: relative bias (signed WAPE)
 */

export * from "./ratio.ts";
export * from "./wape.ts";
export * from "./bias.ts";

import { BiasMetric } from "./bias.ts";
import { WapeMetric } from "./wape.ts";
import type { LossFunction } from "../interface.ts";

export function getBuiltinLosses(): LossFunction[] {
	return [new WapeMetric(), new BiasMetric()];
}
