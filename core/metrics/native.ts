/**
 * Public WAPE and BIAS functions on native datasets.
 *
 * Each call adapts the dataset to a ColumnFrame, runs the loss and hands
 * the result back in the caller's representation. The input is never
 * mutated.
 */

import { parseColumnOptions, parseModels } from "../config.ts";
import type { FrameAdapterRegistry } from "../frame/adapter.ts";
import { getDefaultAdapterRegistry, type NativeResult } from "../frame/adapters/index.ts";
import { BiasMetric } from "./builtin/bias.ts";
import { WapeMetric } from "./builtin/wape.ts";
import { frameLossHelpers } from "./helpers.ts";
import type { LossComputeOptions, LossFunction, MetricCallOptions } from "./interface.ts";

export interface ResolvedCallOptions {
	compute: LossComputeOptions;
	adapters: FrameAdapterRegistry;
}

/**
 * Validate call options and fill in defaults.
 * @throws InvalidOptionsError
 */
export function resolveCallOptions(options: MetricCallOptions = {}): ResolvedCallOptions {
	const { helpers = frameLossHelpers, adapters = getDefaultAdapterRegistry(), ...columns } = options;
	return {
		compute: { ...parseColumnOptions(columns), helpers },
		adapters,
	};
}

/**
 * Run one loss on a native dataset and return the native result.
 */
export function computeOnNative(
	loss: LossFunction,
	df: unknown,
	models: readonly string[],
	options: MetricCallOptions = {},
): unknown {
	const validModels = parseModels(models);
	const { compute, adapters } = resolveCallOptions(options);
	const { frame, restore } = adapters.adapt(df);
	return restore(loss.compute(frame, validModels, compute));
}

const WAPE = new WapeMetric();
const BIAS = new BiasMetric();

/**
 * Weighted Absolute Percentage Error (WAPE).
 *
 * Sums the absolute errors (actual - forecast) across all rows with an
 * available forecast and divides by the sum of actuals over the same rows.
 *
 * @param df - Dataset with id, actual values and predictions
 * @param models - Columns holding each model's predictions
 * @returns Same representation as `df`: one row per series (and cutoff,
 * when present) and one column per model
 *
 * @example
 * ```typescript
 * wape(rows, ["naive", "ets"]);
 * wape(rows, ["naive"], { idCol: "store", targetCol: "sales" });
 * ```
 */
export function wape<T>(df: T, models: readonly string[], options?: MetricCallOptions): NativeResult<T>;
export function wape(df: unknown, models: readonly string[], options: MetricCallOptions = {}): unknown {
	return computeOnNative(WAPE, df, models, options);
}

/**
 * Relative bias.
 *
 * Sums the signed error (actual - forecast) across all rows with an
 * available forecast and scales it by the sum of actuals over those rows.
 * Positive means under-forecasting, negative over-forecasting.
 *
 * @param df - Dataset with id, actual values and predictions
 * @param models - Columns holding each model's predictions
 * @returns Same representation as `df`, shaped as for {@link wape}
 */
export function bias<T>(df: T, models: readonly string[], options?: MetricCallOptions): NativeResult<T>;
export function bias(df: unknown, models: readonly string[], options: MetricCallOptions = {}): unknown {
	return computeOnNative(BIAS, df, models, options);
}
