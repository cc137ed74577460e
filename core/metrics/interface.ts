/**
 * Loss function interface for the loss registry.
 * Each loss turns a frame of actuals and model predictions into one row
 * per group with one column per model.
 */

import type { ColumnOptions, ColumnOptionsInput } from "../config.ts";
import type { ColumnFrame } from "../frame/column-frame.ts";
import type { FrameAdapterRegistry } from "../frame/adapter.ts";
import type { LossHelpers } from "./helpers.ts";

/**
 * Fully resolved options handed to `LossFunction.compute`.
 */
export interface LossComputeOptions extends ColumnOptions {
	helpers: LossHelpers;
}

/**
 * Options accepted by the public metric functions.
 */
export interface MetricCallOptions extends ColumnOptionsInput {
	/** Group-key and zero-guard helpers (default: frameLossHelpers) */
	helpers?: LossHelpers;
	/** Adapters used to read the native dataset (default: built-in records/columns) */
	adapters?: FrameAdapterRegistry;
}

export interface LossFunction {
	/**
	 * Primary name (used for lookup and in evaluate's `metric` column).
	 */
	readonly name: string;

	readonly aliases?: readonly string[];

	readonly description?: string;

	/**
	 * @param models - Prediction columns; the result has one column per model, in this order
	 * @returns Group columns followed by model columns, sorted by group key
	 */
	compute(frame: ColumnFrame, models: readonly string[], options: LossComputeOptions): ColumnFrame;
}
