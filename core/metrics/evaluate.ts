/**
 * evaluate() - several losses in one call, long format.
 */

import { EvaluateOptionsSchema, type EvaluateConfigInput, parseOptions } from "../config.ts";
import { InvalidOptionsError } from "../errors.ts";
import { isMissing } from "../frame/cell.ts";
import { ColumnFrame } from "../frame/column-frame.ts";
import type { FrameAdapterRegistry } from "../frame/adapter.ts";
import { getDefaultAdapterRegistry, type NativeResult } from "../frame/adapters/index.ts";
import { lit } from "../frame/expr.ts";
import { frameLossHelpers, type LossHelpers } from "./helpers.ts";
import { getDefaultRegistry, type LossRegistry } from "./registry.ts";

export const METRIC_COLUMN = "metric";

export interface EvaluateOptions extends EvaluateConfigInput {
	helpers?: LossHelpers;
	adapters?: FrameAdapterRegistry;
	/** Where metric names are looked up (default: getDefaultRegistry()) */
	registry?: LossRegistry;
}

/**
 * Compute the requested losses and stack them into one dataset with
 * columns `[...groupCols, "metric", ...models]`: one block per loss, in
 * request order, each sorted by group key.
 *
 * Without `models`, every column other than the id, cutoff, target and
 * time columns is treated as a model.
 *
 * @throws RegistryNotFoundError if a metric name is unknown, before anything is computed
 */
export function evaluate<T>(df: T, options?: EvaluateOptions): NativeResult<T>;
export function evaluate(df: unknown, options: EvaluateOptions = {}): unknown {
	const {
		helpers = frameLossHelpers,
		adapters = getDefaultAdapterRegistry(),
		registry = getDefaultRegistry(),
		...rest
	} = options;
	const config = parseOptions(EvaluateOptionsSchema, rest);
	const losses = registry.resolveAll(config.metrics);

	const { frame, restore } = adapters.adapt(df);
	const reserved = new Set([config.idCol, config.cutoffCol, config.targetCol, config.timeCol]);
	const models = config.models ?? frame.columns.filter((name) => !reserved.has(name));

	const groupCols = helpers.groupCols(frame, config.idCol, config.cutoffCol);
	if (groupCols.includes(METRIC_COLUMN) || models.includes(METRIC_COLUMN)) {
		throw new InvalidOptionsError([`"${METRIC_COLUMN}" is reserved for the metric name column`]);
	}

	const computeOptions = {
		idCol: config.idCol,
		targetCol: config.targetCol,
		cutoffCol: config.cutoffCol,
		helpers,
	};
	const blocks = losses.map((loss) =>
		loss
			.compute(frame, models, computeOptions)
			.select(...groupCols, lit(loss.name).alias(METRIC_COLUMN), ...models),
	);

	for (const model of models) {
		if (frame.column(model).every(isMissing)) {
			console.warn(`evaluate: model column "${model}" has no predictions, its scores are NaN`);
		}
	}

	return restore(ColumnFrame.concat(blocks));
}
