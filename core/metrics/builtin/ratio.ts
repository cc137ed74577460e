/**
 * Ratio losses: per group, the sum of per-row errors divided by the sum
 * of actuals over the rows each model actually forecast.
 *
 * Pipeline:
 * 1. per model, an error column and an actuals column, both masked to
 *    missing wherever the model has no prediction
 * 2. group by the group columns and sum every masked column
 * 3. divide, with zero denominators turned into NaN
 * 4. sort by the group columns
 *
 * Masking is per model, so a model that skipped a row never changes the
 * denominator of another model that forecast it. Rows are never filtered.
 */

import { InvalidOptionsError } from "../../errors.ts";
import type { ColumnFrame } from "../../frame/column-frame.ts";
import { col, type Expr, when } from "../../frame/expr.ts";
import type { LossComputeOptions, LossFunction } from "../interface.ts";

export interface RatioMetricOptions extends LossComputeOptions {
	/** Sum |actual - forecast| instead of the signed error */
	absoluteError: boolean;
}

function numeratorName(index: number): string {
	return `__metric_${index}_num`;
}

function denominatorName(index: number): string {
	return `__metric_${index}_den`;
}

/**
 * Compute a ratio loss on an engine-neutral frame.
 *
 * @returns One row per distinct group key: group columns, then one column
 * per model holding the ratio, or NaN where no actuals accumulated
 * @throws ColumnNotFoundError if the id, target or a model column is absent
 * @throws InvalidOptionsError if a model is also a group column
 */
export function ratioMetric(
	frame: ColumnFrame,
	models: readonly string[],
	options: RatioMetricOptions,
): ColumnFrame {
	const { idCol, targetCol, cutoffCol, helpers, absoluteError } = options;
	const groupCols = helpers.groupCols(frame, idCol, cutoffCol);

	for (const name of [...groupCols, targetCol, ...models]) {
		frame.column(name);
	}
	const clashing = models.filter((model) => groupCols.includes(model));
	if (clashing.length > 0) {
		throw new InvalidOptionsError(
			clashing.map((model) => `models: "${model}" is a grouping column`),
		);
	}

	const exprs: Expr[] = [];
	models.forEach((model, index) => {
		let error = col(targetCol).sub(col(model));
		if (absoluteError) {
			error = error.abs();
		}

		const predNotNull = col(model).isNull().not();

		exprs.push(when(predNotNull).then(error).otherwise(null).alias(numeratorName(index)));
		exprs.push(
			when(predNotNull).then(col(targetCol)).otherwise(null).alias(denominatorName(index)),
		);
	});

	const aggregated = frame
		.select(...groupCols, ...exprs)
		.groupBy(...groupCols)
		.sum();

	return aggregated
		.select(
			...groupCols,
			...models.map((model, index) =>
				col(numeratorName(index))
					.div(helpers.zeroToNaN(col(denominatorName(index))))
					.alias(model),
			),
		)
		.sort(...groupCols);
}

/**
 * A LossFunction backed by `ratioMetric`.
 */
export class RatioMetric implements LossFunction {
	readonly name: string;
	readonly aliases: readonly string[];
	readonly description: string;
	private readonly absoluteError: boolean;

	constructor(name: string, absoluteError: boolean, aliases: readonly string[], description: string) {
		this.name = name;
		this.absoluteError = absoluteError;
		this.aliases = aliases;
		this.description = description;
	}

	compute(frame: ColumnFrame, models: readonly string[], options: LossComputeOptions): ColumnFrame {
		return ratioMetric(frame, models, { ...options, absoluteError: this.absoluteError });
	}
}
