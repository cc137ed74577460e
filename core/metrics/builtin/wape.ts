/**
 * Weighted Absolute Percentage Error.
 *
 * Sums |actual - forecast| over every row with a forecast and divides by
 * the sum of actuals over the same rows. Not clamped: a group whose
 * actuals sum negative gets a negative WAPE.
 */

import { RatioMetric } from "./ratio.ts";

export class WapeMetric extends RatioMetric {
	constructor() {
		super(
			"wape",
			true,
			["WAPE"],
			"Sum of absolute errors over sum of actuals, per series",
		);
	}
}
