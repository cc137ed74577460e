/**
 * Relative bias.
 *
 * Sums the signed error (actual - forecast) over every row with a
 * forecast and scales it by the sum of actuals over those rows. Positive
 * values mean the model under-forecasts.
 */

import { RatioMetric } from "./ratio.ts";

export class BiasMetric extends RatioMetric {
	constructor() {
		super(
			"bias",
			false,
			["BIAS", "relative_bias"],
			"Sum of signed errors over sum of actuals, per series",
		);
	}
}
