/**
 * Tests for evaluate(): several losses, long-format output.
 */

import { describe, expect, it, vi } from "vitest";
import { InvalidOptionsError } from "../errors.ts";
import { RegistryNotFoundError } from "../registry/index.ts";
import { RatioMetric } from "./builtin/index.ts";
import { evaluate } from "./evaluate.ts";
import { createRegistry } from "./registry.ts";

const rows = [
	{ unique_id: "B", ds: 1, y: 30, model1: 33, model2: 30 },
	{ unique_id: "B", ds: 2, y: 40, model1: 44, model2: 44 },
	{ unique_id: "A", ds: 1, y: 10, model1: 9, model2: 12 },
	{ unique_id: "A", ds: 2, y: 20, model1: 18, model2: 20 },
];

describe("evaluate", () => {
	it("stacks wape then bias, inferring the model columns", () => {
		expect(evaluate(rows)).toEqual([
			{ unique_id: "A", metric: "wape", model1: 0.1, model2: 2 / 30 },
			{ unique_id: "B", metric: "wape", model1: 0.1, model2: 4 / 70 },
			{ unique_id: "A", metric: "bias", model1: 0.1, model2: -2 / 30 },
			{ unique_id: "B", metric: "bias", model1: -0.1, model2: -4 / 70 },
		]);
	});

	it("puts the metric column between group and model columns", () => {
		const result = evaluate({ unique_id: ["A"], y: [10], m: [9] }, { metrics: ["wape"] });
		expect(Object.keys(result)).toEqual(["unique_id", "metric", "m"]);
		expect(result).toEqual({ unique_id: ["A"], metric: ["wape"], m: [0.1] });
	});

	it("uses explicit models and metric aliases", () => {
		expect(evaluate(rows, { models: ["model2"], metrics: ["BIAS", "relative_bias"] })).toEqual([
			{ unique_id: "A", metric: "bias", model2: -2 / 30 },
			{ unique_id: "B", metric: "bias", model2: -4 / 70 },
		]);
	});

	it("rejects unknown metrics before touching the dataset", () => {
		expect(() => evaluate(new Set(), { metrics: ["wape", "mystery"] })).toThrow(RegistryNotFoundError);
	});

	it("reserves the metric column name", () => {
		const clash = [{ unique_id: "A", y: 1, metric: 1 }];
		expect(() => evaluate(clash)).toThrow(InvalidOptionsError);
	});

	it("warns about a model column without predictions", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const sparse = [
			{ unique_id: "A", y: 10, m: 9, empty: null },
			{ unique_id: "A", y: 20, m: 18, empty: null },
		];

		const result = evaluate(sparse, { metrics: ["wape"] });

		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn).toHaveBeenCalledWith(
			'evaluate: model column "empty" has no predictions, its scores are NaN',
		);
		expect(result[0]?.empty).toBeNaN();
	});

	it("looks metrics up in a custom registry", () => {
		const registry = createRegistry();
		registry.register(new RatioMetric("signed_ratio", false, [], "Signed error ratio"));

		const result = evaluate(rows, { registry, metrics: ["signed_ratio"], models: ["model1"] });
		expect(result).toEqual([
			{ unique_id: "A", metric: "signed_ratio", model1: 0.1 },
			{ unique_id: "B", metric: "signed_ratio", model1: -0.1 },
		]);
	});
});
