import { describe, expect, it } from "vitest";
import { ColumnFrame } from "../frame/column-frame.ts";
import { col } from "../frame/expr.ts";
import { frameLossHelpers, type LossHelpers, standaloneLossHelpers } from "./helpers.ts";

const implementations: [string, LossHelpers][] = [
	["frameLossHelpers", frameLossHelpers],
	["standaloneLossHelpers", standaloneLossHelpers],
];

describe.each(implementations)("%s", (_name, helpers) => {
	it("groups by cutoff then id when the cutoff column exists", () => {
		const frame = ColumnFrame.fromColumns([
			["unique_id", ["a"]],
			["cutoff", [1]],
		]);
		expect(helpers.groupCols(frame, "unique_id", "cutoff")).toEqual(["cutoff", "unique_id"]);
	});

	it("groups by id alone without a cutoff column", () => {
		const frame = ColumnFrame.fromColumns([["unique_id", ["a"]]]);
		expect(helpers.groupCols(frame, "unique_id", "cutoff")).toEqual(["unique_id"]);
	});

	it("turns exact zeros into NaN and leaves everything else", () => {
		const frame = ColumnFrame.fromColumns([["den", [0, 2, null, -3, 0.5]]]);
		const [zero, ...rest] = helpers.zeroToNaN(col("den")).evaluate(frame);

		expect(zero).toBeNaN();
		expect(rest).toEqual([2, null, -3, 0.5]);
	});
});
