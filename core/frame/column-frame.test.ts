/**
 * Unit tests for ColumnFrame: construction, projection, grouping, sorting.
 */

import { describe, expect, it } from "vitest";
import { ColumnNotFoundError, ColumnTypeError } from "../errors.ts";
import { ColumnFrame } from "./column-frame.ts";
import { col, lit } from "./expr.ts";

describe("ColumnFrame", () => {
	describe("construction", () => {
		it("rejects columns of different lengths", () => {
			expect(() =>
				ColumnFrame.fromColumns([
					["a", [1, 2]],
					["b", [1]],
				]),
			).toThrow('Column "b" has 1 rows, expected 2');
		});

		it("keeps an explicit height for a frame without columns", () => {
			expect(ColumnFrame.fromColumns([], 3).height).toBe(3);
			expect(ColumnFrame.fromColumns([]).height).toBe(0);
		});

		it("copies input arrays", () => {
			const values = [1, 2, 3];
			const frame = ColumnFrame.fromColumns([["a", values]]);
			values[0] = 99;
			expect(frame.column("a")).toEqual([1, 2, 3]);
		});

		it("names the missing column and the available ones", () => {
			const frame = ColumnFrame.fromColumns([
				["a", [1]],
				["b", [2]],
			]);
			expect(() => frame.column("zz")).toThrow(ColumnNotFoundError);
			expect(() => frame.column("zz")).toThrow('Column "zz" not found. Available: a, b');
		});
	});

	describe("select", () => {
		it("projects names and expressions in order", () => {
			const frame = ColumnFrame.fromColumns([
				["a", [1, 2]],
				["b", [10, 20]],
			]);
			const selected = frame.select("b", col("a").add(col("b")).alias("total"), lit("x").alias("tag"));

			expect(selected.columns).toEqual(["b", "total", "tag"]);
			expect(selected.toRows()).toEqual([
				{ b: 10, total: 11, tag: "x" },
				{ b: 20, total: 22, tag: "x" },
			]);
		});
	});

	describe("groupBy().sum()", () => {
		it("sums per group in order of first appearance, skipping missing cells", () => {
			const frame = ColumnFrame.fromColumns([
				["id", ["b", "a", "b", "a"]],
				["v", [1, 2, null, Number.NaN]],
				["w", [1, 1, 1, 1]],
			]);

			const summed = frame.groupBy("id").sum();

			expect(summed.columns).toEqual(["id", "v", "w"]);
			expect(summed.toRows()).toEqual([
				{ id: "b", v: 1, w: 2 },
				{ id: "a", v: 2, w: 2 },
			]);
		});

		it("sums an all-missing group to 0", () => {
			const frame = ColumnFrame.fromColumns([
				["id", ["a", "a"]],
				["v", [null, undefined]],
			]);
			expect(frame.groupBy("id").sum().column("v")).toEqual([0]);
		});

		it("groups dates by timestamp", () => {
			const frame = ColumnFrame.fromColumns([
				["cutoff", [new Date("2024-01-01T00:00:00Z"), new Date("2024-01-01T00:00:00Z")]],
				["v", [1, 2]],
			]);
			expect(frame.groupBy("cutoff").sum().column("v")).toEqual([3]);
		});

		it("rejects non-numeric values", () => {
			const frame = ColumnFrame.fromColumns([
				["id", ["a"]],
				["v", ["x"]],
			]);
			expect(() => frame.groupBy("id").sum()).toThrow(ColumnTypeError);
			expect(() => frame.groupBy("id").sum()).toThrow(
				'Cannot sum column "v": found non-numeric value "x"',
			);
		});

		it("fails on an unknown key column", () => {
			const frame = ColumnFrame.fromColumns([["v", [1]]]);
			expect(() => frame.groupBy("id")).toThrow(ColumnNotFoundError);
		});

		it("returns an empty frame with all columns for no rows", () => {
			const frame = ColumnFrame.fromColumns([
				["id", []],
				["v", []],
			]);
			const summed = frame.groupBy("id").sum();
			expect(summed.height).toBe(0);
			expect(summed.columns).toEqual(["id", "v"]);
		});
	});

	describe("sort", () => {
		it("sorts lexicographically over several keys", () => {
			const late = new Date("2024-02-01T00:00:00Z");
			const early = new Date("2024-01-01T00:00:00Z");
			const frame = ColumnFrame.fromColumns([
				["cutoff", [late, early, early]],
				["id", ["b", "b", "a"]],
				["row", [0, 1, 2]],
			]);

			expect(frame.sort("cutoff", "id").column("row")).toEqual([2, 1, 0]);
		});

		it("puts missing values first and numbers in numeric order", () => {
			const frame = ColumnFrame.fromColumns([["v", [10, null, 9, 100]]]);
			expect(frame.sort("v").column("v")).toEqual([null, 9, 10, 100]);
		});

		it("orders string ids by code point", () => {
			const frame = ColumnFrame.fromColumns([["id", ["\u{1F600}", "\uFF5E", "a"]]]);
			expect(frame.sort("id").column("id")).toEqual(["a", "\uFF5E", "\u{1F600}"]);
		});

		it("leaves the source frame untouched", () => {
			const frame = ColumnFrame.fromColumns([["v", [3, 1, 2]]]);
			frame.sort("v");
			expect(frame.column("v")).toEqual([3, 1, 2]);
		});
	});

	describe("concat", () => {
		it("stacks frames with the same columns", () => {
			const top = ColumnFrame.fromColumns([["a", [1]]]);
			const bottom = ColumnFrame.fromColumns([["a", [2, 3]]]);

			const stacked = ColumnFrame.concat([top, bottom]);
			expect(stacked.height).toBe(3);
			expect(stacked.column("a")).toEqual([1, 2, 3]);
		});

		it("rejects frames with different columns", () => {
			const top = ColumnFrame.fromColumns([["a", [1]]]);
			const bottom = ColumnFrame.fromColumns([["b", [2]]]);
			expect(() => ColumnFrame.concat([top, bottom])).toThrow(RangeError);
		});
	});
});
