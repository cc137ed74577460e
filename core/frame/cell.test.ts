import { describe, expect, it } from "vitest";
import { cellKey, compareCells, isMissing, tupleKey } from "./cell.ts";

describe("isMissing", () => {
	it("treats null, undefined and NaN as missing", () => {
		expect([null, undefined, Number.NaN, 0, "", false].map(isMissing)).toEqual([
			true,
			true,
			true,
			false,
			false,
			false,
		]);
	});
});

describe("compareCells", () => {
	it("orders missing, boolean, number, date, string", () => {
		const cells = ["b", new Date(0), 2, true, null];
		const sorted = [...cells].sort(compareCells);
		expect(sorted).toEqual([null, true, 2, new Date(0), "b"]);
	});

	it("treats every missing marker as equal", () => {
		expect(compareCells(Number.NaN, null)).toBe(0);
		expect(compareCells(Number.NaN, Number.NaN)).toBe(0);
	});

	it("compares strings by code point", () => {
		expect(compareCells("B", "a")).toBeLessThan(0);
		expect(compareCells("a", "a")).toBe(0);
		expect(compareCells("ab", "a")).toBeGreaterThan(0);
		expect(["\u{1F600}", "\uFF5E"].sort(compareCells)).toEqual(["\uFF5E", "\u{1F600}"]);
		expect(compareCells("x\u{1F600}", "x\uFF5E")).toBeGreaterThan(0);
	});
});

describe("group keys", () => {
	it("keeps values of different types apart", () => {
		expect(cellKey(1)).not.toBe(cellKey("1"));
		expect(tupleKey([1, "a"])).not.toBe(tupleKey(["1", "a"]));
	});

	it("merges equal dates and all missing markers", () => {
		expect(cellKey(new Date(5))).toBe(cellKey(new Date(5)));
		expect(cellKey(null)).toBe(cellKey(Number.NaN));
	});
});
