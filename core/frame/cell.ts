/**
 * Cell values and their ordering.
 *
 * A cell is missing when it is `null`, `undefined` or `NaN`.
 */

export type CellValue = string | number | boolean | Date | null | undefined;

export function isMissing(value: CellValue): boolean {
	return value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));
}

/**
 * Type rank used when ordering cells of different types.
 * Missing values sort first.
 */
function typeRank(value: CellValue): number {
	if (isMissing(value)) return 0;
	if (typeof value === "boolean") return 1;
	if (typeof value === "number") return 2;
	if (value instanceof Date) return 3;
	return 4;
}

/**
 * Total order over cells: missing < boolean < number < Date < string.
 * Numbers compare numerically, dates by timestamp, strings by code point.
 */
export function compareCells(a: CellValue, b: CellValue): number {
	const rankA = typeRank(a);
	const rankB = typeRank(b);
	if (rankA !== rankB) {
		return rankA - rankB;
	}
	if (rankA === 0) {
		return 0;
	}

	if (typeof a === "number" && typeof b === "number") {
		return a - b;
	}
	if (typeof a === "boolean" && typeof b === "boolean") {
		return Number(a) - Number(b);
	}
	if (a instanceof Date && b instanceof Date) {
		return a.getTime() - b.getTime();
	}
	if (typeof a === "string" && typeof b === "string") {
		return compareCodePoints(a, b);
	}
	return 0;
}

/**
 * Orders strings by Unicode code point. Plain `<` compares UTF-16 code
 * units, which puts astral characters before U+E000..U+FFFF.
 */
function compareCodePoints(a: string, b: string): number {
	let i = 0;
	let j = 0;
	while (i < a.length && j < b.length) {
		const ca = a.codePointAt(i) ?? 0;
		const cb = b.codePointAt(j) ?? 0;
		if (ca !== cb) return ca - cb;
		i += ca > 0xffff ? 2 : 1;
		j += cb > 0xffff ? 2 : 1;
	}
	return (a.length - i) - (b.length - j);
}

/**
 * Lexicographic comparison of two equal-length tuples.
 */
export function compareTuples(a: readonly CellValue[], b: readonly CellValue[]): number {
	for (let i = 0; i < a.length; i++) {
		const order = compareCells(a[i], b[i]);
		if (order !== 0) return order;
	}
	return 0;
}

/**
 * Identity key for grouping. Two cells get the same key iff they are the
 * same value: dates by timestamp, every missing marker as one key.
 */
export function cellKey(value: CellValue): string {
	if (isMissing(value)) return "null";
	if (value instanceof Date) return `t:${value.getTime()}`;
	return `${typeof value}:${String(value)}`;
}

export function tupleKey(values: readonly CellValue[]): string {
	return JSON.stringify(values.map(cellKey));
}
