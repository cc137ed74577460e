/**
 * Runtime shape checks shared by the built-in adapters.
 */

import type { CellValue } from "../cell.ts";

/**
 * Object literal (or `Object.create(null)`), not a class instance.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export function isCellValue(value: unknown): value is CellValue {
	return (
		value === null ||
		value === undefined ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		value instanceof Date
	);
}
