/**
 * Columns adapter: an object of equal-length arrays, one per column.
 */

import { ColumnFrame } from "../column-frame.ts";
import type { CellValue } from "../cell.ts";
import type { FrameAdapter } from "../adapter.ts";
import { isCellValue, isPlainObject } from "./guards.ts";

export type ColumnTable = Readonly<Record<string, readonly CellValue[]>>;
export type ColumnResult = Record<string, CellValue[]>;

export class ColumnsAdapter implements FrameAdapter<ColumnTable, ColumnResult> {
	readonly name = "columns";
	readonly aliases = ["columnar"] as const;
	readonly description = "Object of equal-length column arrays";

	canAdapt(value: unknown): value is ColumnTable {
		if (!isPlainObject(value)) {
			return false;
		}

		let height: number | undefined;
		for (const values of Object.values(value)) {
			if (!Array.isArray(values) || !values.every(isCellValue)) {
				return false;
			}
			height ??= values.length;
			if (values.length !== height) {
				return false;
			}
		}
		return true;
	}

	fromNative(native: ColumnTable): ColumnFrame {
		return ColumnFrame.fromColumns(Object.entries(native));
	}

	toNative(frame: ColumnFrame): ColumnResult {
		return Object.fromEntries(frame.columns.map((name) => [name, [...frame.column(name)]]));
	}
}
