/**
 * Records adapter: an array of row objects, the shape JSON APIs and CSV
 * parsers hand back.
 *
 * Columns are the union of row keys in order of first appearance; a key
 * absent from a row reads as a missing cell. An empty array has no
 * columns.
 */

import { ColumnFrame } from "../column-frame.ts";
import type { CellValue } from "../cell.ts";
import type { FrameAdapter } from "../adapter.ts";
import { isCellValue, isPlainObject } from "./guards.ts";

export type RecordRow = Readonly<Record<string, CellValue>>;
export type RecordTable = readonly RecordRow[];
/** Rows of a metric result: group columns, then one number per model */
export type RecordResult = Record<string, CellValue>[];

export class RecordsAdapter implements FrameAdapter<RecordTable, RecordResult> {
	readonly name = "records";
	readonly aliases = ["rows"] as const;
	readonly description = "Array of row objects";

	canAdapt(value: unknown): value is RecordTable {
		return (
			Array.isArray(value) &&
			value.every((row: unknown) => isPlainObject(row) && Object.values(row).every(isCellValue))
		);
	}

	fromNative(native: RecordTable): ColumnFrame {
		const names = new Set<string>();
		for (const row of native) {
			for (const key of Object.keys(row)) {
				names.add(key);
			}
		}

		return ColumnFrame.fromColumns(
			Array.from(names, (name) => [name, native.map((row) => row[name])] as const),
			native.length,
		);
	}

	toNative(frame: ColumnFrame): RecordResult {
		return frame.toRows();
	}
}
