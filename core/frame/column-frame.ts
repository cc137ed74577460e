/**
 * ColumnFrame - the engine-neutral table every metric works on.
 *
 * Immutable: every operation returns a new frame and never touches the
 * arrays it was built from. Native datasets are turned into a ColumnFrame
 * by a FrameAdapter and back again once the computation is done.
 */

import { ColumnNotFoundError, ColumnTypeError } from "../errors.ts";
import { type CellValue, compareTuples, isMissing, tupleKey } from "./cell.ts";
import { col, type ColumnSource, type Expr } from "./expr.ts";

export type ColumnInput = string | Expr;

export class ColumnFrame implements ColumnSource {
	private readonly data: ReadonlyMap<string, readonly CellValue[]>;
	readonly height: number;

	private constructor(data: ReadonlyMap<string, readonly CellValue[]>, height: number) {
		this.data = data;
		this.height = height;
	}

	/**
	 * Build a frame from named columns.
	 * @param height - Row count; required to describe a frame with no columns
	 * @throws RangeError if the columns differ in length
	 */
	static fromColumns(
		columns: Iterable<readonly [string, readonly CellValue[]]>,
		height?: number,
	): ColumnFrame {
		const data = new Map<string, readonly CellValue[]>();
		let rows = height;

		for (const [name, values] of columns) {
			if (rows === undefined) {
				rows = values.length;
			} else if (values.length !== rows) {
				throw new RangeError(
					`Column "${name}" has ${values.length} rows, expected ${rows}`,
				);
			}
			data.set(name, [...values]);
		}

		return new ColumnFrame(data, rows ?? 0);
	}

	/**
	 * Stack frames with the same columns on top of each other.
	 * @throws RangeError if the column lists differ
	 */
	static concat(frames: readonly ColumnFrame[]): ColumnFrame {
		const [first] = frames;
		if (first === undefined) {
			return ColumnFrame.fromColumns([]);
		}

		const names = first.columns;
		for (const frame of frames) {
			if (frame.columns.join("\u0000") !== names.join("\u0000")) {
				throw new RangeError(
					`Cannot concat frames with columns [${frame.columns.join(", ")}] and [${names.join(", ")}]`,
				);
			}
		}

		return ColumnFrame.fromColumns(
			names.map((name) => [name, frames.flatMap((frame) => frame.column(name))] as const),
			frames.reduce((total, frame) => total + frame.height, 0),
		);
	}

	/**
	 * Column names, in order.
	 */
	get columns(): string[] {
		return Array.from(this.data.keys());
	}

	hasColumn(name: string): boolean {
		return this.data.has(name);
	}

	/**
	 * @throws ColumnNotFoundError
	 */
	column(name: string): readonly CellValue[] {
		const values = this.data.get(name);
		if (values === undefined) {
			throw new ColumnNotFoundError(name, this.columns);
		}
		return values;
	}

	/**
	 * Project columns and derived expressions. Strings are column references.
	 * Later outputs with the same name replace earlier ones in place.
	 */
	select(...inputs: ColumnInput[]): ColumnFrame {
		const exprs = inputs.map((input) => (typeof input === "string" ? col(input) : input));
		return ColumnFrame.fromColumns(
			exprs.map((expr) => [expr.outputName, expr.evaluate(this)] as const),
			this.height,
		);
	}

	/**
	 * Partition rows by the given key columns, in order of first appearance.
	 */
	groupBy(...keys: string[]): GroupedFrame {
		for (const key of keys) {
			this.column(key);
		}
		return new GroupedFrame(this, keys);
	}

	/**
	 * Stable ascending sort by the given key columns.
	 */
	sort(...keys: string[]): ColumnFrame {
		const keyColumns = keys.map((key) => this.column(key));
		const tupleAt = (row: number) => keyColumns.map((values) => values[row]);

		const order = Array.from({ length: this.height }, (_, row) => row);
		order.sort((a, b) => compareTuples(tupleAt(a), tupleAt(b)) || a - b);

		return this.take(order);
	}

	/**
	 * Rows at the given positions, in that order.
	 */
	take(rows: readonly number[]): ColumnFrame {
		return ColumnFrame.fromColumns(
			this.columns.map((name) => {
				const values = this.column(name);
				return [name, rows.map((row) => values[row])] as const;
			}),
			rows.length,
		);
	}

	/**
	 * Row-oriented view, one object per row with keys in column order.
	 */
	toRows(): Record<string, CellValue>[] {
		const names = this.columns;
		return Array.from({ length: this.height }, (_, row) => {
			const record: Record<string, CellValue> = {};
			for (const name of names) {
				record[name] = this.column(name)[row];
			}
			return record;
		});
	}
}

/**
 * Result of `ColumnFrame.groupBy`.
 */
export class GroupedFrame {
	constructor(
		private readonly frame: ColumnFrame,
		private readonly keys: readonly string[],
	) {}

	/**
	 * Row positions per group, in order of first appearance.
	 */
	private partitions(): number[][] {
		const keyColumns = this.keys.map((key) => this.frame.column(key));
		const groups = new Map<string, number[]>();

		for (let row = 0; row < this.frame.height; row++) {
			const key = tupleKey(keyColumns.map((values) => values[row]));
			const rows = groups.get(key);
			if (rows) {
				rows.push(row);
			} else {
				groups.set(key, [row]);
			}
		}

		return Array.from(groups.values());
	}

	/**
	 * One row per group: the key columns, then the sum of every other column.
	 * Missing cells add nothing, so an all-missing group sums to 0.
	 * @throws ColumnTypeError on a non-numeric, non-missing cell
	 */
	sum(): ColumnFrame {
		const groups = this.partitions();
		const first = groups.map((rows) => rows[0] ?? 0);
		const valueNames = this.frame.columns.filter((name) => !this.keys.includes(name));

		const keyColumns = this.keys.map((key) => {
			const values = this.frame.column(key);
			return [key, first.map((row) => values[row])] as const;
		});

		const sumColumns = valueNames.map((name) => {
			const values = this.frame.column(name);
			const sums = groups.map((rows) => {
				let total = 0;
				for (const row of rows) {
					const value = values[row];
					if (isMissing(value)) continue;
					if (typeof value !== "number") {
						throw new ColumnTypeError(name, "sum", value);
					}
					total += value;
				}
				return total;
			});
			return [name, sums] as const;
		});

		return ColumnFrame.fromColumns([...keyColumns, ...sumColumns], groups.length);
	}
}
