/**
 * Helpers shared by the ratio losses.
 *
 * Two interchangeable implementations are provided and picked by
 * injection (`options.helpers`):
 * - `frameLossHelpers` builds on the frame layer's conditional expressions
 * - `standaloneLossHelpers` is self-contained and maps cells directly
 *
 * Both produce identical results.
 */

import type { ColumnFrame } from "../frame/column-frame.ts";
import { type Expr, when } from "../frame/expr.ts";

export interface LossHelpers {
	/**
	 * Grouping columns for a dataset: `[cutoffCol, idCol]` when the
	 * dataset has a cutoff column, `[idCol]` otherwise.
	 */
	groupCols(frame: ColumnFrame, idCol: string, cutoffCol: string): string[];

	/**
	 * Replace exact zeros with `NaN` so that dividing by them is undefined
	 * rather than infinite.
	 */
	zeroToNaN(expr: Expr): Expr;
}

export const frameLossHelpers: LossHelpers = {
	groupCols(frame, idCol, cutoffCol) {
		return frame.hasColumn(cutoffCol) ? [cutoffCol, idCol] : [idCol];
	},

	zeroToNaN(expr) {
		return when(expr.eq(0)).then(Number.NaN).otherwise(expr);
	},
};

export const standaloneLossHelpers: LossHelpers = {
	groupCols(frame, idCol, cutoffCol) {
		const columns = frame.columns;
		if (columns.includes(cutoffCol)) {
			return [cutoffCol, idCol];
		}
		return [idCol];
	},

	zeroToNaN(expr) {
		return expr.map("zeroToNaN", (value) => (value === 0 ? Number.NaN : value));
	},
};
