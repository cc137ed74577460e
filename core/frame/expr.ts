/**
 * Column expressions.
 *
 * An `Expr` is an immutable description of a per-row computation over a
 * frame's columns. Expressions are built with `col`, `lit` and `when`,
 * combined with the arithmetic/comparison methods and evaluated by
 * `ColumnFrame.select`.
 *
 * Missing-value rules:
 * - arithmetic and comparison with a `null`/`undefined` operand give `null`
 * - `NaN` follows IEEE arithmetic
 * - `isNull()` is true for `null`, `undefined` and `NaN`
 * - `when(...)` takes the `otherwise` branch when the condition is missing
 *
 * @example
 * ```typescript
 * const error = col("y").sub(col("model")).abs();
 * const masked = when(col("model").isNull().not()).then(error).otherwise(null).alias("num");
 * ```
 */

import { ColumnTypeError } from "../errors.ts";
import { type CellValue, isMissing } from "./cell.ts";

/**
 * Anything an expression can read columns from.
 */
export interface ColumnSource {
	readonly height: number;
	column(name: string): readonly CellValue[];
}

type ArithmeticOp = "add" | "sub" | "mul" | "div";
type ComparisonOp = "eq" | "neq";
type UnaryOp = "abs" | "neg" | "not" | "isNull";

type ExprNode =
	| { kind: "column"; name: string }
	| { kind: "literal"; value: CellValue }
	| { kind: "unary"; op: UnaryOp; input: Expr }
	| { kind: "arithmetic"; op: ArithmeticOp; left: Expr; right: Expr }
	| { kind: "comparison"; op: ComparisonOp; left: Expr; right: Expr }
	| { kind: "when"; condition: Expr; then: Expr; otherwise: Expr }
	| { kind: "map"; input: Expr; label: string; fn: (value: CellValue) => CellValue };

/**
 * Right-hand operand accepted by expression methods; bare numbers and
 * `null` become literals.
 */
export type Operand = Expr | number | null;

const SYMBOLS: Record<ArithmeticOp | ComparisonOp, string> = {
	add: "+",
	sub: "-",
	mul: "*",
	div: "/",
	eq: "==",
	neq: "!=",
};

export class Expr {
	private constructor(
		private readonly node: ExprNode,
		private readonly aliasName?: string,
	) {}

	static column(name: string): Expr {
		return new Expr({ kind: "column", name });
	}

	static literal(value: CellValue): Expr {
		return new Expr({ kind: "literal", value });
	}

	/** @internal used by the `when` builder */
	static conditional(condition: Expr, then: Expr, otherwise: Expr): Expr {
		return new Expr({ kind: "when", condition, then, otherwise });
	}

	/**
	 * Name of the column this expression produces in a `select`.
	 * Aliases win; otherwise the leftmost column reference names it.
	 */
	get outputName(): string {
		if (this.aliasName !== undefined) return this.aliasName;

		const node = this.node;
		switch (node.kind) {
			case "column":
				return node.name;
			case "literal":
				return "literal";
			case "unary":
			case "map":
				return node.input.outputName;
			case "arithmetic":
			case "comparison":
				return node.left.outputName;
			case "when":
				return node.then.outputName;
		}
	}

	alias(name: string): Expr {
		return new Expr(this.node, name);
	}

	add(other: Operand): Expr {
		return this.arithmetic("add", other);
	}

	sub(other: Operand): Expr {
		return this.arithmetic("sub", other);
	}

	mul(other: Operand): Expr {
		return this.arithmetic("mul", other);
	}

	div(other: Operand): Expr {
		return this.arithmetic("div", other);
	}

	eq(other: Operand): Expr {
		return new Expr({ kind: "comparison", op: "eq", left: this, right: toExpr(other) });
	}

	neq(other: Operand): Expr {
		return new Expr({ kind: "comparison", op: "neq", left: this, right: toExpr(other) });
	}

	abs(): Expr {
		return new Expr({ kind: "unary", op: "abs", input: this });
	}

	neg(): Expr {
		return new Expr({ kind: "unary", op: "neg", input: this });
	}

	not(): Expr {
		return new Expr({ kind: "unary", op: "not", input: this });
	}

	isNull(): Expr {
		return new Expr({ kind: "unary", op: "isNull", input: this });
	}

	/**
	 * Apply a plain function to every cell. `label` names it in `toString()`.
	 */
	map(label: string, fn: (value: CellValue) => CellValue): Expr {
		return new Expr({ kind: "map", input: this, label, fn });
	}

	private arithmetic(op: ArithmeticOp, other: Operand): Expr {
		return new Expr({ kind: "arithmetic", op, left: this, right: toExpr(other) });
	}

	/**
	 * Evaluate against a column source, producing one cell per row.
	 */
	evaluate(source: ColumnSource): CellValue[] {
		const node = this.node;
		switch (node.kind) {
			case "column":
				return [...source.column(node.name)];
			case "literal":
				return new Array<CellValue>(source.height).fill(node.value);
			case "unary": {
				const input = node.input.evaluate(source);
				return input.map((value) => applyUnary(node.op, value, this));
			}
			case "arithmetic": {
				const left = node.left.evaluate(source);
				const right = node.right.evaluate(source);
				return left.map((value, i) => applyArithmetic(node.op, value, right[i], this));
			}
			case "comparison": {
				const left = node.left.evaluate(source);
				const right = node.right.evaluate(source);
				return left.map((value, i) => applyComparison(node.op, value, right[i]));
			}
			case "when": {
				const condition = node.condition.evaluate(source);
				const then = node.then.evaluate(source);
				const otherwise = node.otherwise.evaluate(source);
				return condition.map((flag, i) => (flag === true ? then[i] : otherwise[i]));
			}
			case "map":
				return node.input.evaluate(source).map(node.fn);
		}
	}

	toString(): string {
		const node = this.node;
		let text: string;
		switch (node.kind) {
			case "column":
				text = `col(${JSON.stringify(node.name)})`;
				break;
			case "literal":
				text = node.value instanceof Date ? node.value.toISOString() : String(node.value);
				break;
			case "unary":
				text = `${node.input.toString()}.${node.op}()`;
				break;
			case "arithmetic":
			case "comparison":
				text = `(${node.left.toString()} ${SYMBOLS[node.op]} ${node.right.toString()})`;
				break;
			case "when":
				text = `when(${node.condition.toString()}).then(${node.then.toString()}).otherwise(${node.otherwise.toString()})`;
				break;
			case "map":
				text = `${node.input.toString()}.map(${node.label})`;
				break;
		}
		return this.aliasName === undefined ? text : `${text}.alias(${JSON.stringify(this.aliasName)})`;
	}
}

function toExpr(operand: Operand): Expr {
	return operand instanceof Expr ? operand : Expr.literal(operand);
}

function isAbsent(value: CellValue): value is null | undefined {
	return value === null || value === undefined;
}

function applyUnary(op: UnaryOp, value: CellValue, expr: Expr): CellValue {
	if (op === "isNull") return isMissing(value);
	if (isAbsent(value)) return null;

	if (op === "not") {
		if (typeof value !== "boolean") {
			throw new ColumnTypeError(expr.toString(), "negate", value);
		}
		return !value;
	}

	if (typeof value !== "number") {
		throw new ColumnTypeError(expr.toString(), op === "abs" ? "take the absolute value of" : "negate", value);
	}
	return op === "abs" ? Math.abs(value) : -value;
}

const OPERATION_NAMES: Record<ArithmeticOp, string> = {
	add: "add",
	sub: "subtract",
	mul: "multiply",
	div: "divide",
};

function applyArithmetic(op: ArithmeticOp, left: CellValue, right: CellValue, expr: Expr): CellValue {
	if (isAbsent(left) || isAbsent(right)) return null;
	if (typeof left !== "number") {
		throw new ColumnTypeError(expr.toString(), OPERATION_NAMES[op], left);
	}
	if (typeof right !== "number") {
		throw new ColumnTypeError(expr.toString(), OPERATION_NAMES[op], right);
	}

	switch (op) {
		case "add":
			return left + right;
		case "sub":
			return left - right;
		case "mul":
			return left * right;
		case "div":
			return left / right;
	}
}

function cellsEqual(left: CellValue, right: CellValue): boolean {
	if (left instanceof Date && right instanceof Date) {
		return left.getTime() === right.getTime();
	}
	return left === right;
}

function applyComparison(op: ComparisonOp, left: CellValue, right: CellValue): CellValue {
	if (isAbsent(left) || isAbsent(right)) return null;
	const equal = cellsEqual(left, right);
	return op === "eq" ? equal : !equal;
}

/**
 * Reference a column by name.
 */
export function col(name: string): Expr {
	return Expr.column(name);
}

/**
 * A constant, broadcast to the frame's height.
 */
export function lit(value: CellValue): Expr {
	return Expr.literal(value);
}

export interface WhenThen {
	otherwise(value: Operand): Expr;
}

export interface When {
	then(value: Operand): WhenThen;
}

/**
 * Conditional expression: `when(cond).then(a).otherwise(b)`.
 */
export function when(condition: Expr): When {
	return {
		then: (thenValue) => ({
			otherwise: (otherwiseValue) =>
				Expr.conditional(condition, toExpr(thenValue), toExpr(otherwiseValue)),
		}),
	};
}
