/**
 * Error types raised by the frame layer and the metric functions.
 * All of them are thrown synchronously; nothing is retried.
 */

/**
 * A column required by the call is absent from the dataset.
 */
export class ColumnNotFoundError extends Error {
	constructor(
		public readonly column: string,
		public readonly availableColumns: readonly string[],
	) {
		const available = availableColumns.length > 0
			? `Available: ${availableColumns.join(", ")}`
			: "Dataset has no columns";
		super(`Column "${column}" not found. ${available}`);
		this.name = "ColumnNotFoundError";
	}
}

/**
 * A cell cannot take part in a numeric operation.
 */
export class ColumnTypeError extends Error {
	constructor(
		public readonly column: string,
		public readonly operation: string,
		public readonly value: unknown,
	) {
		super(`Cannot ${operation} column "${column}": found non-numeric value ${describeValue(value)}`);
		this.name = "ColumnTypeError";
	}
}

/**
 * No registered adapter accepts the dataset passed in.
 */
export class UnsupportedFrameError extends Error {
	constructor(
		public readonly received: string,
		public readonly adapters: readonly string[],
	) {
		const tried = adapters.length > 0 ? adapters.join(", ") : "none registered";
		super(`Unsupported dataset type ${received}. Adapters tried: ${tried}`);
		this.name = "UnsupportedFrameError";
	}
}

/**
 * Options passed to a metric call failed validation.
 */
export class InvalidOptionsError extends Error {
	constructor(public readonly issues: readonly string[]) {
		super(`Invalid metric options:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
		this.name = "InvalidOptionsError";
	}
}

/**
 * Short, human-readable type/value description used in error messages.
 */
export function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? "Date(invalid)" : `Date(${value.toISOString()})`;
	}
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "object") {
		const name = value.constructor?.name;
		return name ? name : "object";
	}
	return `${typeof value} ${String(value)}`;
}
