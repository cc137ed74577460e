/**
 * Frame adapters - the bridge between a caller's native tabular data and
 * the engine-neutral ColumnFrame.
 *
 * One adapter per supported tabular representation. Adapters are picked
 * at call time by runtime inspection: the first registered adapter whose
 * `canAdapt` accepts the value wins.
 */

import { BaseRegistry } from "../registry/index.ts";
import { describeValue, UnsupportedFrameError } from "../errors.ts";
import type { ColumnFrame } from "./column-frame.ts";

/**
 * Adapter for one native tabular representation.
 *
 * `toNative` builds a value of the same representation from a result
 * frame. Results carry their own columns, so `TResult` may be looser than
 * the input type.
 */
export interface FrameAdapter<TNative = unknown, TResult = TNative> {
	readonly name: string;
	readonly aliases?: readonly string[];
	readonly description?: string;

	canAdapt(value: unknown): value is TNative;

	fromNative(native: TNative): ColumnFrame;

	toNative(frame: ColumnFrame): TResult;
}

/**
 * A native dataset wrapped for one computation.
 */
export interface AdaptedFrame {
	readonly frame: ColumnFrame;
	readonly adapter: FrameAdapter;
	/** Convert a result frame back to the caller's representation */
	restore(result: ColumnFrame): unknown;
}

export class FrameAdapterRegistry extends BaseRegistry<FrameAdapter> {
	constructor() {
		super("FrameAdapterRegistry");
	}

	register(adapter: FrameAdapter): void {
		this.registerItem(adapter.name, adapter, adapter.aliases);
	}

	/**
	 * First adapter, in registration order, that accepts `value`.
	 * @throws UnsupportedFrameError if none does
	 */
	resolve(value: unknown): FrameAdapter {
		const adapter = this.list().find((candidate) => candidate.canAdapt(value));
		if (!adapter) {
			throw new UnsupportedFrameError(describeValue(value), this.list().map((a) => a.name));
		}
		return adapter;
	}

	adapt(value: unknown): AdaptedFrame {
		const adapter = this.resolve(value);
		return {
			frame: adapter.fromNative(value),
			adapter,
			restore: (result) => adapter.toNative(result),
		};
	}
}
