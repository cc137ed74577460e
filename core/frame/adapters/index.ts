/**
 * Built-in frame adapters and the default adapter registry.
 */

export * from "./records.ts";
export * from "./columns.ts";

import { FrameAdapterRegistry } from "../adapter.ts";
import { type ColumnResult, ColumnsAdapter, type ColumnTable } from "./columns.ts";
import { type RecordResult, RecordsAdapter, type RecordTable } from "./records.ts";

/**
 * What a metric call returns for a dataset of type `T`: row objects for
 * row objects, a column table for a column table. Datasets read through a
 * caller-registered adapter come back as `unknown`.
 */
export type NativeResult<T> = T extends RecordTable
	? RecordResult
	: T extends ColumnTable
		? ColumnResult
		: unknown;

let _defaultAdapters: FrameAdapterRegistry | null = null;

/**
 * Registry with every built-in adapter, in resolution order.
 * Use this as the starting point for a registry with extra adapters.
 */
export function createAdapterRegistry(): FrameAdapterRegistry {
	const registry = new FrameAdapterRegistry();
	registry.register(new RecordsAdapter());
	registry.register(new ColumnsAdapter());
	return registry;
}

/**
 * Shared registry used when a call passes no `adapters` option.
 */
export function getDefaultAdapterRegistry(): FrameAdapterRegistry {
	if (!_defaultAdapters) {
		_defaultAdapters = createAdapterRegistry();
	}
	return _defaultAdapters;
}
