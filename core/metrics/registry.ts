/**
 * Loss Registry - central registry for loss functions.
 *
 * Extends BaseRegistry for registration, alias lookup and conflict checks.
 */

import type { ColumnFrame } from "../frame/column-frame.ts";
import type { LossComputeOptions, LossFunction } from "./interface.ts";
import { BaseRegistry, RegistryNotFoundError } from "../registry/index.ts";
import { getBuiltinLosses } from "./builtin/index.ts";

export class LossRegistry extends BaseRegistry<LossFunction> {
	constructor() {
		super("LossRegistry");
	}

	/**
	 * @throws RegistryConflictError if the name or an alias is already registered
	 */
	register(loss: LossFunction): void {
		this.registerItem(loss.name, loss, loss.aliases);
	}

	/**
	 * Compute a single loss on an engine-neutral frame.
	 * @throws RegistryNotFoundError if the loss is not registered
	 */
	compute(
		nameOrAlias: string,
		frame: ColumnFrame,
		models: readonly string[],
		options: LossComputeOptions,
	): ColumnFrame {
		return this.getOrThrow(nameOrAlias).compute(frame, models, options);
	}

	/**
	 * Resolve several names at once, dropping repeats of the same loss
	 * requested by name and alias. Order follows first mention.
	 * @throws RegistryNotFoundError if any name is unknown, before resolving the rest
	 */
	resolveAll(names: readonly string[]): LossFunction[] {
		this.validateMetrics(names);

		const resolved: LossFunction[] = [];
		const seen = new Set<string>();
		for (const name of names) {
			const loss = this.getOrThrow(name);
			if (seen.has(loss.name)) {
				continue;
			}
			seen.add(loss.name);
			resolved.push(loss);
		}
		return resolved;
	}

	/**
	 * @throws RegistryNotFoundError for the first unknown name
	 */
	validateMetrics(names: readonly string[]): void {
		for (const name of names) {
			if (!this.has(name)) {
				throw new RegistryNotFoundError(name, this.registryName, this.keys());
			}
		}
	}

	/**
	 * Primary names only, no aliases.
	 */
	listMetricNames(): string[] {
		return this.keys();
	}
}

/**
 * New registry holding the built-in losses.
 * Use this when you need an isolated instance to register your own losses on.
 */
export function createRegistry(): LossRegistry {
	const registry = new LossRegistry();
	for (const loss of getBuiltinLosses()) {
		registry.register(loss);
	}
	return registry;
}

let _defaultRegistry: LossRegistry | null = null;

/**
 * Shared registry with the built-in losses; the same instance on every call.
 */
export function getDefaultRegistry(): LossRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = createRegistry();
	}
	return _defaultRegistry;
}

export function getAvailableMetrics(): string[] {
	return getDefaultRegistry().listMetricNames();
}
