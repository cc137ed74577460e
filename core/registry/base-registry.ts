/**
 * BaseRegistry - generic name/alias registry for pluggable components.
 *
 * Used by: LossRegistry (metric functions), FrameAdapterRegistry (native
 * tabular engines).
 *
 * Items keep their registration order in `list()`, which adapter
 * resolution relies on; `keys()` is sorted for display.
 *
 * @example
 * ```typescript
 * class ScorerRegistry extends BaseRegistry<Scorer> {
 *   register(scorer: Scorer): void {
 *     this.registerItem(scorer.name, scorer, scorer.aliases);
 *   }
 * }
 * ```
 */

/**
 * Thrown when a requested item is not registered.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Thrown when a key or alias is already taken.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super(`${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

/**
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	private readonly items = new Map<string, T>();
	private readonly aliasMap = new Map<string, string>(); // alias -> primary key

	constructor(protected readonly registryName: string) {}

	/**
	 * Register an item under a primary key and optional aliases. Nothing is
	 * stored when any of the names is taken.
	 * @throws RegistryConflictError
	 */
	protected registerItem(key: string, item: T, aliases: readonly string[] = []): void {
		if (this.has(key)) {
			throw new RegistryConflictError(key, this.registryName, "key");
		}
		const taken = aliases.find((alias) => alias === key || this.has(alias));
		if (taken !== undefined) {
			throw new RegistryConflictError(taken, this.registryName, "alias");
		}

		this.items.set(key, item);
		for (const alias of aliases) {
			this.aliasMap.set(alias, key);
		}
	}

	/**
	 * Look up an item by key or alias.
	 */
	get(keyOrAlias: string): T | undefined {
		return this.items.get(this.aliasMap.get(keyOrAlias) ?? keyOrAlias);
	}

	/**
	 * @throws RegistryNotFoundError if nothing is registered under `keyOrAlias`
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(keyOrAlias, this.registryName, this.keys());
		}
		return item;
	}

	has(keyOrAlias: string): boolean {
		return this.items.has(keyOrAlias) || this.aliasMap.has(keyOrAlias);
	}

	/**
	 * All items, in registration order.
	 */
	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Primary keys, sorted alphabetically.
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}
}
