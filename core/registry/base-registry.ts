/**
 * BaseRegistry - generic name/alias registry for pluggable components.
 *
 * Items describe themselves (`name`, optional `aliases`), so registration is a
 * single call. Lookup resolves either the primary name or any alias.
 *
 * Used by: MetricRegistry
 *
 * @example
 * ```typescript
 * class TokenizerRegistry extends BaseRegistry<NamedTokenizer> {
 *   constructor() {
 *     super({ name: "TokenizerRegistry" });
 *   }
 * }
 * ```
 */

/**
 * Anything a registry can hold.
 */
export interface Registrable {
	readonly name: string;
	readonly aliases?: readonly string[];
}

/**
 * Error thrown when a requested item is not found in the registry.
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
 * Error thrown when a name or alias is already taken.
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

export interface RegistryOptions {
	/** Used in error messages */
	name: string;
	/** Throw on duplicate registration instead of keeping the first item (default: true) */
	throwOnConflict?: boolean;
}

/**
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T extends Registrable> {
	protected readonly items = new Map<string, T>();
	protected readonly aliasMap = new Map<string, string>(); // alias -> primary name
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? true;
	}

	/**
	 * Register an item under its name and aliases.
	 * Returns false when a conflict was skipped (throwOnConflict=false).
	 * @throws RegistryConflictError if the name or an alias is taken
	 */
	register(item: T): boolean {
		const candidates: Array<[string, "key" | "alias"]> = [
			[item.name, "key"],
			...(item.aliases ?? []).map((alias): [string, "alias"] => [alias, "alias"]),
		];

		for (const [key, conflictType] of candidates) {
			if (this.has(key)) {
				if (this.throwOnConflict) {
					throw new RegistryConflictError(key, this.registryName, conflictType);
				}
				return false;
			}
		}

		this.items.set(item.name, item);
		for (const alias of item.aliases ?? []) {
			this.aliasMap.set(alias, item.name);
		}
		return true;
	}

	/**
	 * Look up by name or alias.
	 */
	get(keyOrAlias: string): T | undefined {
		return this.items.get(this.resolveAlias(keyOrAlias));
	}

	/**
	 * @throws RegistryNotFoundError if nothing is registered under the name or alias
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
	 * Items in registration order.
	 */
	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Primary names, sorted.
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}

	/**
	 * Aliases, sorted.
	 */
	aliases(): string[] {
		return Array.from(this.aliasMap.keys()).sort();
	}

	get size(): number {
		return this.items.size;
	}

	/**
	 * Remove an item and every alias pointing at it.
	 */
	delete(name: string): boolean {
		if (!this.items.has(name)) {
			return false;
		}
		for (const [alias, primary] of this.aliasMap.entries()) {
			if (primary === name) {
				this.aliasMap.delete(alias);
			}
		}
		this.items.delete(name);
		return true;
	}

	clear(): void {
		this.items.clear();
		this.aliasMap.clear();
	}

	/**
	 * Primary name for an alias; the input itself otherwise.
	 */
	resolveAlias(keyOrAlias: string): string {
		return this.aliasMap.get(keyOrAlias) ?? keyOrAlias;
	}
}
