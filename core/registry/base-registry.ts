/**
 * BaseRegistry - ordered lookup table for pluggable analysis parts.
 *
 * Used by: StatisticRegistry (numeric summary rows), ChartRegistry (rendered charts).
 *
 * Items are listed in registration order, which is also the order they are
 * computed and printed in.
 *
 * @example
 * ```typescript
 * class WidgetRegistry extends BaseRegistry<Widget> {
 *   register(widget: Widget): void {
 *     this.registerItem(widget.name, widget);
 *   }
 * }
 * ```
 */

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
 * Error thrown when a name is registered twice.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
	) {
		super(`${registryName}: Key "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

/**
 * Generic base registry class.
 *
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected readonly items = new Map<string, T>();

	constructor(protected readonly registryName: string) {}

	/**
	 * @throws RegistryConflictError if the key is taken
	 */
	protected registerItem(key: string, item: T): void {
		if (this.has(key)) {
			throw new RegistryConflictError(key, this.registryName);
		}
		this.items.set(key, item);
	}

	get(key: string): T | undefined {
		return this.items.get(key);
	}

	/**
	 * @throws RegistryNotFoundError
	 */
	getOrThrow(key: string): T {
		const item = this.get(key);
		if (item === undefined) {
			throw new RegistryNotFoundError(key, this.registryName, this.keys());
		}
		return item;
	}

	has(key: string): boolean {
		return this.items.has(key);
	}

	/**
	 * All items, in registration order.
	 */
	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Keys, sorted alphabetically.
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}
}
