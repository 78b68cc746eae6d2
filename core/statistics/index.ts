/**
 * Statistics module - registry, interface and built-in summary statistics.
 */

export * from "./interface.ts";
export * from "./registry.ts";
export * from "./builtin.ts";

import { getBuiltinStatistics } from "./builtin.ts";
import { StatisticRegistry } from "./registry.ts";

let _defaultRegistry: StatisticRegistry | null = null;

/**
 * Shared registry holding the built-in statistics.
 */
export function getDefaultStatisticRegistry(): StatisticRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = createStatisticRegistry();
	}
	return _defaultRegistry;
}

/**
 * A fresh registry with the built-in statistics, for callers that add their own.
 */
export function createStatisticRegistry(): StatisticRegistry {
	const registry = new StatisticRegistry();
	for (const statistic of getBuiltinStatistics()) {
		registry.register(statistic);
	}
	return registry;
}
