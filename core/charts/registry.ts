/**
 * Chart Registry - the charts the pipeline draws, in drawing order.
 */

import { BaseRegistry } from "../registry/index.ts";
import { getBuiltinCharts } from "./builtin.ts";
import type { ChartDefinition } from "./types.ts";

export class ChartRegistry extends BaseRegistry<ChartDefinition> {
	constructor() {
		super("ChartRegistry");
	}

	/**
	 * @throws RegistryConflictError if the name is taken
	 */
	register(chart: ChartDefinition): void {
		this.registerItem(chart.name, chart);
	}
}

let _defaultRegistry: ChartRegistry | null = null;

/**
 * Shared registry holding the built-in charts.
 */
export function getDefaultChartRegistry(): ChartRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = new ChartRegistry();
		for (const chart of getBuiltinCharts()) {
			_defaultRegistry.register(chart);
		}
	}
	return _defaultRegistry;
}
