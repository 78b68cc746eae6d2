/**
 * The two charts drawn for every analysis run.
 */

import { numericColumn, type Dataset } from "../dataset/index.ts";
import { countStatuses } from "../summary/index.ts";
import type { Bar, BarChartSpec, ChartDefinition } from "./types.ts";

/**
 * Outcome distribution: one bar per status, tallest first.
 */
export class StatusDistributionChart implements ChartDefinition {
	readonly name = "status_distribution";
	readonly description = "Number of runs per outcome status";

	build(dataset: Dataset): BarChartSpec {
		return {
			title: `Race Condition Outcome (N=${dataset.runs.length})`,
			xLabel: "Outcome",
			yLabel: "Count",
			bars: countStatuses(dataset).map(({ status, count }) => ({
				label: status,
				value: count,
			})),
			showValues: true,
		};
	}
}

/**
 * Frequency of each BlockedThreads value, by ascending value.
 * Missing values are not counted.
 */
export function blockedThreadsFrequencies(dataset: Dataset): Bar[] {
	const frequencies = new Map<number, number>();
	for (const value of numericColumn(dataset, "BlockedThreads")) {
		if (Number.isNaN(value)) continue;
		frequencies.set(value, (frequencies.get(value) ?? 0) + 1);
	}

	return Array.from(frequencies)
		.sort(([a], [b]) => a - b)
		.map(([value, frequency]) => ({ label: String(value), value: frequency }));
}

export class BlockedThreadsChart implements ChartDefinition {
	readonly name = "blocked_threads";
	readonly description = "Runs per number of threads caught in D-state";

	build(dataset: Dataset): BarChartSpec {
		return {
			title: "Blocked Threads in D-State per Run",
			xLabel: "Number of Blocked Threads",
			yLabel: "Frequency",
			bars: blockedThreadsFrequencies(dataset),
			showValues: false,
		};
	}
}

export function getBuiltinCharts(): ChartDefinition[] {
	return [new StatusDistributionChart(), new BlockedThreadsChart()];
}
