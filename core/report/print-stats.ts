/**
 * Numeric summary report: console table plus LaTeX table.
 */

import type { Dataset } from "../dataset/index.ts";
import type { StatisticRegistry } from "../statistics/index.ts";
import { describeColumns, type NumericSummary } from "./describe.ts";
import { tryRenderLatexTable, type LatexResult } from "./latex.ts";
import { formatStatsSection } from "./stats-table.ts";

export interface StatsReport {
	summary: NumericSummary;
	/** Section header and console table */
	table: string;
	latex: LatexResult;
}

export function printStats(dataset: Dataset, registry?: StatisticRegistry): StatsReport {
	const summary = describeColumns(dataset, undefined, registry);

	return {
		summary,
		table: formatStatsSection(summary),
		latex: tryRenderLatexTable(summary),
	};
}
