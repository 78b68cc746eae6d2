/**
 * Numeric summary of the dataset's numeric columns.
 */

import { presentValues, roundHalfEven } from "../analysis/index.ts";
import {
	NUMERIC_COLUMNS,
	numericColumn,
	type Dataset,
	type NumericColumn,
} from "../dataset/index.ts";
import { getDefaultStatisticRegistry, type StatisticRegistry } from "../statistics/index.ts";

export const SUMMARY_DECIMALS = 2;

export interface SummaryRow {
	statistic: string;
	/** One rounded value per column, in column order */
	values: number[];
}

export interface NumericSummary {
	columns: string[];
	rows: SummaryRow[];
}

/**
 * Compute every registered statistic for each column, rounded to two decimals.
 * Missing values are skipped column by column.
 */
export function describeColumns(
	dataset: Dataset,
	columns: readonly NumericColumn[] = NUMERIC_COLUMNS,
	registry: StatisticRegistry = getDefaultStatisticRegistry(),
): NumericSummary {
	const samples = columns.map((column) => presentValues(numericColumn(dataset, column)));

	return {
		columns: [...columns],
		rows: registry.list().map((statistic) => ({
			statistic: statistic.name,
			values: samples.map((values) =>
				roundHalfEven(statistic.compute(values), SUMMARY_DECIMALS),
			),
		})),
	};
}

/**
 * Fixed two-decimal text for a summary cell.
 */
export function formatSummaryValue(value: number): string {
	if (Number.isNaN(value)) return "NaN";
	if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
	return value.toFixed(SUMMARY_DECIMALS);
}
