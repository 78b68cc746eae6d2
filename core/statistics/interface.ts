/**
 * Summary statistic interface for the numeric summary table.
 * Each statistic is a small calculator registered by name and computed
 * over one column's present (non-missing) values.
 */

export interface SummaryStatistic {
	/**
	 * Row label in the summary table (e.g. "mean", "25%").
	 */
	readonly name: string;

	readonly description?: string;

	/**
	 * @param values - Column values with missing entries already removed
	 */
	compute(values: readonly number[]): number;
}
