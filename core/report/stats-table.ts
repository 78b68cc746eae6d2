/**
 * Console table for the numeric summary.
 */

import { formatSummaryValue, type NumericSummary } from "./describe.ts";

export const STATS_SECTION_TITLE = "📊 Summary Statistics";
const SECTION_RULE = "─".repeat(20);

function border(widths: number[], left: string, join: string, right: string): string {
	return left + widths.map((w) => "─".repeat(w + 2)).join(join) + right;
}

function row(cells: string[], widths: number[]): string {
	const padded = cells.map((cell, i) => {
		const width = widths[i] ?? cell.length;
		// Statistic names left-aligned, numbers right-aligned
		return i === 0 ? cell.padEnd(width) : cell.padStart(width);
	});
	return `│ ${padded.join(" │ ")} │`;
}

/**
 * Box table with one row per statistic and one column per numeric field.
 */
export function formatStatsTable(summary: NumericSummary): string {
	const header = ["Statistic", ...summary.columns];
	const body = summary.rows.map((r) => [r.statistic, ...r.values.map(formatSummaryValue)]);

	const widths = header.map((cell, i) =>
		Math.max(cell.length, ...body.map((cells) => (cells[i] ?? "").length)),
	);

	return [
		border(widths, "┌", "┬", "┐"),
		row(header, widths),
		border(widths, "├", "┼", "┤"),
		...body.map((cells) => row(cells, widths)),
		border(widths, "└", "┴", "┘"),
	].join("\n");
}

/**
 * Section header followed by the table.
 */
export function formatStatsSection(summary: NumericSummary): string {
	return [STATS_SECTION_TITLE, SECTION_RULE, formatStatsTable(summary)].join("\n");
}
