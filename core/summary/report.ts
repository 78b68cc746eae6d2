/**
 * Text summary of a deadlock experiment: totals, rate and status breakdown.
 */

import type { Dataset } from "../dataset/index.ts";
import {
	DEADLOCK_STATUS,
	countStatuses,
	deadlockCount,
	deadlockRate,
	type StatusCount,
} from "./status-counts.ts";

export const SUMMARY_TITLE = "AB-BA DEADLOCK METRICS";
const RULE = "─".repeat(40);
const LABEL_WIDTH = 25;

export interface SummaryOptions {
	/** Status label counted as a reproduced deadlock */
	deadlockLabel?: string;
}

export interface DeadlockSummary {
	totalRuns: number;
	deadlocks: number;
	/** Percent of runs that deadlocked */
	rate: number;
	counts: StatusCount[];
}

export function computeSummary(dataset: Dataset, options: SummaryOptions = {}): DeadlockSummary {
	const counts = countStatuses(dataset);
	const totalRuns = dataset.runs.length;
	const deadlocks = deadlockCount(counts, options.deadlockLabel ?? DEADLOCK_STATUS);

	return {
		totalRuns,
		deadlocks,
		rate: deadlockRate(deadlocks, totalRuns),
		counts,
	};
}

/**
 * Rate with one decimal and a percent sign, e.g. "66.7%".
 */
export function formatRate(rate: number): string {
	return `${rate.toFixed(1)}%`;
}

function formatBreakdown(counts: readonly StatusCount[]): string[] {
	if (counts.length === 0) {
		return ["  (no runs)"];
	}

	const statusWidth = counts.reduce((w, c) => Math.max(w, c.status.length), 0);
	const countWidth = counts.reduce((w, c) => Math.max(w, String(c.count).length), 0);

	return counts.map(
		(c) => `  ${c.status.padEnd(statusWidth)}  ${String(c.count).padStart(countWidth)}`,
	);
}

export function formatSummary(summary: DeadlockSummary): string {
	return [
		RULE,
		SUMMARY_TITLE,
		RULE,
		`${"Total Runs:".padEnd(LABEL_WIDTH)}${summary.totalRuns}`,
		`${"Successful Deadlocks:".padEnd(LABEL_WIDTH)}${summary.deadlocks}`,
		`${"Deadlock Success Rate:".padEnd(LABEL_WIDTH)}${formatRate(summary.rate)}`,
		"",
		"Status Breakdown:",
		...formatBreakdown(summary.counts),
		RULE,
	].join("\n");
}

/**
 * Summary report for the console.
 */
export function summarize(dataset: Dataset, options: SummaryOptions = {}): string {
	return formatSummary(computeSummary(dataset, options));
}
