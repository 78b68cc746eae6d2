/**
 * Status counting shared by the text summary and the outcome chart.
 */

import type { Dataset } from "../dataset/index.ts";

/** Outcome label the harness writes when it caught threads in D-state */
export const DEADLOCK_STATUS = "DEADLOCK";

export interface StatusCount {
	status: string;
	count: number;
}

/**
 * Occurrences of each status, by descending count.
 * Equal counts keep the order in which the statuses first appear.
 */
export function countStatuses(dataset: Dataset): StatusCount[] {
	const counts = new Map<string, number>();
	for (const run of dataset.runs) {
		counts.set(run.status, (counts.get(run.status) ?? 0) + 1);
	}

	// Array.prototype.sort is stable, so ties stay in first-seen order
	return Array.from(counts, ([status, count]) => ({ status, count })).sort(
		(a, b) => b.count - a.count,
	);
}

/**
 * Count for an exact status label, 0 when the label never occurs.
 */
export function statusCount(counts: readonly StatusCount[], status: string): number {
	return counts.find((entry) => entry.status === status)?.count ?? 0;
}

export function deadlockCount(
	counts: readonly StatusCount[],
	label: string = DEADLOCK_STATUS,
): number {
	return statusCount(counts, label);
}

/**
 * Deadlock rate in percent. 0 for an empty dataset.
 */
export function deadlockRate(deadlocks: number, totalRuns: number): number {
	return totalRuns > 0 ? (deadlocks / totalRuns) * 100 : 0;
}
