/**
 * Dataset types for the AB-BA deadlock metrics CSV.
 */

/**
 * Columns the harness writes that the analysis reads.
 */
export const STATUS_COLUMN = "Status";
export const BLOCKED_THREADS_COLUMN = "BlockedThreads";
export const WAIT_QUEUE_COLUMN = "WaitQueue";
export const RUN_COLUMN = "Run";

export const REQUIRED_COLUMNS = [
	STATUS_COLUMN,
	BLOCKED_THREADS_COLUMN,
	WAIT_QUEUE_COLUMN,
] as const;

export const NUMERIC_COLUMNS = [BLOCKED_THREADS_COLUMN, WAIT_QUEUE_COLUMN] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

/**
 * One recorded execution of the deadlock experiment.
 * Numeric fields are NaN when the cell was blank.
 */
export interface Run {
	/** Harness iteration index, when the CSV carries a numeric Run column */
	run?: number;
	/** Outcome label: DEADLOCK, HANG, CRASH, a hold time such as "12ms", ... */
	status: string;
	/** Threads observed in uninterruptible (D-state) wait */
	blockedThreads: number;
	/** FUSE connection wait-queue depth */
	waitQueue: number;
}

export interface Dataset {
	sourcePath: string;
	runs: readonly Run[];
}

export type LoadResult =
	| { status: "loaded"; dataset: Dataset }
	| { status: "missing"; path: string };

/**
 * Read a numeric column, keeping missing values as NaN.
 */
export function numericColumn(dataset: Dataset, column: NumericColumn): number[] {
	return dataset.runs.map((run) =>
		column === BLOCKED_THREADS_COLUMN ? run.blockedThreads : run.waitQueue,
	);
}

/**
 * Build an immutable dataset from runs (used by the loader and by tests).
 */
export function createDataset(runs: readonly Run[], sourcePath = "<memory>"): Dataset {
	return Object.freeze({
		sourcePath,
		runs: Object.freeze(runs.map((run) => Object.freeze({ ...run }))),
	});
}
