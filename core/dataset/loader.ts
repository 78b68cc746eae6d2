/**
 * Loader for the metrics CSV written by the deadlock harness.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { parseCsvText } from "./csv.ts";
import { DatasetParseError, MissingColumnsError } from "./errors.ts";
import {
	BLOCKED_THREADS_COLUMN,
	REQUIRED_COLUMNS,
	RUN_COLUMN,
	STATUS_COLUMN,
	WAIT_QUEUE_COLUMN,
	createDataset,
	type Dataset,
	type LoadResult,
	type Run,
} from "./types.ts";

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Cell contents read as a missing value */
const MISSING_MARKERS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL", "None"]);

/**
 * A numeric cell: blank or a missing marker becomes NaN, anything else
 * must be a decimal number.
 */
export const NumericCellSchema = z.string().transform((raw, ctx) => {
	if (MISSING_MARKERS.has(raw)) {
		return Number.NaN;
	}
	if (!NUMBER_PATTERN.test(raw)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${raw}"` });
		return z.NEVER;
	}
	return Number(raw);
});

/**
 * Read the dataset at `path`.
 *
 * A missing file is reported as `{ status: "missing" }`; anything wrong with
 * the contents throws.
 *
 * @throws DatasetParseError | MissingColumnsError
 */
export function loadDataset(path: string): LoadResult {
	if (!existsSync(path)) {
		return { status: "missing", path };
	}

	const content = readFileSync(path, "utf-8");
	return { status: "loaded", dataset: parseDataset(content, path) };
}

/**
 * Parse CSV text into a dataset. Extra columns are ignored.
 *
 * @throws DatasetParseError | MissingColumnsError
 */
export function parseDataset(content: string, sourcePath: string): Dataset {
	const table = parseCsvText(content, sourcePath);

	const missing = REQUIRED_COLUMNS.filter((column) => !table.headers.includes(column));
	if (missing.length > 0) {
		throw new MissingColumnsError(sourcePath, missing);
	}

	const statusIndex = table.headers.indexOf(STATUS_COLUMN);
	const blockedIndex = table.headers.indexOf(BLOCKED_THREADS_COLUMN);
	const waitQueueIndex = table.headers.indexOf(WAIT_QUEUE_COLUMN);
	const runIndex = table.headers.indexOf(RUN_COLUMN);

	const runs = table.rows.map(({ line, cells }): Run => {
		const readNumber = (index: number, column: string): number => {
			const parsed = NumericCellSchema.safeParse(cells[index] ?? "");
			if (!parsed.success) {
				const reason = parsed.error.issues[0]?.message ?? "invalid number";
				throw new DatasetParseError(`column ${column}: ${reason}`, sourcePath, line);
			}
			return parsed.data;
		};

		const run: Run = {
			status: cells[statusIndex] ?? "",
			blockedThreads: readNumber(blockedIndex, BLOCKED_THREADS_COLUMN),
			waitQueue: readNumber(waitQueueIndex, WAIT_QUEUE_COLUMN),
		};

		if (runIndex !== -1) {
			const parsed = NumericCellSchema.safeParse(cells[runIndex] ?? "");
			if (parsed.success && Number.isFinite(parsed.data)) {
				run.run = parsed.data;
			}
		}

		return run;
	});

	return createDataset(runs, sourcePath);
}
