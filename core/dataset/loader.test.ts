/**
 * Tests for loading abba_metrics.csv.
 *
 * Covers the missing-file result, required columns, missing-value markers in
 * numeric cells, non-numeric run ids and fatal errors for malformed cells.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DatasetParseError, MissingColumnsError } from "./errors.ts";
import { loadDataset, parseDataset } from "./loader.ts";
import { numericColumn } from "./types.ts";

describe("loadDataset", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "abba-loader-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("reports a missing file without throwing", () => {
		const path = join(dir, "abba_metrics.csv");

		expect(loadDataset(path)).toEqual({ status: "missing", path });
	});

	it("loads runs from the harness CSV", () => {
		const path = join(dir, "abba_metrics.csv");
		writeFileSync(
			path,
			"Run,Status,BlockedThreads,WaitQueue\n1,DEADLOCK,2,5\n2,TIMEOUT,0,0\n3,DEADLOCK,1,3\n",
		);

		const result = loadDataset(path);

		expect(result.status).toBe("loaded");
		if (result.status === "loaded") {
			expect(result.dataset.sourcePath).toBe(path);
			expect(result.dataset.runs).toEqual([
				{ run: 1, status: "DEADLOCK", blockedThreads: 2, waitQueue: 5 },
				{ run: 2, status: "TIMEOUT", blockedThreads: 0, waitQueue: 0 },
				{ run: 3, status: "DEADLOCK", blockedThreads: 1, waitQueue: 3 },
			]);
		}
	});

	it("propagates parse errors for malformed files", () => {
		const path = join(dir, "abba_metrics.csv");
		writeFileSync(path, "Status,BlockedThreads,WaitQueue\nDEADLOCK,1,2,3,4\n");

		expect(() => loadDataset(path)).toThrow(DatasetParseError);
	});
});

describe("parseDataset", () => {
	it("ignores extra columns and column order", () => {
		const dataset = parseDataset(
			"WaitQueue,Host,Status,BlockedThreads\n4,node-a,HANG,0\n",
			"metrics.csv",
		);

		expect(dataset.runs).toEqual([{ status: "HANG", blockedThreads: 0, waitQueue: 4 }]);
	});

	it("keeps hold-time statuses as labels", () => {
		const dataset = parseDataset(
			"Run,Status,BlockedThreads,WaitQueue\n1,12ms,0,1\n2,CRASH,0,0\n",
			"metrics.csv",
		);

		expect(dataset.runs.map((r) => r.status)).toEqual(["12ms", "CRASH"]);
	});

	it("reads blank and NA numeric cells as missing", () => {
		const dataset = parseDataset(
			"Status,BlockedThreads,WaitQueue\nDEADLOCK,,NA\nHANG,1\n",
			"metrics.csv",
		);

		expect(numericColumn(dataset, "BlockedThreads")).toEqual([Number.NaN, 1]);
		expect(numericColumn(dataset, "WaitQueue")).toEqual([Number.NaN, Number.NaN]);
	});

	it("names every missing required column", () => {
		let caught: unknown;
		try {
			parseDataset("Run,Status\n1,DEADLOCK\n", "metrics.csv");
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(MissingColumnsError);
		if (caught instanceof MissingColumnsError) {
			expect(caught.missing).toEqual(["BlockedThreads", "WaitQueue"]);
			expect(caught.message).toBe(
				"metrics.csv: missing required column(s): BlockedThreads, WaitQueue",
			);
		}
	});

	it("rejects non-numeric values in numeric columns", () => {
		expect(() =>
			parseDataset("Status,BlockedThreads,WaitQueue\nDEADLOCK,two,0\n", "metrics.csv"),
		).toThrow('metrics.csv:2: column BlockedThreads: expected a number, got "two"');
	});

	it("drops a non-numeric Run index instead of failing", () => {
		const dataset = parseDataset(
			"Run,Status,BlockedThreads,WaitQueue\nfirst,DEADLOCK,1,1\n",
			"metrics.csv",
		);

		expect(dataset.runs[0]).toEqual({ status: "DEADLOCK", blockedThreads: 1, waitQueue: 1 });
	});

	it("returns a frozen dataset", () => {
		const dataset = parseDataset("Status,BlockedThreads,WaitQueue\nHANG,0,0\n", "m.csv");

		expect(Object.isFrozen(dataset)).toBe(true);
		expect(Object.isFrozen(dataset.runs)).toBe(true);
		expect(Object.isFrozen(dataset.runs[0])).toBe(true);
	});
});
