import { describe, expect, it } from "vitest";
import { createDataset } from "../dataset/index.ts";
import { createStatisticRegistry } from "../statistics/index.ts";
import { describeColumns, formatSummaryValue, type NumericSummary } from "./describe.ts";

function summaryValue(
	summary: NumericSummary,
	statistic: string,
	column: string,
): number | undefined {
	const columnIndex = summary.columns.indexOf(column);
	return summary.rows.find((row) => row.statistic === statistic)?.values[columnIndex];
}

const dataset = createDataset([
	{ status: "DEADLOCK", blockedThreads: 2, waitQueue: 5 },
	{ status: "TIMEOUT", blockedThreads: 0, waitQueue: 0 },
	{ status: "DEADLOCK", blockedThreads: 1, waitQueue: 3 },
]);

describe("describeColumns", () => {
	it("computes the eight statistics for both numeric columns", () => {
		expect(describeColumns(dataset)).toEqual({
			columns: ["BlockedThreads", "WaitQueue"],
			rows: [
				{ statistic: "count", values: [3, 3] },
				{ statistic: "mean", values: [1, 2.67] },
				{ statistic: "std", values: [1, 2.52] },
				{ statistic: "min", values: [0, 0] },
				{ statistic: "25%", values: [0.5, 1.5] },
				{ statistic: "50%", values: [1, 3] },
				{ statistic: "75%", values: [1.5, 4] },
				{ statistic: "max", values: [2, 5] },
			],
		});
	});

	it("skips missing values per column", () => {
		const summary = describeColumns(
			createDataset([
				{ status: "HANG", blockedThreads: 1, waitQueue: Number.NaN },
				{ status: "HANG", blockedThreads: 3, waitQueue: 4 },
			]),
		);

		expect(summaryValue(summary, "count", "BlockedThreads")).toBe(2);
		expect(summaryValue(summary, "count", "WaitQueue")).toBe(1);
		expect(summaryValue(summary, "mean", "WaitQueue")).toBe(4);
		expect(summaryValue(summary, "std", "WaitQueue")).toBeNaN();
	});

	it("reports zero count and NaN elsewhere for an empty dataset", () => {
		const summary = describeColumns(createDataset([]));

		expect(summaryValue(summary, "count", "BlockedThreads")).toBe(0);
		expect(summaryValue(summary, "max", "WaitQueue")).toBeNaN();
	});

	it("summarizes a large dataset", () => {
		const runs = Array.from({ length: 300_000 }, (_, i) => ({
			status: "DEADLOCK",
			blockedThreads: i % 4,
			waitQueue: i % 7,
		}));

		const summary = describeColumns(createDataset(runs));

		expect(summaryValue(summary, "count", "BlockedThreads")).toBe(300_000);
		expect(summaryValue(summary, "mean", "BlockedThreads")).toBe(1.5);
		expect(summaryValue(summary, "min", "WaitQueue")).toBe(0);
		expect(summaryValue(summary, "max", "WaitQueue")).toBe(6);
		expect(summaryValue(summary, "50%", "BlockedThreads")).toBe(1.5);
	});

	it("uses the rows of the registry it is given", () => {
		const registry = createStatisticRegistry();
		registry.register({ name: "sum", compute: (values) => values.reduce((a, b) => a + b, 0) });

		const summary = describeColumns(dataset, ["WaitQueue"], registry);

		expect(summary.columns).toEqual(["WaitQueue"]);
		expect(summary.rows.at(-1)).toEqual({ statistic: "sum", values: [8] });
	});
});

describe("formatSummaryValue", () => {
	it("always prints two decimals", () => {
		expect(formatSummaryValue(3)).toBe("3.00");
		expect(formatSummaryValue(2.5)).toBe("2.50");
		expect(formatSummaryValue(Number.NaN)).toBe("NaN");
		expect(formatSummaryValue(Number.NEGATIVE_INFINITY)).toBe("-inf");
	});
});
