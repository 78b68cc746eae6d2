/**
 * Chart types shared by the chart definitions, the SVG renderer and the writers.
 */

import type { Dataset } from "../dataset/index.ts";

export interface Bar {
	label: string;
	value: number;
}

/**
 * A vertical bar chart, bars drawn left to right in array order.
 */
export interface BarChartSpec {
	title: string;
	xLabel: string;
	yLabel: string;
	bars: Bar[];
	/** Print each bar's value just above it */
	showValues: boolean;
}

export interface ChartSize {
	width: number;
	height: number;
}

export const CHART_FORMATS = ["png", "jpeg", "webp"] as const;

export type ChartFormat = (typeof CHART_FORMATS)[number];

/**
 * A chart the pipeline renders, looked up by name in the ChartRegistry.
 */
export interface ChartDefinition {
	/** Output file stem, e.g. "status_distribution" */
	readonly name: string;
	readonly description?: string;

	build(dataset: Dataset): BarChartSpec;
}
