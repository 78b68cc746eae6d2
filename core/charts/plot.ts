/**
 * Chart plotting: build the chart from the dataset, render it and write it.
 */

import { join } from "node:path";
import type { Dataset } from "../dataset/index.ts";
import { getDefaultChartRegistry } from "./registry.ts";
import { renderBarChartSvg } from "./svg.ts";
import { SharpChartWriter, type ChartWriter } from "./writer.ts";
import type { ChartDefinition, ChartFormat, ChartSize } from "./types.ts";

export interface PlotOptions {
	outputDir: string;
	format?: ChartFormat;
	size?: ChartSize;
	/** Defaults to a SharpChartWriter for `format` */
	writer?: ChartWriter;
}

export const DEFAULT_CHART_SIZE: ChartSize = { width: 600, height: 400 };

export function chartPath(outputDir: string, chartName: string, format: ChartFormat): string {
	return join(outputDir, `${chartName}.${format}`);
}

/**
 * Draw one chart into `<outputDir>/<chart name>.<format>`.
 *
 * @returns The written file path
 */
export async function plotChart(
	chart: ChartDefinition,
	dataset: Dataset,
	options: PlotOptions,
): Promise<string> {
	const format = options.format ?? "png";
	const writer = options.writer ?? new SharpChartWriter(format);
	const svg = renderBarChartSvg(chart.build(dataset), options.size ?? DEFAULT_CHART_SIZE);
	const outputPath = chartPath(options.outputDir, chart.name, format);

	await writer.write(svg, outputPath);
	return outputPath;
}

export function plotStatus(dataset: Dataset, options: PlotOptions): Promise<string> {
	return plotChart(getDefaultChartRegistry().getOrThrow("status_distribution"), dataset, options);
}

export function plotBlocked(dataset: Dataset, options: PlotOptions): Promise<string> {
	return plotChart(getDefaultChartRegistry().getOrThrow("blocked_threads"), dataset, options);
}
