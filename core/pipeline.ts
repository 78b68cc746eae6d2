/**
 * Analysis pipeline: load the harness CSV once, then print the summary,
 * draw the charts and print the numeric summary tables, in that order.
 */

import {
	SharpChartWriter,
	getDefaultChartRegistry,
	plotChart,
	type ChartRegistry,
	type ChartWriter,
} from "./charts/index.ts";
import { chartSize, type AnalysisConfig, type AnalysisPaths } from "./config.ts";
import { loadDataset } from "./dataset/index.ts";
import { formatLatexSection, printStats } from "./report/index.ts";
import { summarize } from "./summary/index.ts";

export interface AnalysisLogger {
	log(message: string): void;
}

export interface RunAnalysisOptions {
	config: AnalysisConfig;
	paths: AnalysisPaths;
	/** Defaults to a SharpChartWriter for the configured format */
	writer?: ChartWriter;
	charts?: ChartRegistry;
	logger?: AnalysisLogger;
}

export type AnalysisOutcome =
	| { status: "missing-input"; inputPath: string }
	| {
			status: "completed";
			totalRuns: number;
			chartPaths: string[];
			latexRendered: boolean;
	  };

export function missingInputMessage(inputPath: string, producerStep: string): string {
	return `❌ Missing ${inputPath}. Run ${producerStep} first.`;
}

/**
 * Run the whole analysis. A missing input file prints one diagnostic and
 * stops before anything is written; parse errors propagate.
 */
export async function runAnalysis(options: RunAnalysisOptions): Promise<AnalysisOutcome> {
	const { config, paths } = options;
	const logger = options.logger ?? console;
	const charts = options.charts ?? getDefaultChartRegistry();
	const writer = options.writer ?? new SharpChartWriter(config.charts.format);

	const loaded = loadDataset(paths.inputPath);
	if (loaded.status === "missing") {
		logger.log(missingInputMessage(loaded.path, config.producerStep));
		return { status: "missing-input", inputPath: loaded.path };
	}
	const { dataset } = loaded;

	logger.log(summarize(dataset, { deadlockLabel: config.deadlockLabel }));

	const chartPaths: string[] = [];
	for (const chart of charts.list()) {
		const outputPath = await plotChart(chart, dataset, {
			outputDir: paths.artifactsDir,
			format: config.charts.format,
			size: chartSize(config),
			writer,
		});
		chartPaths.push(outputPath);
		logger.log(`✅ Saved plot: ${outputPath}`);
	}

	const stats = printStats(dataset);
	logger.log("");
	logger.log(stats.table);
	logger.log("");
	logger.log(formatLatexSection(stats.latex));

	return {
		status: "completed",
		totalRuns: dataset.runs.length,
		chartPaths,
		latexRendered: stats.latex.ok,
	};
}
