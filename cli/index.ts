#!/usr/bin/env tsx
/**
 * abba-metrics CLI entry point.
 * Analyses artefacts/abba_metrics.csv from the deadlock harness: prints the
 * summary and statistics tables and writes the two charts next to the CSV.
 */

import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
	CONFIG_FILE_NAME,
	loadAnalysisConfig,
	resolveAnalysisPaths,
	runAnalysis,
} from "../core/index.ts";

const PROJECT_ROOT = dirname(dirname(fileURLToPath(import.meta.url)));

async function main(): Promise<void> {
	const config = loadAnalysisConfig(join(PROJECT_ROOT, CONFIG_FILE_NAME));
	const paths = resolveAnalysisPaths(PROJECT_ROOT, config);

	await runAnalysis({ config, paths });
}

main().catch((error: unknown) => {
	console.error("\n❌ Analysis failed:", error);
	process.exit(1);
});
