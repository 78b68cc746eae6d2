/**
 * Analysis configuration.
 * Defines the Zod schema for the optional abba-analysis.yaml at the project root.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "yaml";
import { z, type ZodError } from "zod";
import { CHART_FORMATS, type ChartSize } from "./charts/index.ts";

export const CONFIG_FILE_NAME = "abba-analysis.yaml";

// ============================================================================
// Schema
// ============================================================================

const ChartsConfigSchema = z
	.object({
		format: z.enum(CHART_FORMATS).default("png"),
		width: z.number().int().positive().default(600),
		height: z.number().int().positive().default(400),
	})
	.strict();

export const AnalysisConfigSchema = z
	.object({
		// Directory holding the harness CSV and the charts, relative to the project root
		artifactsDir: z.string().min(1).default("artefacts"),
		inputFile: z.string().min(1).default("abba_metrics.csv"),
		// Named in the missing-input diagnostic
		producerStep: z.string().min(1).default("collect_metrics.sh"),
		deadlockLabel: z.string().min(1).default("DEADLOCK"),
		charts: ChartsConfigSchema.default({}),
	})
	.strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export class ConfigError extends Error {
	constructor(
		public readonly path: string,
		public readonly issues: readonly string[],
	) {
		super(`Invalid configuration in ${path}:\n${issues.join("\n")}`);
		this.name = "ConfigError";
	}
}

function formatZodIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate a raw (already parsed) configuration object.
 *
 * @throws ConfigError
 */
export function parseAnalysisConfig(raw: unknown, sourcePath = "<inline>"): AnalysisConfig {
	const result = AnalysisConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(sourcePath, formatZodIssues(result.error));
	}
	return result.data;
}

/**
 * Load the configuration file. A missing file means all defaults.
 *
 * @throws ConfigError for unreadable YAML or invalid values
 */
export function loadAnalysisConfig(path: string): AnalysisConfig {
	if (!existsSync(path)) {
		return parseAnalysisConfig({}, path);
	}

	let raw: unknown;
	try {
		raw = parse(readFileSync(path, "utf-8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(path, [`  - ${reason}`]);
	}

	return parseAnalysisConfig(raw, path);
}

// ============================================================================
// Paths
// ============================================================================

export interface AnalysisPaths {
	projectRoot: string;
	artifactsDir: string;
	inputPath: string;
}

export function resolveAnalysisPaths(projectRoot: string, config: AnalysisConfig): AnalysisPaths {
	const artifactsDir = resolve(projectRoot, config.artifactsDir);
	return {
		projectRoot,
		artifactsDir,
		inputPath: resolve(artifactsDir, config.inputFile),
	};
}

export function chartSize(config: AnalysisConfig): ChartSize {
	return { width: config.charts.width, height: config.charts.height };
}
