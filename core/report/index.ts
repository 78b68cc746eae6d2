/**
 * Report module - numeric summary, console table and LaTeX table.
 */

export * from "./describe.ts";
export * from "./stats-table.ts";
export * from "./latex.ts";
export * from "./print-stats.ts";
