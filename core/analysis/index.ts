/**
 * Descriptive statistics helpers shared by the summary statistics.
 */

export * from "./statistics.ts";
