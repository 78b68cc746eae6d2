/**
 * Core module exports for the AB-BA deadlock metrics analysis.
 */

export * from "./config.ts";
export * from "./pipeline.ts";
export * from "./dataset/index.ts";
export * from "./summary/index.ts";
export * from "./charts/index.ts";
export * from "./report/index.ts";
export * from "./statistics/index.ts";
export * from "./analysis/index.ts";
export * from "./registry/index.ts";
