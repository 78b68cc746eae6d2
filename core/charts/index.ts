/**
 * Charts module - chart definitions, SVG rendering and image writers.
 */

export * from "./types.ts";
export * from "./svg.ts";
export * from "./builtin.ts";
export * from "./registry.ts";
export * from "./writer.ts";
export * from "./plot.ts";
