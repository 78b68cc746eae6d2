export * from "./status-counts.ts";
export * from "./report.ts";
