export * from "./types.ts";
export * from "./errors.ts";
export { parseCsvLine, parseCsvText, type CsvRow, type CsvTable } from "./csv.ts";
export { loadDataset, parseDataset, NumericCellSchema } from "./loader.ts";
