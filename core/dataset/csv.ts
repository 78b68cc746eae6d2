/**
 * Comma-separated text parsing for the harness output.
 *
 * Handles a UTF-8 BOM, CRLF line endings, blank lines and RFC 4180 quoting.
 * Cells are trimmed. Quoted fields may not span lines.
 */

import { DatasetParseError } from "./errors.ts";

export interface CsvRow {
	/** 1-based line number in the source file */
	line: number;
	cells: string[];
}

export interface CsvTable {
	headers: string[];
	rows: CsvRow[];
}

/**
 * Parse a single CSV line, handling quoted values.
 * Returns undefined when a quoted field is left open.
 */
export function parseCsvLine(line: string): string[] | undefined {
	const values: string[] = [];
	let current = "";
	let inQuotes = false;

	for (let i = 0; i < line.length; i++) {
		const char = line[i];

		if (char === '"') {
			if (inQuotes && line[i + 1] === '"') {
				// Escaped quote
				current += '"';
				i++;
			} else {
				inQuotes = !inQuotes;
			}
		} else if (char === "," && !inQuotes) {
			values.push(current.trim());
			current = "";
		} else {
			current += char;
		}
	}

	if (inQuotes) {
		return undefined;
	}

	values.push(current.trim());
	return values;
}

/**
 * Split CSV text into a header and data rows.
 * Short rows are padded with empty cells; long rows are rejected.
 *
 * @throws DatasetParseError
 */
export function parseCsvText(text: string, sourcePath: string): CsvTable {
	const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);

	let headers: string[] | undefined;
	const rows: CsvRow[] = [];

	for (const [index, line] of lines.entries()) {
		if (!line.trim()) continue;

		const lineNumber = index + 1;
		const cells = parseCsvLine(line);
		if (!cells) {
			throw new DatasetParseError("unterminated quoted field", sourcePath, lineNumber);
		}

		if (!headers) {
			headers = cells;
			continue;
		}

		if (cells.length > headers.length) {
			throw new DatasetParseError(
				`Expected ${headers.length} fields in line ${lineNumber}, saw ${cells.length}`,
				sourcePath,
				lineNumber,
			);
		}

		while (cells.length < headers.length) {
			cells.push("");
		}
		rows.push({ line: lineNumber, cells });
	}

	if (!headers) {
		throw new DatasetParseError("No columns to parse from file", sourcePath);
	}

	return { headers, rows };
}
