/**
 * LaTeX (booktabs) rendering of the numeric summary.
 */

import { formatSummaryValue, type NumericSummary } from "./describe.ts";

export const LATEX_SECTION_TITLE = "📄 LaTeX Table";
const SECTION_RULE = "─".repeat(20);

export class LatexRenderError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "LatexRenderError";
	}
}

/**
 * Outcome of rendering the LaTeX table. Failure never escapes as an exception.
 */
export type LatexResult =
	| { ok: true; latex: string }
	| { ok: false; diagnostic: string };

const LATEX_SPECIALS: Record<string, string> = {
	"\\": "\\textbackslash{}",
	"&": "\\&",
	"%": "\\%",
	$: "\\$",
	"#": "\\#",
	_: "\\_",
	"{": "\\{",
	"}": "\\}",
	"~": "\\textasciitilde{}",
	"^": "\\textasciicircum{}",
};

export function escapeLatex(text: string): string {
	return text.replace(/[\\&%$#_{}~^]/g, (char) => LATEX_SPECIALS[char] ?? char);
}

/**
 * Render a booktabs tabular: one label column, one right-aligned column per field.
 *
 * @throws LatexRenderError when the summary has no columns or no rows
 */
export function renderLatexTable(summary: NumericSummary): string {
	if (summary.columns.length === 0) {
		throw new LatexRenderError("summary has no columns");
	}
	if (summary.rows.length === 0) {
		throw new LatexRenderError("summary has no rows");
	}

	const lines = [
		`\\begin{tabular}{l${"r".repeat(summary.columns.length)}}`,
		"\\toprule",
		` & ${summary.columns.map(escapeLatex).join(" & ")} \\\\`,
		"\\midrule",
	];

	for (const row of summary.rows) {
		if (row.values.length !== summary.columns.length) {
			throw new LatexRenderError(
				`row "${row.statistic}" has ${row.values.length} values for ${summary.columns.length} columns`,
			);
		}
		lines.push(`${escapeLatex(row.statistic)} & ${row.values.map(formatSummaryValue).join(" & ")} \\\\`);
	}

	lines.push("\\bottomrule", "\\end{tabular}");
	return lines.join("\n");
}

/**
 * Render the LaTeX table, turning any failure into a one-line diagnostic.
 */
export function tryRenderLatexTable(
	summary: NumericSummary,
	render: (summary: NumericSummary) => string = renderLatexTable,
): LatexResult {
	try {
		return { ok: true, latex: render(summary) };
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		return { ok: false, diagnostic: `⚠️  Could not generate LaTeX table: ${reason}` };
	}
}

/**
 * Section header followed by the LaTeX code or the diagnostic.
 */
export function formatLatexSection(result: LatexResult): string {
	return [LATEX_SECTION_TITLE, SECTION_RULE, result.ok ? result.latex : result.diagnostic].join(
		"\n",
	);
}
