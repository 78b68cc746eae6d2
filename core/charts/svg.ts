/**
 * SVG rendering for bar charts.
 *
 * Text widths are estimated from the character count. When the x labels do
 * not fit under their bars they are rotated, and the canvas grows downward
 * (and leftward, for the first bar) by the rotated label extent.
 */

import type { BarChartSpec, ChartSize } from "./types.ts";

const FONT_FAMILY = "DejaVu Sans, Helvetica, Arial, sans-serif";
const FONT_SIZE = 12;
const TITLE_FONT_SIZE = 14;
const CHAR_WIDTH = 7;
const BAR_FILL = "#1f77b4";
const BAR_WIDTH_RATIO = 0.8;
const LABEL_ANGLE = 45;

const MARGIN_TOP = 44;
const MARGIN_RIGHT = 20;
const MARGIN_BOTTOM = 52;

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

function px(value: number): string {
	return String(Number(value.toFixed(2)));
}

function formatTick(value: number): string {
	return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(2)));
}

/**
 * Whole-number tick step giving about `targetTicks` ticks up to `maxValue`.
 */
export function niceStep(maxValue: number, targetTicks = 5): number {
	if (maxValue <= 0) return 1;

	const raw = maxValue / targetTicks;
	const magnitude = 10 ** Math.floor(Math.log10(raw));
	const normalized = raw / magnitude;
	const factor = normalized <= 1 ? 1 : normalized <= 2 ? 2 : normalized <= 5 ? 5 : 10;

	return Math.max(1, factor * magnitude);
}

/**
 * Y-axis ticks from 0 to the first step at or above the tallest bar.
 */
export function yTicks(maxValue: number): number[] {
	const step = niceStep(maxValue);
	const top = Math.max(step, Math.ceil(maxValue / step) * step);

	const ticks: number[] = [];
	for (let tick = 0; tick <= top; tick += step) {
		ticks.push(tick);
	}
	return ticks;
}

export function renderBarChartSvg(spec: BarChartSpec, size: ChartSize): string {
	const { bars } = spec;
	const maxValue = bars.reduce((m, bar) => Math.max(m, bar.value), 0);
	const ticks = yTicks(maxValue);
	const yTop = ticks[ticks.length - 1] ?? 1;

	const tickLabelWidth = ticks.reduce((w, t) => Math.max(w, formatTick(t).length), 0) * CHAR_WIDTH;
	const marginLeft = 28 + tickLabelWidth + 10;
	const plotWidth = Math.max(1, size.width - marginLeft - MARGIN_RIGHT);
	const plotHeight = Math.max(1, size.height - MARGIN_TOP - MARGIN_BOTTOM);
	const band = plotWidth / Math.max(1, bars.length);

	const longestLabel = bars.reduce((w, bar) => Math.max(w, bar.label.length), 0) * CHAR_WIDTH;
	const rotate = longestLabel > band * 0.9;
	const extraBottom = rotate
		? Math.ceil(longestLabel * Math.sin((LABEL_ANGLE * Math.PI) / 180))
		: 0;
	const overflowLeft = rotate
		? Math.max(
				0,
				Math.ceil(longestLabel * Math.cos((LABEL_ANGLE * Math.PI) / 180) - marginLeft - band / 2),
			)
		: 0;
	const width = size.width + overflowLeft;
	const height = size.height + extraBottom;

	const axisY = MARGIN_TOP + plotHeight;
	const yFor = (value: number): number => axisY - (value / yTop) * plotHeight;

	const parts: string[] = [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="${FONT_FAMILY}" font-size="${FONT_SIZE}">`,
		`<rect width="100%" height="100%" fill="#ffffff"/>`,
		`<g transform="translate(${overflowLeft} 0)">`,
		`<text class="title" x="${px(marginLeft + plotWidth / 2)}" y="${px(MARGIN_TOP / 2 + 4)}" text-anchor="middle" font-size="${TITLE_FONT_SIZE}">${escapeXml(spec.title)}</text>`,
	];

	for (const tick of ticks) {
		const y = px(yFor(tick));
		parts.push(
			`<line x1="${px(marginLeft - 4)}" y1="${y}" x2="${px(marginLeft)}" y2="${y}" stroke="#000000"/>`,
			`<text class="y-tick" x="${px(marginLeft - 7)}" y="${y}" dy="4" text-anchor="end">${formatTick(tick)}</text>`,
		);
	}

	bars.forEach((bar, index) => {
		const barWidth = band * BAR_WIDTH_RATIO;
		const center = marginLeft + band * index + band / 2;
		const top = yFor(bar.value);
		const label = escapeXml(bar.label);

		parts.push(
			`<rect class="bar" data-label="${label}" data-value="${bar.value}" x="${px(center - barWidth / 2)}" y="${px(top)}" width="${px(barWidth)}" height="${px(axisY - top)}" fill="${BAR_FILL}"/>`,
		);

		if (spec.showValues) {
			parts.push(
				`<text class="value" x="${px(center)}" y="${px(top - 4)}" text-anchor="middle">${bar.value}</text>`,
			);
		}

		const labelY = px(axisY + FONT_SIZE + 4);
		parts.push(
			rotate
				? `<text class="x-tick" x="${px(center)}" y="${labelY}" text-anchor="end" transform="rotate(-${LABEL_ANGLE} ${px(center)} ${labelY})">${label}</text>`
				: `<text class="x-tick" x="${px(center)}" y="${labelY}" text-anchor="middle">${label}</text>`,
		);
	});

	parts.push(
		`<line x1="${px(marginLeft)}" y1="${px(MARGIN_TOP)}" x2="${px(marginLeft)}" y2="${px(axisY)}" stroke="#000000"/>`,
		`<line x1="${px(marginLeft)}" y1="${px(axisY)}" x2="${px(marginLeft + plotWidth)}" y2="${px(axisY)}" stroke="#000000"/>`,
		`<text class="x-label" x="${px(marginLeft + plotWidth / 2)}" y="${px(height - 10)}" text-anchor="middle">${escapeXml(spec.xLabel)}</text>`,
		`<text class="y-label" x="14" y="${px(MARGIN_TOP + plotHeight / 2)}" text-anchor="middle" transform="rotate(-90 14 ${px(MARGIN_TOP + plotHeight / 2)})">${escapeXml(spec.yLabel)}</text>`,
		"</g>",
		"</svg>",
	);

	return parts.join("\n");
}
