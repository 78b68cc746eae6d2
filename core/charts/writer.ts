/**
 * Chart writers turn rendered SVG into a file on disk.
 */

import sharp from "sharp";
import type { ChartFormat } from "./types.ts";

export interface ChartWriter {
	/**
	 * Write the chart to `outputPath`, replacing any existing file.
	 */
	write(svg: string, outputPath: string): Promise<void>;
}

/**
 * Rasterizes SVG with sharp (librsvg) into PNG, JPEG or WebP.
 */
export class SharpChartWriter implements ChartWriter {
	constructor(private readonly format: ChartFormat = "png") {}

	async write(svg: string, outputPath: string): Promise<void> {
		await sharp(Buffer.from(svg))
			.flatten({ background: "#ffffff" })
			.toFormat(this.format)
			.toFile(outputPath);
	}
}
