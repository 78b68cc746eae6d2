/**
 * Errors raised while reading the metrics CSV. All of them are fatal.
 */

export class DatasetParseError extends Error {
	constructor(
		message: string,
		public readonly path: string,
		public readonly line?: number,
	) {
		super(line === undefined ? `${path}: ${message}` : `${path}:${line}: ${message}`);
		this.name = "DatasetParseError";
	}
}

export class MissingColumnsError extends Error {
	constructor(
		public readonly path: string,
		public readonly missing: readonly string[],
	) {
		super(`${path}: missing required column(s): ${missing.join(", ")}`);
		this.name = "MissingColumnsError";
	}
}
