/**
 * Descriptive statistics over numeric samples.
 *
 * Missing values (NaN) are dropped before anything is computed, and every
 * statistic of an empty sample is NaN, except the count.
 */

/**
 * Drop missing (NaN) values.
 */
export function presentValues(values: readonly number[]): number[] {
	return values.filter((v) => !Number.isNaN(v));
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator). NaN below two values.
 */
export function std(values: readonly number[]): number {
	if (values.length < 2) return Number.NaN;
	const m = mean(values);
	const variance = values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
	return Math.sqrt(variance);
}

export function min(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	return values.reduce((a, b) => (b < a ? b : a));
}

export function max(values: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	return values.reduce((a, b) => (b > a ? b : a));
}

/**
 * Quantile with linear interpolation between the two closest ranks.
 *
 * @param q - Probability in [0, 1]
 */
export function quantile(values: readonly number[], q: number): number {
	if (values.length === 0) return Number.NaN;
	if (q < 0 || q > 1) {
		throw new RangeError(`Quantile must be within [0, 1], got ${q}`);
	}

	const sorted = values.slice().sort((a, b) => a - b);
	const position = (sorted.length - 1) * q;
	const lowerIndex = Math.floor(position);
	const upperIndex = Math.ceil(position);
	const lower = sorted[lowerIndex] ?? Number.NaN;
	const upper = sorted[upperIndex] ?? Number.NaN;

	return lower + (position - lowerIndex) * (upper - lower);
}

/**
 * Round to a number of decimals, sending exact halves to the even neighbour.
 */
export function roundHalfEven(value: number, decimals = 2): number {
	if (!Number.isFinite(value)) return value;

	const factor = 10 ** decimals;
	const scaled = value * factor;
	const floor = Math.floor(scaled);
	const fraction = scaled - floor;

	let rounded: number;
	if (fraction > 0.5) {
		rounded = floor + 1;
	} else if (fraction < 0.5) {
		rounded = floor;
	} else {
		rounded = floor % 2 === 0 ? floor : floor + 1;
	}

	return rounded / factor;
}
