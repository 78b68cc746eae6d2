/**
 * Built-in summary statistics, in the order of a classic describe() table:
 * count, mean, std, min, 25%, 50%, 75%, max.
 */

import { max, mean, min, quantile, std } from "../analysis/index.ts";
import type { SummaryStatistic } from "./interface.ts";

export class CountStatistic implements SummaryStatistic {
	readonly name = "count";
	readonly description = "Number of non-missing values";

	compute(values: readonly number[]): number {
		return values.length;
	}
}

export class MeanStatistic implements SummaryStatistic {
	readonly name = "mean";
	readonly description = "Arithmetic mean";

	compute(values: readonly number[]): number {
		return mean(values);
	}
}

export class StdStatistic implements SummaryStatistic {
	readonly name = "std";
	readonly description = "Sample standard deviation (n - 1)";

	compute(values: readonly number[]): number {
		return std(values);
	}
}

export class MinStatistic implements SummaryStatistic {
	readonly name = "min";
	readonly description = "Smallest value";

	compute(values: readonly number[]): number {
		return min(values);
	}
}

export class MaxStatistic implements SummaryStatistic {
	readonly name = "max";
	readonly description = "Largest value";

	compute(values: readonly number[]): number {
		return max(values);
	}
}

/**
 * Percentile statistic with linear interpolation, named like "25%".
 */
export class PercentileStatistic implements SummaryStatistic {
	readonly name: string;
	readonly description: string;

	constructor(private readonly percent: number) {
		this.name = `${percent}%`;
		this.description = `${percent}th percentile (linear interpolation)`;
	}

	compute(values: readonly number[]): number {
		return quantile(values, this.percent / 100);
	}
}

export function getBuiltinStatistics(): SummaryStatistic[] {
	return [
		new CountStatistic(),
		new MeanStatistic(),
		new StdStatistic(),
		new MinStatistic(),
		new PercentileStatistic(25),
		new PercentileStatistic(50),
		new PercentileStatistic(75),
		new MaxStatistic(),
	];
}
