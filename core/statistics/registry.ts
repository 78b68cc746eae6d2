/**
 * Statistic Registry - ordered set of summary statistics.
 * Registration order is the row order of the summary table.
 */

import { BaseRegistry } from "../registry/index.ts";
import type { SummaryStatistic } from "./interface.ts";

export class StatisticRegistry extends BaseRegistry<SummaryStatistic> {
	constructor() {
		super("StatisticRegistry");
	}

	/**
	 * @throws RegistryConflictError if the name is taken
	 */
	register(statistic: SummaryStatistic): void {
		this.registerItem(statistic.name, statistic);
	}
}
