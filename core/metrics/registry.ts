/**
 * Metric Registry - central registry for metric calculators.
 */

import type { EvalRecord } from "../config.ts";
import type { MetricCalculator, MetricResult } from "./interface.ts";
import { BaseRegistry } from "../registry/index.ts";

/**
 * Registry of metric calculators with batch computation.
 */
export class MetricRegistry extends BaseRegistry<MetricCalculator> {
	constructor() {
		super({ name: "MetricRegistry", throwOnConflict: true });
	}

	/**
	 * Compute a single metric.
	 * @throws RegistryNotFoundError if the metric is not registered
	 */
	compute(nameOrAlias: string, records: EvalRecord[]): MetricResult {
		return this.getOrThrow(nameOrAlias).compute(records);
	}

	/**
	 * Compute several metrics. Names are validated before anything is computed,
	 * and a metric requested under both its name and an alias runs once.
	 * @throws RegistryNotFoundError if any metric is not registered
	 */
	computeAll(metricNames: string[], records: EvalRecord[]): MetricResult[] {
		this.validateMetrics(metricNames);

		const computed: MetricResult[] = [];
		const seen = new Set<string>();

		for (const nameOrAlias of metricNames) {
			const calculator = this.getOrThrow(nameOrAlias);
			if (seen.has(calculator.name)) {
				continue;
			}
			seen.add(calculator.name);
			computed.push(calculator.compute(records));
		}

		return computed;
	}

	/**
	 * @throws RegistryNotFoundError for the first unknown name
	 */
	validateMetrics(metricNames: string[]): void {
		for (const name of metricNames) {
			this.getOrThrow(name);
		}
	}

	/**
	 * Primary names only, no aliases.
	 */
	listMetricNames(): string[] {
		return this.keys();
	}

	listCalculators(): MetricCalculator[] {
		return this.list();
	}
}
