/**
 * Metric calculator interface for the Metric Registry pattern.
 * Each metric is a small calculator over evaluation records that can be
 * registered and invoked by name.
 */

import type { EvalRecord } from "../config.ts";
import type { Registrable } from "../registry/index.ts";

/**
 * Result of a metric calculation.
 */
export interface MetricResult {
	name: string;
	value: number;
	details?: Record<string, unknown>;
}

/**
 * Interface for metric calculators.
 */
export interface MetricCalculator extends Registrable {
	/**
	 * Primary name of the metric (used for lookup and output).
	 */
	readonly name: string;

	/**
	 * Other names that resolve to this metric.
	 */
	readonly aliases?: readonly string[];

	readonly description?: string;

	/**
	 * Compute the metric over a dataset of records.
	 * @throws InvalidInputError when a record lacks a field the metric needs
	 */
	compute(records: EvalRecord[]): MetricResult;
}
