/**
 * Metrics module - exports registry, interfaces, and built-in metrics.
 *
 * Metrics are registered once and computed on demand by name or alias.
 */

export * from "./interface.ts";
export * from "./registry.ts";
export * from "./builtin/index.ts";

import { MetricRegistry } from "./registry.ts";
import { getBuiltinMetrics } from "./builtin/index.ts";
import type { EvalRecord, MetricOptions } from "../config.ts";
import type { MetricResult } from "./interface.ts";

// Global default registry instance
let _defaultRegistry: MetricRegistry | null = null;

/**
 * Default registry with every built-in metric under default options.
 * Singleton: the same registry is returned on subsequent calls.
 */
export function getDefaultRegistry(): MetricRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = createRegistry();
	}
	return _defaultRegistry;
}

/**
 * Isolated registry with built-in metrics configured by `options`.
 */
export function createRegistry(options: MetricOptions = {}): MetricRegistry {
	const registry = new MetricRegistry();
	for (const metric of getBuiltinMetrics(options)) {
		registry.register(metric);
	}
	return registry;
}

/**
 * Compute metrics by name. Uses the default registry unless options are given.
 */
export function computeMetrics(
	records: EvalRecord[],
	metricNames: string[],
	options?: MetricOptions,
): MetricResult[] {
	const registry = options ? createRegistry(options) : getDefaultRegistry();
	return registry.computeAll(metricNames, records);
}

/**
 * Names of every metric in the default registry.
 */
export function getAvailableMetrics(): string[] {
	return getDefaultRegistry().listMetricNames();
}
