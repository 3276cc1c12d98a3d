/**
 * Built-in metric calculators.
 * These are registered by default in the global metric registry.
 *
 * ## Sequence Metrics
 * - wer (corpus word error rate)
 * - bleu, bleu_1
 * - perplexity
 *
 * ## Ranking Metrics
 * - roc_auc
 * - average_precision
 */

export * from "./utils.ts";
export * from "./wer.ts";
export * from "./bleu.ts";
export * from "./perplexity.ts";
export * from "./ranking.ts";

import type { MetricOptions } from "../../config.ts";
import type { MetricCalculator } from "../interface.ts";
import { WerMetric } from "./wer.ts";
import { BleuMetric, Bleu1Metric } from "./bleu.ts";
import { PerplexityMetric } from "./perplexity.ts";
import { RocAucMetric, AveragePrecisionMetric } from "./ranking.ts";

/**
 * Get all built-in metric calculators, configured with `options`.
 */
export function getBuiltinMetrics(options: MetricOptions = {}): MetricCalculator[] {
	return [
		// === Sequence Metrics ===
		new WerMetric(options),
		new BleuMetric(options),
		new Bleu1Metric(options),
		new PerplexityMetric(),

		// === Ranking Metrics ===
		new RocAucMetric(),
		new AveragePrecisionMetric(),
	];
}
