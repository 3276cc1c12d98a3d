/**
 * Ranking metric calculators: ROC AUC and Average Precision.
 *
 * Every record needs a `score` (higher means more likely positive) and a
 * binary `label`.
 */

import type { EvalRecord } from "../../config.ts";
import {
	averagePrecision,
	rocAuc,
	thresholdSweep,
	type ScoredLabel,
} from "../../ranking/curves.ts";
import type { MetricCalculator, MetricResult } from "../interface.ts";
import { assertNonEmpty, requireField } from "./utils.ts";

/**
 * Extract score/label pairs from records.
 * @throws InvalidInputError when a record has no score or label
 */
export function toScoredLabels(records: EvalRecord[], metricName: string): ScoredLabel[] {
	assertNonEmpty(records, metricName);
	return records.map((record, index) => ({
		score: requireField(record, index, "score", metricName),
		label: requireField(record, index, "label", metricName),
	}));
}

function classCounts(pairs: ScoredLabel[]): Record<string, number> {
	const { steps, totalPositives, totalNegatives } = thresholdSweep(pairs);
	return { positives: totalPositives, negatives: totalNegatives, thresholds: steps.length };
}

export class RocAucMetric implements MetricCalculator {
	readonly name = "roc_auc";
	readonly aliases = ["auc", "auroc"] as const;
	readonly description = "Area under the ROC curve (trapezoidal)";

	compute(records: EvalRecord[]): MetricResult {
		const pairs = toScoredLabels(records, this.name);
		return {
			name: this.name,
			value: rocAuc(pairs),
			details: classCounts(pairs),
		};
	}
}

export class AveragePrecisionMetric implements MetricCalculator {
	readonly name = "average_precision";
	readonly aliases = ["ap", "auprc"] as const;
	readonly description = "Average precision (step-integrated PR curve)";

	compute(records: EvalRecord[]): MetricResult {
		const pairs = toScoredLabels(records, this.name);
		return {
			name: this.name,
			value: averagePrecision(pairs),
			details: classCounts(pairs),
		};
	}
}
