/**
 * Corpus perplexity from recorded token probabilities.
 *
 * Each record carries `tokenProbabilities`: the probability the model gave
 * to every token of one sequence. The values themselves are the sequence,
 * so the probability function is the identity.
 */

import type { EvalRecord } from "../../config.ts";
import { corpusPerplexity } from "../../sequence/perplexity.ts";
import type { MetricCalculator, MetricResult } from "../interface.ts";
import { assertNonEmpty, requireField } from "./utils.ts";

const identity = (probability: number): number => probability;

export class PerplexityMetric implements MetricCalculator {
	readonly name = "perplexity";
	readonly aliases = ["ppl"] as const;
	readonly description = "Geometric mean of per-sequence perplexities";

	compute(records: EvalRecord[]): MetricResult {
		assertNonEmpty(records, this.name);

		const sequences = records.map((record, index) =>
			requireField(record, index, "tokenProbabilities", this.name),
		);
		const totalTokens = sequences.reduce((sum, seq) => sum + seq.length, 0);

		return {
			name: this.name,
			value: corpusPerplexity(identity, sequences),
			details: {
				sequences: sequences.length,
				totalTokens,
			},
		};
	}
}
