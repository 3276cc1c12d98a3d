/**
 * Corpus Word Error Rate metric calculator.
 *
 * Needs `reference` and `hypothesis` on every record. Lower is better.
 */

import type { EvalRecord, MetricOptions, TokenizerName } from "../../config.ts";
import { corpusWordErrorRateReport } from "../../sequence/word-error-rate.ts";
import type { Token } from "../../sequence/types.ts";
import type { MetricCalculator, MetricResult } from "../interface.ts";
import { assertNonEmpty, requireField, toTokens } from "./utils.ts";

export class WerMetric implements MetricCalculator {
	readonly name = "wer";
	readonly aliases = ["word_error_rate"] as const;
	readonly description = "Corpus word error rate (total edits / total reference words)";
	private readonly tokenizer: TokenizerName;

	constructor(options: MetricOptions = {}) {
		this.tokenizer = options.tokenizer ?? "normalized";
	}

	compute(records: EvalRecord[]): MetricResult {
		assertNonEmpty(records, this.name);

		const references: Token[][] = [];
		const hypotheses: Token[][] = [];
		records.forEach((record, index) => {
			references.push(toTokens(requireField(record, index, "reference", this.name), this.tokenizer));
			hypotheses.push(toTokens(requireField(record, index, "hypothesis", this.name), this.tokenizer));
		});

		const { wer, ...details } = corpusWordErrorRateReport(references, hypotheses);
		return { name: this.name, value: wer, details };
	}
}

