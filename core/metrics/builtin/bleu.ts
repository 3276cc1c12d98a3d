/**
 * Corpus BLEU metric calculators.
 *
 * Candidates come from `hypothesis`; references from `references`, falling
 * back to the single `reference`.
 *
 * Reference: BLEU paper (Papineni et al., 2002)
 */

import type { BleuOptions, EvalRecord, MetricOptions, TokenizerName } from "../../config.ts";
import { InvalidInputError } from "../../errors.ts";
import { corpusBleu, type BleuPair } from "../../sequence/bleu.ts";
import type { MetricCalculator, MetricResult } from "../interface.ts";
import { assertNonEmpty, describeRecord, requireField, toTokens } from "./utils.ts";

/**
 * BLEU over the whole dataset with configurable order, weights and smoothing.
 */
export class CorpusBleuMetric implements MetricCalculator {
	readonly name: string;
	readonly aliases: readonly string[];
	readonly description: string;
	private readonly tokenizer: TokenizerName;
	private readonly bleuOptions: BleuOptions;

	constructor(
		name: string,
		aliases: readonly string[],
		bleuOptions: BleuOptions,
		tokenizer: TokenizerName = "normalized",
	) {
		this.name = name;
		this.aliases = aliases;
		this.bleuOptions = bleuOptions;
		this.tokenizer = tokenizer;
		this.description = `Corpus BLEU up to ${bleuOptions.maxOrder ?? 4}-grams`;
	}

	compute(records: EvalRecord[]): MetricResult {
		assertNonEmpty(records, this.name);

		const pairs: BleuPair[] = records.map((record, index) => {
			const candidate = toTokens(requireField(record, index, "hypothesis", this.name), this.tokenizer);
			const rawReferences = record.references ?? (record.reference !== undefined ? [record.reference] : []);
			if (rawReferences.length === 0) {
				throw new InvalidInputError(
					`${this.name}: ${describeRecord(record, index)} has no "references" or "reference"`,
				);
			}
			return {
				candidate,
				references: rawReferences.map((r) => toTokens(r, this.tokenizer)),
			};
		});

		const report = corpusBleu(pairs, this.bleuOptions);
		return {
			name: this.name,
			value: report.score,
			details: {
				brevityPenalty: report.brevityPenalty,
				precisions: report.precisions,
				candidateLength: report.candidateLength,
				referenceLength: report.referenceLength,
				lengthRatio: report.lengthRatio,
				maxOrder: report.maxOrder,
				smoothing: report.smoothing,
				count: records.length,
			},
		};
	}
}

/**
 * `bleu`: the configured BLEU (4-gram uniform unless overridden).
 */
export class BleuMetric extends CorpusBleuMetric {
	constructor(options: MetricOptions = {}) {
		super("bleu", ["corpus_bleu"], options.bleu ?? {}, options.tokenizer);
	}
}

/**
 * `bleu_1`: clipped unigram precision with brevity penalty.
 * Smoothing settings are shared with the configured BLEU.
 */
export class Bleu1Metric extends CorpusBleuMetric {
	constructor(options: MetricOptions = {}) {
		super(
			"bleu_1",
			["bleu1", "unigram_precision"],
			{ maxOrder: 1, smoothing: options.bleu?.smoothing, epsilon: options.bleu?.epsilon },
			options.tokenizer,
		);
	}
}
