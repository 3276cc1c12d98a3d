/**
 * Word Error Rate over tokenized sequences.
 *
 * Corpus WER divides total edits by total reference tokens. It is not the
 * mean of per-example rates; the report exposes both so they can be compared.
 */

import { InvalidInputError } from "../errors.ts";
import { editDistance, editOperations } from "./edit-distance.ts";

export interface WordErrorRateReport {
	/** Aggregate rate: errors / referenceTokens */
	wer: number;
	errors: number;
	referenceTokens: number;
	substitutions: number;
	deletions: number;
	insertions: number;
	examples: number;
	/** Arithmetic mean of per-example rates (examples with empty truth excluded) */
	meanSentenceWer: number;
}

/**
 * Edit distance normalized by the reference length.
 * @throws InvalidInputError when `trueSeq` is empty
 */
export function wordErrorRate<T>(trueSeq: readonly T[], predSeq: readonly T[]): number {
	if (trueSeq.length === 0) {
		throw new InvalidInputError("Cannot compute WER: reference sequence is empty");
	}
	return editDistance(trueSeq, predSeq) / trueSeq.length;
}

function assertPaired(trueSeqs: readonly unknown[], predSeqs: readonly unknown[]): void {
	if (trueSeqs.length !== predSeqs.length) {
		throw new InvalidInputError(
			`Cannot compute corpus WER: ${trueSeqs.length} references but ${predSeqs.length} predictions`,
		);
	}
	if (trueSeqs.length === 0) {
		throw new InvalidInputError("Cannot compute corpus WER: no examples");
	}
}

/**
 * Corpus-level WER: sum of distances over sum of reference lengths.
 * @throws InvalidInputError on mismatched or empty lists, or when every reference is empty
 */
export function corpusWordErrorRate<T>(
	trueSeqs: readonly (readonly T[])[],
	predSeqs: readonly (readonly T[])[],
): number {
	assertPaired(trueSeqs, predSeqs);

	let errors = 0;
	let referenceTokens = 0;
	trueSeqs.forEach((trueSeq, index) => {
		errors += editDistance(trueSeq, predSeqs[index] ?? []);
		referenceTokens += trueSeq.length;
	});

	if (referenceTokens === 0) {
		throw new InvalidInputError("Cannot compute corpus WER: total reference length is zero");
	}
	return errors / referenceTokens;
}

/**
 * Corpus WER with its totals and the per-operation breakdown.
 */
export function corpusWordErrorRateReport<T>(
	trueSeqs: readonly (readonly T[])[],
	predSeqs: readonly (readonly T[])[],
): WordErrorRateReport {
	assertPaired(trueSeqs, predSeqs);

	let errors = 0;
	let referenceTokens = 0;
	let substitutions = 0;
	let deletions = 0;
	let insertions = 0;
	let sentenceWerSum = 0;
	let sentenceCount = 0;

	trueSeqs.forEach((trueSeq, index) => {
		const ops = editOperations(trueSeq, predSeqs[index] ?? []);
		errors += ops.distance;
		referenceTokens += trueSeq.length;
		substitutions += ops.substitutions;
		deletions += ops.deletions;
		insertions += ops.insertions;
		if (trueSeq.length > 0) {
			sentenceWerSum += ops.distance / trueSeq.length;
			sentenceCount++;
		}
	});

	if (referenceTokens === 0) {
		throw new InvalidInputError("Cannot compute corpus WER: total reference length is zero");
	}

	return {
		wer: errors / referenceTokens,
		errors,
		referenceTokens,
		substitutions,
		deletions,
		insertions,
		examples: trueSeqs.length,
		meanSentenceWer: sentenceWerSum / sentenceCount,
	};
}
