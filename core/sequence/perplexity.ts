/**
 * Perplexity as a geometric mean of inverse token probabilities.
 *
 * Everything is accumulated in log space so long sequences do not overflow.
 */

import { InvalidInputError, InvalidProbabilityError } from "../errors.ts";

/**
 * Probability a model assigns to `token` at `position` of `sequence`.
 * Must return a value in (0, 1].
 */
export type ProbabilityFn<T> = (token: T, position: number, sequence: readonly T[]) => number;

function checkedProbability(value: number, position: number): number {
	if (!Number.isFinite(value) || value <= 0 || value > 1) {
		throw new InvalidProbabilityError(position, value);
	}
	return value;
}

/**
 * Mean negative log-likelihood of a sequence (natural log).
 * @throws InvalidInputError on an empty sequence
 * @throws InvalidProbabilityError when the model returns a value outside (0, 1]
 */
export function sequenceLogPerplexity<T>(
	probabilityFn: ProbabilityFn<T>,
	seq: readonly T[],
): number {
	if (seq.length === 0) {
		throw new InvalidInputError("Cannot compute perplexity of an empty sequence");
	}

	let nll = 0;
	seq.forEach((token, position) => {
		const p = checkedProbability(probabilityFn(token, position, seq), position);
		nll -= Math.log(p);
	});
	return nll / seq.length;
}

/**
 * exp of the mean negative log-likelihood; always >= 1.
 */
export function sequencePerplexity<T>(probabilityFn: ProbabilityFn<T>, seq: readonly T[]): number {
	return Math.exp(sequenceLogPerplexity(probabilityFn, seq));
}

/**
 * Geometric mean of per-sequence perplexities.
 * @throws InvalidInputError when the corpus or any sequence is empty
 */
export function corpusPerplexity<T>(
	probabilityFn: ProbabilityFn<T>,
	seqs: readonly (readonly T[])[],
): number {
	if (seqs.length === 0) {
		throw new InvalidInputError("Cannot compute corpus perplexity: no sequences");
	}

	let logSum = 0;
	for (const seq of seqs) {
		logSum += sequenceLogPerplexity(probabilityFn, seq);
	}
	return Math.exp(logSum / seqs.length);
}

/**
 * Adapt recorded per-position probabilities into a ProbabilityFn.
 * Positions past the end of the table yield NaN, which is rejected as invalid.
 */
export function probabilitiesFromTable(probabilities: readonly number[]): ProbabilityFn<unknown> {
	return (_token, position) => probabilities[position] ?? Number.NaN;
}
