/**
 * Corpus BLEU: clipped n-gram precision across orders 1..N combined by a
 * weighted geometric mean, scaled by a brevity penalty.
 *
 * Reference: BLEU paper (Papineni et al., 2002)
 */

import { BleuOptionsSchema, formatZodIssues, type BleuOptions, type Smoothing } from "../config.ts";
import { InvalidInputError } from "../errors.ts";
import { clippedMatchCount, totalNGrams } from "./ngram.ts";
import type { ReferenceSet, Token, TokenSequence } from "./types.ts";

/**
 * One candidate with its equally valid references.
 */
export interface BleuPair<T extends Token = Token> {
	candidate: TokenSequence<T>;
	references: ReferenceSet<T>;
}

export interface ResolvedBleuOptions {
	maxOrder: number;
	weights: number[];
	smoothing: Smoothing;
	epsilon: number;
}

export interface BleuReport extends ResolvedBleuOptions {
	score: number;
	brevityPenalty: number;
	/** Precision per order (index 0 is unigrams), after smoothing */
	precisions: number[];
	/** Clipped match totals per order */
	matches: number[];
	/** Candidate n-gram totals per order */
	totals: number[];
	candidateLength: number;
	referenceLength: number;
	/** candidateLength / referenceLength */
	lengthRatio: number;
}

/**
 * Validate options and fill defaults (uniform weights).
 * @throws InvalidInputError on out-of-domain options
 */
export function resolveBleuOptions(options: BleuOptions = {}): ResolvedBleuOptions {
	const parsed = BleuOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw new InvalidInputError(`Invalid BLEU options:\n${formatZodIssues(parsed.error)}`);
	}
	const { maxOrder, weights, smoothing, epsilon } = parsed.data;
	return {
		maxOrder,
		weights: weights ?? new Array<number>(maxOrder).fill(1 / maxOrder),
		smoothing,
		epsilon,
	};
}

/**
 * Length of the reference closest to the candidate length.
 * Ties go to the shorter reference.
 */
export function closestReferenceLength(
	candidateLength: number,
	references: ReferenceSet,
): number {
	let best = -1;
	let bestDiff = Number.POSITIVE_INFINITY;
	for (const reference of references) {
		const diff = Math.abs(reference.length - candidateLength);
		if (diff < bestDiff || (diff === bestDiff && reference.length < best)) {
			best = reference.length;
			bestDiff = diff;
		}
	}
	return best;
}

/**
 * BP = 1 when c > r, exp(1 - r/c) otherwise, 0 when c = 0.
 */
export function brevityPenalty(candidateLength: number, referenceLength: number): number {
	if (candidateLength === 0) return 0;
	if (candidateLength > referenceLength) return 1;
	return Math.exp(1 - referenceLength / candidateLength);
}

function smoothedPrecision(
	matches: number,
	total: number,
	options: ResolvedBleuOptions,
): number {
	if (options.smoothing === "epsilon-floor") {
		if (total === 0) return options.epsilon;
		if (matches === 0) return options.epsilon / total;
	}
	return total === 0 ? 0 : matches / total;
}

/**
 * Corpus-level BLEU with its intermediate statistics.
 *
 * Precision at each order is aggregated over the corpus (sum of clipped
 * matches over sum of candidate n-grams), not averaged per sentence.
 * Without smoothing, a zero precision at any weighted order gives a score of 0.
 *
 * @throws InvalidInputError on an empty dataset, an empty reference set or bad options
 */
export function corpusBleu<T extends Token>(
	pairs: readonly BleuPair<T>[],
	options?: BleuOptions,
): BleuReport {
	if (pairs.length === 0) {
		throw new InvalidInputError("Cannot compute BLEU: dataset is empty");
	}
	const resolved = resolveBleuOptions(options);
	const { maxOrder, weights } = resolved;

	const matches = new Array<number>(maxOrder).fill(0);
	const totals = new Array<number>(maxOrder).fill(0);
	let candidateLength = 0;
	let referenceLength = 0;

	pairs.forEach(({ candidate, references }, index) => {
		if (references.length === 0) {
			throw new InvalidInputError(`Cannot compute BLEU: pair ${index} has no references`);
		}
		candidateLength += candidate.length;
		referenceLength += closestReferenceLength(candidate.length, references);

		for (let n = 1; n <= maxOrder; n++) {
			matches[n - 1] = (matches[n - 1] ?? 0) + clippedMatchCount(candidate, references, n);
			totals[n - 1] = (totals[n - 1] ?? 0) + totalNGrams(candidate, n);
		}
	});

	const precisions = matches.map((m, i) => smoothedPrecision(m, totals[i] ?? 0, resolved));
	const bp = brevityPenalty(candidateLength, referenceLength);

	let logSum = 0;
	let hasZero = false;
	for (let i = 0; i < maxOrder; i++) {
		const weight = weights[i] ?? 0;
		const p = precisions[i] ?? 0;
		if (weight === 0) continue;
		if (p === 0) {
			hasZero = true;
			break;
		}
		logSum += weight * Math.log(p);
	}

	const score = hasZero || bp === 0 ? 0 : bp * Math.exp(logSum);

	return {
		...resolved,
		score,
		brevityPenalty: bp,
		precisions,
		matches,
		totals,
		candidateLength,
		referenceLength,
		lengthRatio: referenceLength === 0 ? 0 : candidateLength / referenceLength,
	};
}

/**
 * Corpus BLEU score in [0, 1].
 */
export function bleuScore<T extends Token>(
	pairs: readonly BleuPair<T>[],
	options?: BleuOptions,
): number {
	return corpusBleu(pairs, options).score;
}

/**
 * BLEU of a single candidate against its references.
 */
export function sentenceBleu<T extends Token>(
	candidate: TokenSequence<T>,
	references: ReferenceSet<T>,
	options?: BleuOptions,
): number {
	return corpusBleu([{ candidate, references }], options).score;
}
