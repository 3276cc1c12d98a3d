/**
 * N-gram multisets and clipped matching (BLEU modified precision).
 */

import { InvalidInputError } from "../errors.ts";
import type { ReferenceSet, Token, TokenSequence } from "./types.ts";

export interface NGramEntry<T extends Token = Token> {
	gram: readonly T[];
	count: number;
}

/**
 * N-gram multiset keyed by `ngramKey(gram)`.
 */
export type NGramCounts<T extends Token = Token> = Map<string, NGramEntry<T>>;

/**
 * Canonical key for an n-gram. Each token is tagged with its type and numbers
 * are written with String(), so "1" and 1 stay distinct and so do
 * Infinity and -Infinity.
 */
export function ngramKey(gram: readonly Token[]): string {
	return JSON.stringify(gram.map((t) => (typeof t === "number" ? ["n", String(t)] : ["s", t])));
}

/**
 * NaN equals nothing, itself included, so it cannot be counted.
 */
function assertCountable(seq: readonly Token[]): void {
	const index = seq.findIndex((t) => typeof t === "number" && Number.isNaN(t));
	if (index !== -1) {
		throw new InvalidInputError(`Token at index ${index} is NaN and cannot be matched`);
	}
}

function assertOrder(n: number): void {
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidInputError(`N-gram order must be a positive integer, got ${n}`);
	}
}

/**
 * Number of order-n windows in a sequence.
 */
export function totalNGrams(seq: TokenSequence, n: number): number {
	assertOrder(n);
	return Math.max(0, seq.length - n + 1);
}

/**
 * Count every contiguous window of length n, with multiplicity.
 * Returns an empty map when the sequence is shorter than n.
 */
export function countNGrams<T extends Token>(seq: TokenSequence<T>, n: number): NGramCounts<T> {
	assertOrder(n);
	assertCountable(seq);
	const counts: NGramCounts<T> = new Map();

	for (let start = 0; start + n <= seq.length; start++) {
		const gram = seq.slice(start, start + n);
		const key = ngramKey(gram);
		const entry = counts.get(key);
		if (entry) {
			entry.count++;
		} else {
			counts.set(key, { gram, count: 1 });
		}
	}

	return counts;
}

/**
 * Per n-gram, the highest count seen in any single reference.
 */
function maxReferenceCounts<T extends Token>(
	references: ReferenceSet<T>,
	n: number,
): Map<string, number> {
	const maxCounts = new Map<string, number>();
	for (const reference of references) {
		for (const [key, entry] of countNGrams(reference, n)) {
			maxCounts.set(key, Math.max(maxCounts.get(key) ?? 0, entry.count));
		}
	}
	return maxCounts;
}

/**
 * Sum over distinct candidate n-grams of min(candidate count, max reference count).
 * @throws InvalidInputError when the reference set is empty
 */
export function clippedMatchCount<T extends Token>(
	candidate: TokenSequence<T>,
	references: ReferenceSet<T>,
	n: number,
): number {
	if (references.length === 0) {
		throw new InvalidInputError("Reference set must contain at least one sequence");
	}

	const candidateCounts = countNGrams(candidate, n);
	if (candidateCounts.size === 0) return 0;

	const referenceCounts = maxReferenceCounts(references, n);
	let matches = 0;
	for (const [key, entry] of candidateCounts) {
		matches += Math.min(entry.count, referenceCounts.get(key) ?? 0);
	}
	return matches;
}

/**
 * Clipped matches over total candidate n-grams. 0 when the candidate has no
 * order-n n-grams.
 */
export function modifiedPrecision<T extends Token>(
	candidate: TokenSequence<T>,
	references: ReferenceSet<T>,
	n: number,
): number {
	const total = totalNGrams(candidate, n);
	const matches = clippedMatchCount(candidate, references, n);
	return total === 0 ? 0 : matches / total;
}
