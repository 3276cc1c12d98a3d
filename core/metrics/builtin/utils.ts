/**
 * Shared utilities for metric calculators: tokenizers and record accessors.
 */

import type { EvalRecord, SequenceInput, TokenizerName } from "../../config.ts";
import { InvalidInputError } from "../../errors.ts";
import type { Token } from "../../sequence/types.ts";

export type Tokenizer = (text: string) => string[];

/**
 * Tokenize a string into lowercase words.
 * Replaces punctuation with spaces and splits on whitespace.
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.replace(/[^\w\s]/g, " ")
		.split(/\s+/)
		.filter((t) => t.length > 0);
}

/**
 * Split on whitespace only; case and punctuation are kept.
 */
export function whitespaceTokenize(text: string): string[] {
	return text.split(/\s+/).filter((t) => t.length > 0);
}

export const TOKENIZERS: Record<TokenizerName, Tokenizer> = {
	normalized: tokenize,
	whitespace: whitespaceTokenize,
};

/**
 * Strings go through the tokenizer; arrays are already tokens.
 */
export function toTokens(input: SequenceInput, tokenizer: TokenizerName = "normalized"): Token[] {
	if (typeof input === "string") {
		return TOKENIZERS[tokenizer](input);
	}
	return [...input];
}

/**
 * "record 3 (utt-17)" style label for error messages.
 */
export function describeRecord(record: EvalRecord, index: number): string {
	return record.id ? `record ${index} (${record.id})` : `record ${index}`;
}

/**
 * @throws InvalidInputError when the dataset is empty
 */
export function assertNonEmpty(records: EvalRecord[], metricName: string): void {
	if (records.length === 0) {
		throw new InvalidInputError(`${metricName}: no records to evaluate`);
	}
}

/**
 * Read a field a metric depends on.
 * @throws InvalidInputError when the field is absent
 */
export function requireField<K extends keyof EvalRecord>(
	record: EvalRecord,
	index: number,
	field: K,
	metricName: string,
): NonNullable<EvalRecord[K]> {
	const value = record[field];
	if (value === undefined || value === null) {
		throw new InvalidInputError(
			`${metricName}: ${describeRecord(record, index)} is missing "${String(field)}"`,
		);
	}
	return value;
}
