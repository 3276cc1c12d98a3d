import { describe, expect, it } from "vitest";
import { InvalidInputError, InvalidProbabilityError } from "../errors.ts";
import {
	corpusPerplexity,
	probabilitiesFromTable,
	sequenceLogPerplexity,
	sequencePerplexity,
	type ProbabilityFn,
} from "./perplexity.ts";

const uniform =
	(vocabularySize: number): ProbabilityFn<string> =>
	() =>
		1 / vocabularySize;

describe("sequencePerplexity", () => {
	it("equals the vocabulary size under a uniform model", () => {
		expect(sequencePerplexity(uniform(4), ["a", "b", "c", "d"])).toBeCloseTo(4, 12);
	});

	it("is exactly 1 for a model that is always certain", () => {
		expect(sequencePerplexity(() => 1, ["a", "b"])).toBe(1);
	});

	it("is the geometric mean of inverse probabilities", () => {
		// (1/0.5 * 1/0.25)^(1/2) = sqrt(8)
		const ppl = sequencePerplexity(probabilitiesFromTable([0.5, 0.25]), ["x", "y"]);
		expect(ppl).toBeCloseTo(2 * Math.SQRT2, 12);
	});

	it("passes token, position and sequence to the model", () => {
		const seen: Array<[string, number, number]> = [];
		sequencePerplexity<string>((token, position, seq) => {
			seen.push([token, position, seq.length]);
			return 0.5;
		}, ["p", "q"]);
		expect(seen).toEqual([
			["p", 0, 2],
			["q", 1, 2],
		]);
	});

	it("stays finite for long sequences of small probabilities", () => {
		const seq = Array.from({ length: 5000 }, () => "w");
		expect(sequencePerplexity(() => 1e-3, seq)).toBeCloseTo(1000, 6);
	});
});

describe("sequenceLogPerplexity", () => {
	it("returns the mean negative log-likelihood", () => {
		expect(sequenceLogPerplexity(uniform(2), ["a", "b", "c"])).toBeCloseTo(Math.LN2, 12);
	});

	it("rejects an empty sequence", () => {
		expect(() => sequenceLogPerplexity(uniform(2), [])).toThrow(InvalidInputError);
	});

	it("rejects probabilities outside (0, 1]", () => {
		expect(() => sequenceLogPerplexity(probabilitiesFromTable([0.5, 0]), ["a", "b"])).toThrow(
			InvalidProbabilityError,
		);
		expect(() => sequenceLogPerplexity(() => 1.5, ["a"])).toThrow(
			"Probability at position 0 must be in (0, 1], got 1.5",
		);
		expect(() => sequenceLogPerplexity(() => -0.1, ["a"])).toThrow(InvalidProbabilityError);
	});

	it("reports the failing position", () => {
		let caught: unknown;
		try {
			sequenceLogPerplexity(probabilitiesFromTable([0.5, 0.5, 0]), ["a", "b", "c"]);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(InvalidProbabilityError);
		expect(caught).toMatchObject({ position: 2, value: 0, code: "INVALID_PROBABILITY" });
	});
});

describe("corpusPerplexity", () => {
	it("is the geometric mean of per-sequence perplexities", () => {
		// seq 1 has perplexity 2, seq 2 has perplexity 8
		const table: Record<string, number> = { a: 0.5, b: 0.125 };
		const model: ProbabilityFn<string> = (token) => table[token] ?? Number.NaN;

		expect(corpusPerplexity(model, [["a"], ["b", "b"]])).toBeCloseTo(4, 12);
	});

	it("is 1 when every probability is 1", () => {
		expect(corpusPerplexity(() => 1, [["a"], ["b", "c"]])).toBe(1);
	});

	it("rejects an empty corpus and any empty sequence", () => {
		expect(() => corpusPerplexity(uniform(2), [])).toThrow("no sequences");
		expect(() => corpusPerplexity(uniform(2), [["a"], []])).toThrow(InvalidInputError);
	});
});

describe("probabilitiesFromTable", () => {
	it("yields NaN past the end of the table, which is rejected", () => {
		const fn = probabilitiesFromTable([0.5]);
		expect(fn("a", 0, ["a"])).toBe(0.5);
		expect(Number.isNaN(fn("b", 1, ["a", "b"]))).toBe(true);
		expect(() => sequencePerplexity(fn, ["a", "b"])).toThrow(InvalidProbabilityError);
	});
});
