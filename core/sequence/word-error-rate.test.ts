import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../errors.ts";
import {
	corpusWordErrorRate,
	corpusWordErrorRateReport,
	wordErrorRate,
} from "./word-error-rate.ts";

describe("wordErrorRate", () => {
	it("normalizes edit distance by the reference length", () => {
		expect(wordErrorRate(["A", "B", "C"], ["A", "A", "C"])).toBe(1 / 3);
		expect(wordErrorRate(["A", "B", "C", "D"], ["A", "A", "C", "D"])).toBe(1 / 4);
	});

	it("can exceed 1 when the prediction is much longer", () => {
		expect(wordErrorRate(["a"], ["x", "y", "z"])).toBe(3);
	});

	it("rejects an empty reference", () => {
		expect(() => wordErrorRate([], ["a"])).toThrow(InvalidInputError);
		expect(() => wordErrorRate([], [])).toThrow("reference sequence is empty");
	});
});

describe("corpusWordErrorRate", () => {
	const trueSeqs = [
		["a", "b"],
		["c", "d", "e", "f", "g", "h", "i", "j"],
	];
	const predSeqs = [
		["x", "y"],
		["c", "d", "e", "f", "g", "h", "i", "j"],
	];

	it("divides total edits by total reference tokens", () => {
		expect(corpusWordErrorRate(trueSeqs, predSeqs)).toBe(0.2);
	});

	it("differs from the mean of per-example rates on unequal lengths", () => {
		const perExample = trueSeqs.map((t, i) => wordErrorRate(t, predSeqs[i] ?? []));
		const mean = perExample.reduce((a, b) => a + b, 0) / perExample.length;

		expect(mean).toBe(0.5);
		expect(corpusWordErrorRate(trueSeqs, predSeqs)).not.toBe(mean);
	});

	it("tolerates an empty reference as long as the total is positive", () => {
		expect(corpusWordErrorRate([[], ["a", "b"]], [["x"], ["a", "b"]])).toBe(0.5);
	});

	it("rejects mismatched list lengths", () => {
		expect(() => corpusWordErrorRate([["a"]], [["a"], ["b"]])).toThrow(
			"1 references but 2 predictions",
		);
	});

	it("rejects an empty corpus", () => {
		expect(() => corpusWordErrorRate([], [])).toThrow(InvalidInputError);
	});

	it("rejects a corpus whose references are all empty", () => {
		expect(() => corpusWordErrorRate([[], []], [["a"], []])).toThrow(
			"total reference length is zero",
		);
	});
});

describe("corpusWordErrorRateReport", () => {
	it("returns totals and the operation breakdown", () => {
		const report = corpusWordErrorRateReport(
			[
				["a", "b", "c"],
				["a", "b"],
			],
			[
				["a", "x", "c", "d"],
				["a"],
			],
		);

		expect(report.wer).toBe(0.6);
		expect(report.errors).toBe(3);
		expect(report.referenceTokens).toBe(5);
		expect(report.substitutions).toBe(1);
		expect(report.deletions).toBe(1);
		expect(report.insertions).toBe(1);
		expect(report.examples).toBe(2);
		expect(report.meanSentenceWer).toBeCloseTo(7 / 12, 12);
	});

	it("leaves empty references out of the per-example mean", () => {
		const report = corpusWordErrorRateReport([[], ["a", "b"]], [["x"], ["a", "b"]]);
		expect(report.wer).toBe(0.5);
		expect(report.meanSentenceWer).toBe(0);
	});

	it("agrees with corpusWordErrorRate", () => {
		const trueSeqs = [["one", "two", "three"], ["four"]];
		const predSeqs = [["one", "three"], ["for", "five"]];
		expect(corpusWordErrorRateReport(trueSeqs, predSeqs).wer).toBe(
			corpusWordErrorRate(trueSeqs, predSeqs),
		);
	});
});
