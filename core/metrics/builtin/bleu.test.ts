import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../errors.ts";
import { Bleu1Metric, BleuMetric } from "./bleu.ts";

describe("BleuMetric", () => {
	it("scores identical text as 1", () => {
		const result = new BleuMetric().compute([
			{ hypothesis: "The cat sat on the mat.", reference: "the cat sat on the mat" },
		]);

		expect(result.name).toBe("bleu");
		expect(result.value).toBe(1);
		expect(result.details).toMatchObject({
			brevityPenalty: 1,
			precisions: [1, 1, 1, 1],
			maxOrder: 4,
			smoothing: "none",
			count: 1,
		});
	});

	it("prefers the references list over the single reference", () => {
		const result = new BleuMetric({ bleu: { maxOrder: 1 } }).compute([
			{ hypothesis: "a b", reference: "x y", references: ["a b c d", "a b c"] },
		]);
		expect(result.value).toBeCloseTo(Math.exp(-0.5), 12);
		expect(result.details).toMatchObject({ candidateLength: 2, referenceLength: 3 });
	});

	it("honours smoothing from the options", () => {
		const result = new BleuMetric({ bleu: { smoothing: "epsilon-floor" } }).compute([
			{ hypothesis: ["the", "cat"], reference: ["the", "cat", "sat"] },
		]);
		expect(result.value).toBeCloseTo(Math.exp(-0.5) * Math.sqrt(0.1), 12);
	});

	it("rejects a record with no reference at all", () => {
		expect(() => new BleuMetric().compute([{ id: "s1", hypothesis: "a" }])).toThrow(
			'bleu: record 0 (s1) has no "references" or "reference"',
		);
		expect(() => new BleuMetric().compute([{ hypothesis: "a", references: [] }])).toThrow(
			InvalidInputError,
		);
	});
});

describe("Bleu1Metric", () => {
	it("is unigram BLEU regardless of the configured order", () => {
		const metric = new Bleu1Metric({ bleu: { maxOrder: 4 } });
		const result = metric.compute([{ hypothesis: "a b c d", reference: "a b c e" }]);

		expect(result.name).toBe("bleu_1");
		expect(result.value).toBeCloseTo(0.75, 12);
		expect(result.details).toMatchObject({ maxOrder: 1, precisions: [0.75] });
	});
});
