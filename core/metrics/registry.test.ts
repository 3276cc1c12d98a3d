import { beforeEach, describe, expect, test } from "vitest";
import type { EvalRecord } from "../config.ts";
import { RegistryNotFoundError } from "../registry/index.ts";
import type { MetricCalculator } from "./interface.ts";
import { MetricRegistry } from "./registry.ts";
import { computeMetrics, createRegistry, getAvailableMetrics, getDefaultRegistry } from "./index.ts";

describe("MetricRegistry", () => {
	let registry: MetricRegistry;

	beforeEach(() => {
		registry = new MetricRegistry();
	});

	test("registers and retrieves metrics", () => {
		const mockMetric: MetricCalculator = {
			name: "test_metric",
			aliases: ["test-metric"],
			compute: () => ({ name: "test_metric", value: 0.5 }),
		};

		registry.register(mockMetric);
		expect(registry.get("test_metric")).toBe(mockMetric);
		expect(registry.get("test-metric")).toBe(mockMetric); // alias works
	});

	test("getOrThrow throws RegistryNotFoundError for unknown metric", () => {
		expect(() => registry.getOrThrow("unknown")).toThrow(RegistryNotFoundError);
	});

	test("throws on duplicate registration", () => {
		const metric: MetricCalculator = {
			name: "dup",
			compute: () => ({ name: "dup", value: 1 }),
		};

		registry.register(metric);
		expect(() => registry.register(metric)).toThrow("already registered");
	});

	test("listMetricNames returns primary names only", () => {
		registry.register({ name: "wer", compute: () => ({ name: "wer", value: 0 }) });
		registry.register({
			name: "bleu",
			aliases: ["corpus_bleu"],
			compute: () => ({ name: "bleu", value: 1 }),
		});

		expect(registry.listMetricNames()).toEqual(["bleu", "wer"]);
	});

	test("compute() runs a single metric over the records", () => {
		registry.register({
			name: "labelled_rate",
			compute: (records) => ({
				name: "labelled_rate",
				value: records.filter((r) => r.label === true).length / records.length,
			}),
		});

		const records: EvalRecord[] = [{ label: true }, { label: false }, { label: true }, { label: true }];

		const result = registry.compute("labelled_rate", records);
		expect(result).toEqual({ name: "labelled_rate", value: 0.75 });
	});

	test("computeAll() keeps request order", () => {
		registry.register({ name: "m1", compute: () => ({ name: "m1", value: 1 }) });
		registry.register({ name: "m2", compute: () => ({ name: "m2", value: 2 }) });

		const results = registry.computeAll(["m2", "m1"], []);
		expect(results.map((r) => r.name)).toEqual(["m2", "m1"]);
	});

	test("computeAll() computes a metric once when requested by name and alias", () => {
		let calls = 0;
		registry.register({
			name: "roc_auc",
			aliases: ["auc"],
			compute: () => {
				calls++;
				return { name: "roc_auc", value: 0.9 };
			},
		});

		const results = registry.computeAll(["roc_auc", "auc"], []);
		expect(results).toHaveLength(1);
		expect(calls).toBe(1);
	});

	test("computeAll() validates every name before computing anything", () => {
		let calls = 0;
		registry.register({
			name: "known",
			compute: () => {
				calls++;
				return { name: "known", value: 1 };
			},
		});

		expect(() => registry.computeAll(["known", "nonexistent"], [])).toThrow(
			'MetricRegistry: "nonexistent" not found. Available: known',
		);
		expect(calls).toBe(0);
	});
});

describe("default registry", () => {
	test("exposes every built-in metric", () => {
		expect(getAvailableMetrics()).toEqual([
			"average_precision",
			"bleu",
			"bleu_1",
			"perplexity",
			"roc_auc",
			"wer",
		]);
	});

	test("is a singleton while createRegistry() is not", () => {
		expect(getDefaultRegistry()).toBe(getDefaultRegistry());
		expect(createRegistry()).not.toBe(createRegistry());
	});

	test("resolves built-in aliases", () => {
		const registry = getDefaultRegistry();
		expect(registry.resolveAlias("auc")).toBe("roc_auc");
		expect(registry.resolveAlias("ppl")).toBe("perplexity");
		expect(registry.resolveAlias("word_error_rate")).toBe("wer");
		expect(registry.resolveAlias("bleu1")).toBe("bleu_1");
	});

	test("computeMetrics() applies options to a fresh registry", () => {
		const records: EvalRecord[] = [{ hypothesis: "a b c d", reference: "a b c e" }];

		const [withDefaults] = computeMetrics(records, ["bleu"]);
		const [bigram] = computeMetrics(records, ["bleu"], { bleu: { maxOrder: 2 } });

		expect(withDefaults?.value).toBe(0);
		expect(bigram?.value).toBeCloseTo(Math.SQRT1_2, 12);
	});
});
