import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidInputError } from "../errors.ts";
import { detectFormat, loadRecords, loadRecordsFile, parseRecords } from "./records.ts";

describe("detectFormat", () => {
	it("treats .jsonl and .ndjson as line-delimited", () => {
		expect(detectFormat("runs/asr.jsonl")).toBe("jsonl");
		expect(detectFormat("runs/asr.NDJSON")).toBe("jsonl");
		expect(detectFormat("runs/asr.json")).toBe("json");
	});
});

describe("parseRecords", () => {
	it("parses one record per non-blank line", () => {
		const content = '{"id":"a","score":0.4,"label":1}\n\n{"id":"b","score":0.1,"label":0}\n';
		expect(parseRecords(content, "jsonl")).toEqual([
			{ id: "a", score: 0.4, label: 1 },
			{ id: "b", score: 0.1, label: 0 },
		]);
	});

	it("parses a JSON array", () => {
		const content = JSON.stringify([{ hypothesis: ["a", 1], reference: "a one" }]);
		expect(parseRecords(content, "json")).toEqual([{ hypothesis: ["a", 1], reference: "a one" }]);
	});

	it("reports the line of an invalid record", () => {
		const content = '{"score":0.4}\n{"score":"high"}\n';
		expect(() => parseRecords(content, "jsonl", "scores.jsonl")).toThrow(
			"Invalid record at line 2 in scores.jsonl:\n  - score: ",
		);
	});

	it("reports malformed JSON", () => {
		expect(() => parseRecords("{not json}\n", "jsonl")).toThrow(
			"Failed to parse JSON on line 1 of <inline>",
		);
		expect(() => parseRecords("[", "json")).toThrow(InvalidInputError);
	});

	it("requires a top-level array for JSON files", () => {
		expect(() => parseRecords('{"id":"a"}', "json")).toThrow(
			"Expected an array of records in <inline>, got object",
		);
	});
});

describe("loading files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "seqmetrics-records-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("loads a single file by extension", async () => {
		const path = join(dir, "lm.jsonl");
		await writeFile(path, '{"tokenProbabilities":[0.5,0.25]}\n');
		expect(await loadRecordsFile(path)).toEqual([{ tokenProbabilities: [0.5, 0.25] }]);
	});

	it("expands globs and concatenates files in path order", async () => {
		await writeFile(join(dir, "b.json"), JSON.stringify([{ id: "b1" }]));
		await writeFile(join(dir, "a.jsonl"), '{"id":"a1"}\n{"id":"a2"}\n');

		const records = await loadRecords([join(dir, "*.json*")]);
		expect(records.map((r) => r.id)).toEqual(["a1", "a2", "b1"]);
	});

	it("loads a file matched by two patterns once", async () => {
		await writeFile(join(dir, "a.jsonl"), '{"id":"a1"}\n');
		const records = await loadRecords([join(dir, "a.jsonl"), join(dir, "*.jsonl")]);
		expect(records).toHaveLength(1);
	});

	it("fails when a pattern matches nothing", async () => {
		const pattern = join(dir, "*.csv");
		await expect(loadRecords([pattern])).rejects.toThrow(`No record files match: ${pattern}`);
	});
});
