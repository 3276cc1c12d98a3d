/**
 * Evaluation record loader for JSON / JSONL files.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { glob } from "glob";
import { EvalRecordSchema, formatZodIssues, type EvalRecord } from "../config.ts";
import { InvalidInputError } from "../errors.ts";

export type RecordFormat = "json" | "jsonl";

/**
 * Infer the format from a file extension (.jsonl / .ndjson are JSONL).
 */
export function detectFormat(path: string): RecordFormat {
	const ext = extname(path).toLowerCase();
	return ext === ".jsonl" || ext === ".ndjson" ? "jsonl" : "json";
}

function validateRecord(raw: unknown, position: string, source: string): EvalRecord {
	const parsed = EvalRecordSchema.safeParse(raw);
	if (!parsed.success) {
		throw new InvalidInputError(
			`Invalid record at ${position} in ${source}:\n${formatZodIssues(parsed.error)}`,
		);
	}
	return parsed.data;
}

function parseJson(text: string, where: string): unknown {
	try {
		return JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidInputError(`Failed to parse JSON ${where}: ${reason}`);
	}
}

/**
 * Parse file contents into validated records.
 * JSON must be an array of records; JSONL is one record per non-blank line.
 */
export function parseRecords(content: string, format: RecordFormat, source = "<inline>"): EvalRecord[] {
	if (format === "jsonl") {
		const records: EvalRecord[] = [];
		content.split("\n").forEach((line, index) => {
			if (!line.trim()) return;
			const raw = parseJson(line, `on line ${index + 1} of ${source}`);
			records.push(validateRecord(raw, `line ${index + 1}`, source));
		});
		return records;
	}

	const data = parseJson(content, `in ${source}`);
	if (!Array.isArray(data)) {
		throw new InvalidInputError(`Expected an array of records in ${source}, got ${typeof data}`);
	}
	return data.map((raw, index) => validateRecord(raw, `index ${index}`, source));
}

/**
 * Load one file.
 */
export async function loadRecordsFile(path: string): Promise<EvalRecord[]> {
	let content: string;
	try {
		content = await readFile(path, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new Error(`Record file not readable: ${path} (${reason})`);
	}
	return parseRecords(content, detectFormat(path), path);
}

/**
 * Expand glob patterns and load every matching file, in sorted path order.
 * @throws Error when a pattern matches nothing
 */
export async function loadRecords(patterns: string[]): Promise<EvalRecord[]> {
	const files = new Set<string>();
	for (const pattern of patterns) {
		const matches = await glob(pattern, { nodir: true });
		if (matches.length === 0) {
			throw new Error(`No record files match: ${pattern}`);
		}
		for (const match of matches) files.add(match);
	}

	const records: EvalRecord[] = [];
	for (const file of Array.from(files).sort()) {
		records.push(...(await loadRecordsFile(file)));
	}
	return records;
}
