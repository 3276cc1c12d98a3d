/**
 * CLI commands. Each returns the text to print so it can be tested without a
 * terminal.
 */

import {
	RunConfigSchema,
	SmoothingSchema,
	TokenizerSchema,
	formatZodIssues,
	type BleuOptions,
	type EvalRecord,
	type MetricOptions,
	type RunConfig,
	type TokenizerName,
} from "../core/config.ts";
import { findRunConfig, loadRunConfig } from "../core/config-loader.ts";
import { ConfigError } from "../core/errors.ts";
import { loadRecords } from "../core/loaders/records.ts";
import { createRegistry, getDefaultRegistry, toScoredLabels } from "../core/metrics/index.ts";
import {
	averagePrecision,
	precisionRecallCurve,
	rocAuc,
	rocCurve,
} from "../core/ranking/curves.ts";
import { toSingleString, toStringArray, type OptionValue } from "./args.ts";
import { renderCurveTable, renderResultsTable } from "./table.ts";

type Options = Record<string, OptionValue>;

/**
 * Pick metrics from the fields present on the first record.
 */
export function inferMetrics(records: EvalRecord[]): string[] {
	const first = records[0];
	if (!first) return [];

	const metrics: string[] = [];
	if (first.hypothesis !== undefined && first.reference !== undefined) {
		metrics.push("wer");
	}
	if (first.hypothesis !== undefined && (first.references !== undefined || first.reference !== undefined)) {
		metrics.push("bleu");
	}
	if (first.tokenProbabilities !== undefined) {
		metrics.push("perplexity");
	}
	if (first.score !== undefined && first.label !== undefined) {
		metrics.push("roc_auc", "average_precision");
	}
	return metrics;
}

export interface RunSettings {
	metrics?: string[];
	format: RunConfig["format"];
	metricOptions: MetricOptions;
}

/**
 * Config file (explicit --config, else seqmetrics.yaml in the working
 * directory, else defaults) with command line overrides applied.
 */
export async function resolveRunSettings(options: Options): Promise<RunSettings> {
	const explicitPath = toSingleString(options.config);
	const configPath = explicitPath ?? (await findRunConfig("."));
	const config = configPath ? await loadRunConfig(configPath) : RunConfigSchema.parse({});

	let tokenizer: TokenizerName = config.tokenizer;
	const bleu: BleuOptions = { ...config.bleu };

	const tokenizerFlag = toSingleString(options.tokenizer);
	if (tokenizerFlag !== undefined) {
		const parsed = TokenizerSchema.safeParse(tokenizerFlag);
		if (!parsed.success) {
			throw new ConfigError(`Invalid --tokenizer:\n${formatZodIssues(parsed.error)}`);
		}
		tokenizer = parsed.data;
	}

	const smoothingFlag = toSingleString(options.smoothing);
	if (smoothingFlag !== undefined) {
		const parsed = SmoothingSchema.safeParse(smoothingFlag);
		if (!parsed.success) {
			throw new ConfigError(`Invalid --smoothing:\n${formatZodIssues(parsed.error)}`);
		}
		bleu.smoothing = parsed.data;
	}

	const maxOrderFlag = toSingleString(options["max-order"]);
	if (maxOrderFlag !== undefined) {
		const order = Number(maxOrderFlag);
		if (!Number.isInteger(order) || order < 1) {
			throw new ConfigError(`Invalid --max-order: expected a positive integer, got "${maxOrderFlag}"`);
		}
		// Weights written for another order no longer apply.
		bleu.maxOrder = order;
		bleu.weights = undefined;
	}

	let format = config.format;
	const formatFlag = toSingleString(options.format);
	if (formatFlag === "table" || formatFlag === "json") {
		format = formatFlag;
	} else if (formatFlag !== undefined) {
		throw new ConfigError(`Invalid --format "${formatFlag}": expected table or json`);
	}

	return {
		metrics: toStringArray(options.metrics) ?? config.metrics,
		format,
		metricOptions: { tokenizer, bleu },
	};
}

function requireInput(options: Options): string[] {
	const input = toStringArray(options.input) ?? toStringArray(options.i);
	if (!input) {
		throw new ConfigError("Please specify record files with --input <file|glob>");
	}
	return input;
}

/**
 * `eval`: compute metrics over record files.
 */
export async function evalCommand(options: Options): Promise<string> {
	const settings = await resolveRunSettings(options);
	const records = await loadRecords(requireInput(options));

	const metricNames = settings.metrics ?? inferMetrics(records);
	if (metricNames.length === 0) {
		throw new ConfigError("No metrics requested and none could be inferred from the records");
	}

	const results = createRegistry(settings.metricOptions).computeAll(metricNames, records);

	if (settings.format === "json") {
		return JSON.stringify({ records: records.length, results }, null, 2);
	}
	return renderResultsTable(results, records.length);
}

/**
 * `curve`: ROC or PR points with the area under them.
 * Output format follows --format, then the config file.
 */
export async function curveCommand(options: Options): Promise<string> {
	const kind = toSingleString(options.kind) ?? "roc";
	if (kind !== "roc" && kind !== "pr") {
		throw new ConfigError(`Invalid --kind "${kind}": expected roc or pr`);
	}
	const { format } = await resolveRunSettings(options);

	const records = await loadRecords(requireInput(options));
	const pairs = toScoredLabels(records, `${kind} curve`);
	const points = kind === "roc" ? rocCurve(pairs) : precisionRecallCurve(pairs);
	const area = kind === "roc" ? rocAuc(pairs) : averagePrecision(pairs);

	if (format === "json") {
		return JSON.stringify({ kind, area, points }, null, 2);
	}
	return renderCurveTable(kind, points, area);
}

/**
 * `list`: registered metrics with aliases.
 */
export function listCommand(): string {
	const lines = ["", "📊 Metrics:", "─".repeat(60)];
	for (const metric of getDefaultRegistry().listCalculators()) {
		const aliases = metric.aliases?.length ? ` [${metric.aliases.join(", ")}]` : "";
		lines.push(`  ${metric.name.padEnd(22)}${aliases}`);
		if (metric.description) {
			lines.push(`  ${"".padEnd(22)}${metric.description}`);
		}
	}
	lines.push("");
	return lines.join("\n");
}

export const HELP_TEXT = `
╭─────────────────────────────────────────────────────────────────╮
│                          SEQMETRICS                             │
│     Sequence and ranking evaluation metrics from the terminal    │
╰─────────────────────────────────────────────────────────────────╯

Usage:
  seqmetrics <command> [options]

Commands:
  list              List available metrics
  eval              Compute metrics over record files
  curve             Print a ROC or precision-recall curve
  help              Show this help message

Options:
  --input <file|glob>...   JSON (array) or JSONL record files
  --metrics <name>...      Metric names or aliases (default: inferred from records)
  --config <path>          YAML run config (default: ./seqmetrics.yaml if present)
  --tokenizer <name>       normalized | whitespace
  --max-order <n>          BLEU n-gram order
  --smoothing <mode>       none | epsilon-floor
  --kind <roc|pr>          Curve type for 'curve'
  --format <table|json>    Output format

Examples:
  seqmetrics eval --input transcripts.jsonl --metrics wer
  seqmetrics eval --input "runs/*.jsonl" --metrics bleu bleu_1 --smoothing epsilon-floor
  seqmetrics curve --input scores.json --kind pr
`;
