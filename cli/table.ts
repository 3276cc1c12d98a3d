/**
 * Console rendering for metric results and ranking curves.
 * Every function returns the text; the caller decides where it goes.
 */

import type { CurvePoint } from "../core/ranking/curves.ts";
import type { MetricResult } from "../core/metrics/interface.ts";

/**
 * Format a metric value for display.
 * Rates are shown as percentages; perplexity and unknown metrics as decimals.
 */
export function formatMetricValue(name: string, value: number): string {
	if (/perplexity|ppl/i.test(name)) {
		return value.toFixed(3);
	}
	if (/wer|bleu|auc|precision/i.test(name)) {
		return `${(value * 100).toFixed(2)}%`;
	}
	return value.toFixed(4);
}

function boxed(title: string, header: string, rows: string[]): string {
	const width = Math.max(header.length, title.length, ...rows.map((r) => r.length)) + 2;
	const rule = "─".repeat(width);
	const line = (content: string): string => `│ ${content.padEnd(width - 1)}│`;

	return [
		`╭${rule}╮`,
		line(title),
		`├${rule}┤`,
		line(header),
		`├${rule}┤`,
		...rows.map(line),
		`╰${rule}╯`,
	].join("\n");
}

/**
 * One row per metric: name, formatted value, raw value.
 */
export function renderResultsTable(results: MetricResult[], recordCount: number): string {
	const nameCol = Math.max(20, ...results.map((r) => r.name.length));
	const valueCol = 12;

	const header = [
		"Metric".padEnd(nameCol),
		"Value".padStart(valueCol),
		"Raw".padStart(valueCol),
	].join(" │ ");

	const rows = results.map((r) =>
		[
			r.name.padEnd(nameCol),
			formatMetricValue(r.name, r.value).padStart(valueCol),
			r.value.toFixed(6).padStart(valueCol),
		].join(" │ "),
	);

	return boxed(`RESULTS (${recordCount} records)`, header, rows);
}

/**
 * Curve points in display order plus the area under them.
 */
export function renderCurveTable(
	kind: "roc" | "pr",
	points: CurvePoint[],
	area: number,
): string {
	const [xLabel, yLabel, areaLabel] = kind === "roc"
		? ["FPR", "TPR", "ROC AUC"]
		: ["Recall", "Precision", "Average precision"];
	const col = 12;

	const header = ["Threshold".padStart(col), xLabel.padStart(col), yLabel.padStart(col)].join(" │ ");
	const rows = points.map((p) =>
		[
			p.threshold.toFixed(4).padStart(col),
			p.x.toFixed(4).padStart(col),
			p.y.toFixed(4).padStart(col),
		].join(" │ "),
	);

	return `${boxed(`${kind.toUpperCase()} CURVE (${points.length} points)`, header, rows)}\n${areaLabel}: ${area.toFixed(6)}`;
}
