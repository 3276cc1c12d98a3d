/**
 * Threshold-sweep ranking curves: ROC, Precision-Recall, ROC AUC and
 * Average Precision.
 *
 * Pairs are sorted by descending score and every group of tied scores is
 * consumed at once, so the curve does not depend on input order. One point is
 * emitted per distinct score, using the counts after the whole tie group.
 */

import type { BinaryLabel } from "../config.ts";
import { InvalidInputError, UndefinedCurveError } from "../errors.ts";

export interface ScoredLabel {
	score: number;
	label: BinaryLabel;
}

/**
 * Curve point in display order. ROC: x = FPR, y = TPR. PR: x = recall, y = precision.
 */
export interface CurvePoint {
	x: number;
	y: number;
	threshold: number;
}

export interface SweepStep {
	threshold: number;
	truePositives: number;
	falsePositives: number;
}

export interface SweepResult {
	steps: SweepStep[];
	totalPositives: number;
	totalNegatives: number;
}

function isPositive(label: BinaryLabel): boolean {
	return label === true || label === 1;
}

/**
 * Pair parallel score and label arrays.
 * @throws InvalidInputError when the arrays are empty or differ in length
 */
export function zipScoresAndLabels(
	scores: readonly number[],
	labels: readonly BinaryLabel[],
): ScoredLabel[] {
	if (scores.length === 0 && labels.length === 0) {
		throw new InvalidInputError("Cannot pair scores and labels: both arrays are empty");
	}
	if (scores.length !== labels.length) {
		throw new InvalidInputError(
			`Scores and labels must have the same length (scores=${scores.length}, labels=${labels.length})`,
		);
	}
	return scores.map((score, i) => ({ score, label: labels[i] ?? false }));
}

/**
 * Sort, group ties and accumulate TP/FP counts per distinct score.
 * @throws InvalidInputError on empty input or a non-finite score
 * @throws UndefinedCurveError when all labels belong to one class
 */
export function thresholdSweep(pairs: readonly ScoredLabel[]): SweepResult {
	if (pairs.length === 0) {
		throw new InvalidInputError("Cannot build a ranking curve from an empty dataset");
	}

	let totalPositives = 0;
	pairs.forEach((pair, index) => {
		if (!Number.isFinite(pair.score)) {
			throw new InvalidInputError(`Score at index ${index} is not a finite number: ${pair.score}`);
		}
		if (isPositive(pair.label)) totalPositives++;
	});
	const totalNegatives = pairs.length - totalPositives;

	if (totalPositives === 0 || totalNegatives === 0) {
		throw new UndefinedCurveError(totalPositives, totalNegatives);
	}

	const sorted = [...pairs].sort((a, b) => b.score - a.score);
	const steps: SweepStep[] = [];
	let tp = 0;
	let fp = 0;

	for (let i = 0; i < sorted.length; ) {
		const threshold = sorted[i]?.score ?? 0;
		while (i < sorted.length && sorted[i]?.score === threshold) {
			const pair = sorted[i];
			if (pair && isPositive(pair.label)) tp++;
			else fp++;
			i++;
		}
		steps.push({ threshold, truePositives: tp, falsePositives: fp });
	}

	return { steps, totalPositives, totalNegatives };
}

/**
 * ROC points (FPR, TPR), one per distinct score.
 */
export function rocCurve(pairs: readonly ScoredLabel[]): CurvePoint[] {
	const { steps, totalPositives, totalNegatives } = thresholdSweep(pairs);
	return steps.map((step) => ({
		x: step.falsePositives / totalNegatives,
		y: step.truePositives / totalPositives,
		threshold: step.threshold,
	}));
}

/**
 * Area under a polyline by the trapezoidal rule.
 */
export function trapezoidalArea(points: readonly { x: number; y: number }[]): number {
	let area = 0;
	for (let i = 1; i < points.length; i++) {
		const prev = points[i - 1];
		const curr = points[i];
		if (!prev || !curr) continue;
		area += ((curr.x - prev.x) * (curr.y + prev.y)) / 2;
	}
	return area;
}

/**
 * ROC AUC by trapezoidal integration over (0,0), the curve, (1,1).
 */
export function rocAuc(pairs: readonly ScoredLabel[]): number {
	const points = rocCurve(pairs);
	return trapezoidalArea([{ x: 0, y: 0 }, ...points, { x: 1, y: 1 }]);
}

/**
 * Precision-Recall points (recall, precision), one per distinct score.
 */
export function precisionRecallCurve(pairs: readonly ScoredLabel[]): CurvePoint[] {
	const { steps, totalPositives } = thresholdSweep(pairs);
	return steps.map((step) => ({
		x: step.truePositives / totalPositives,
		y: step.truePositives / (step.truePositives + step.falsePositives),
		threshold: step.threshold,
	}));
}

/**
 * Average Precision: sum of precision times recall increase at each step.
 * Step integration; precision is never interpolated between points.
 */
export function averagePrecision(pairs: readonly ScoredLabel[]): number {
	let ap = 0;
	let prevRecall = 0;
	for (const point of precisionRecallCurve(pairs)) {
		ap += (point.x - prevRecall) * point.y;
		prevRecall = point.x;
	}
	return ap;
}
