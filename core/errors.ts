/**
 * Error taxonomy for metric computation.
 *
 * Every failure raised by the algorithms is a MetricError subclass so callers
 * can branch on `code` (or `instanceof`) without parsing messages.
 */

export type MetricErrorCode =
	| "INVALID_INPUT"
	| "DEGENERATE_DATASET"
	| "INVALID_PROBABILITY";

/**
 * Base class for all metric failures.
 */
export class MetricError extends Error {
	constructor(
		message: string,
		public readonly code: MetricErrorCode,
	) {
		super(message);
		this.name = "MetricError";
	}
}

/**
 * Empty required sequence, mismatched lengths, zero-length normalizer or an
 * option outside its domain.
 */
export class InvalidInputError extends MetricError {
	constructor(message: string) {
		super(message, "INVALID_INPUT");
		this.name = "InvalidInputError";
	}
}

/**
 * The dataset is well-formed but the metric is undefined on it.
 */
export class DegenerateDatasetError extends MetricError {
	constructor(message: string) {
		super(message, "DEGENERATE_DATASET");
		this.name = "DegenerateDatasetError";
	}
}

/**
 * A ranking curve was requested over labels of a single class.
 */
export class UndefinedCurveError extends DegenerateDatasetError {
	constructor(
		public readonly totalPositives: number,
		public readonly totalNegatives: number,
	) {
		super(
			`Ranking curve is undefined: need at least one positive and one negative label (positives=${totalPositives}, negatives=${totalNegatives})`,
		);
		this.name = "UndefinedCurveError";
	}
}

/**
 * A probability model returned a value outside (0, 1].
 */
export class InvalidProbabilityError extends MetricError {
	constructor(
		public readonly position: number,
		public readonly value: number,
	) {
		super(
			`Probability at position ${position} must be in (0, 1], got ${value}`,
			"INVALID_PROBABILITY",
		);
		this.name = "InvalidProbabilityError";
	}
}

/**
 * Configuration file failed to parse or validate.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly filePath?: string,
	) {
		super(message);
		this.name = "ConfigError";
	}
}
