/**
 * Core configuration schemas for seqmetrics.
 * Defines Zod schemas for evaluation records, metric options and the YAML run config.
 */

import { z, type ZodError } from "zod";

// ============================================================================
// Evaluation Record Schema
// ============================================================================

export const TokenSchema = z.union([z.string(), z.number()]);

/**
 * A sequence is either raw text (tokenized by the configured tokenizer)
 * or an already-tokenized array.
 */
export const SequenceInputSchema = z.union([z.string(), z.array(TokenSchema)]);

export const BinaryLabelSchema = z.union([z.boolean(), z.literal(0), z.literal(1)]);

export const EvalRecordSchema = z.object({
	id: z.string().optional(),

	// Sequence generation (WER, BLEU)
	hypothesis: SequenceInputSchema.optional(),
	reference: SequenceInputSchema.optional(),
	references: z.array(SequenceInputSchema).optional(),

	// Ranking (ROC AUC, average precision)
	score: z.number().optional(),
	label: BinaryLabelSchema.optional(),

	// Language modelling (perplexity)
	tokenProbabilities: z.array(z.number()).optional(),

	metadata: z.record(z.string(), z.unknown()).optional(),
});

export type EvalRecord = z.infer<typeof EvalRecordSchema>;
export type SequenceInput = z.infer<typeof SequenceInputSchema>;
export type BinaryLabel = z.infer<typeof BinaryLabelSchema>;

// ============================================================================
// Metric Option Schemas
// ============================================================================

export const SmoothingSchema = z.enum(["none", "epsilon-floor"]);
export type Smoothing = z.infer<typeof SmoothingSchema>;

export const BleuOptionsSchema = z
	.object({
		maxOrder: z.number().int().positive().default(4),
		weights: z.array(z.number().nonnegative()).optional(),
		smoothing: SmoothingSchema.default("none"),
		epsilon: z.number().gt(0).lt(1).default(0.1),
	})
	.refine((o) => o.weights === undefined || o.weights.length === o.maxOrder, {
		message: "weights must have exactly one entry per n-gram order",
		path: ["weights"],
	})
	.refine((o) => o.weights === undefined || o.weights.some((w) => w > 0), {
		message: "at least one weight must be positive",
		path: ["weights"],
	});

/** Options as callers write them (every field optional). */
export type BleuOptions = z.input<typeof BleuOptionsSchema>;

export const TokenizerSchema = z.enum(["normalized", "whitespace"]);
export type TokenizerName = z.infer<typeof TokenizerSchema>;

// ============================================================================
// Run Configuration Schema (seqmetrics.yaml)
// ============================================================================

export const RunConfigSchema = z.object({
	metrics: z.array(z.string()).optional(),
	tokenizer: TokenizerSchema.default("normalized"),
	bleu: BleuOptionsSchema.optional(),
	format: z.enum(["table", "json"]).default("table"),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Options shared by the built-in metric calculators.
 */
export interface MetricOptions {
	tokenizer?: TokenizerName;
	bleu?: BleuOptions;
}

/**
 * Render Zod issues as indented "path: message" lines.
 */
export function formatZodIssues(error: ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.join(".");
			return `  - ${path ? `${path}: ` : ""}${issue.message}`;
		})
		.join("\n");
}
