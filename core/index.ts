/**
 * seqmetrics library entry point.
 */

export * from "./errors.ts";
export * from "./config.ts";
export * from "./config-loader.ts";

// Algorithms
export * from "./sequence/types.ts";
export * from "./sequence/edit-distance.ts";
export * from "./sequence/word-error-rate.ts";
export * from "./sequence/ngram.ts";
export * from "./sequence/bleu.ts";
export * from "./sequence/perplexity.ts";
export * from "./ranking/curves.ts";

// Registry and calculators
export * from "./registry/index.ts";
export * from "./metrics/index.ts";
export * from "./loaders/records.ts";
