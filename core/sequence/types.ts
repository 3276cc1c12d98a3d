/**
 * Shared sequence types.
 */

/**
 * An opaque token compared by strict equality.
 */
export type Token = string | number;

export type TokenSequence<T extends Token = Token> = readonly T[];

/**
 * Equally valid gold outputs for one input.
 */
export type ReferenceSet<T extends Token = Token> = readonly TokenSequence<T>[];
