import type { Phrase } from "./types.js";

export interface TokenizeOptions {
  /** Literal single-character separator. */
  delimiter?: string;
}

/**
 * Turns one line of input into the phrases it contains.
 *
 * Contract notes:
 * - must be deterministic for given input+options
 * - never yields an empty phrase; a line with none yields nothing
 * - no trimming, quoting or escaping
 */
export interface Tokenizer {
  tokenize(line: string, options?: TokenizeOptions): Iterable<Phrase>;
}
