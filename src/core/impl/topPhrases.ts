import type { PhraseCounter } from "../aggregator.js";
import type { TopKSelector } from "../heap.js";
import type { PhraseCount, TopPhrasesResult } from "../types.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";

export const DEFAULT_LIMIT = 100_000;

export interface Ranked extends PhraseCount {
  /** first-occurrence position in the accumulator */
  order: number;
}

/** Count descending, then earliest first occurrence. Total, so any selector yields the same output. */
export function compareRanked(a: Ranked, b: Ranked): number {
  return b.count - a.count || a.order - b.order;
}

function* ranked(counts: PhraseCounter): Iterable<Ranked> {
  let order = 0;
  for (const { phrase, count } of counts) yield { phrase, count, order: order++ };
}

/**
 * Returns the `limit` most frequent phrases, count descending.
 * Equal counts keep first-inserted-first order.
 */
export function selectTopPhrases(
  counts: PhraseCounter,
  limit: number = DEFAULT_LIMIT,
  selector: TopKSelector<Ranked> = new MinHeapTopKSelector<Ranked>(),
): TopPhrasesResult {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }

  const top = selector.topK(ranked(counts), limit, compareRanked);
  return Object.freeze(top.map(({ phrase, count }) => Object.freeze({ phrase, count })));
}
