import type { Phrase, PhraseCount } from "../types.js";
import type { PhraseCounter } from "../aggregator.js";

/**
 * In-memory accumulator backed by a Map, so iteration is first-insertion order.
 *
 * Holds every unique phrase of the run at once; nothing here bounds memory.
 */
export class PhraseCounts implements PhraseCounter {
  private readonly counts = new Map<Phrase, number>();

  get size(): number {
    return this.counts.size;
  }

  increment(phrase: Phrase, by: number = 1): number {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`increment must be a non-negative integer, got ${by}`);
    }
    const next = (this.counts.get(phrase) ?? 0) + by;
    this.counts.set(phrase, next);
    return next;
  }

  get(phrase: Phrase): number {
    return this.counts.get(phrase) ?? 0;
  }

  /** Sums `other` into this accumulator; phrases new to it are appended in `other`'s order. */
  merge(other: PhraseCounter): this {
    for (const { phrase, count } of other) this.increment(phrase, count);
    return this;
  }

  toMap(): Map<Phrase, number> {
    return new Map(this.counts);
  }

  *[Symbol.iterator](): Iterator<PhraseCount> {
    for (const [phrase, count] of this.counts) yield { phrase, count };
  }
}
