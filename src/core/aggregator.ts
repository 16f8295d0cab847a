import type { Readable } from "node:stream";

import type { IngestReport, Phrase, PhraseCount } from "./types.js";

/**
 * Phrase -> count accumulator shared by every ingest call of a run.
 * Iteration follows first-insertion order.
 */
export interface PhraseCounter extends Iterable<PhraseCount> {
  readonly size: number;
  increment(phrase: Phrase, by?: number): number;
  get(phrase: Phrase): number;
  merge(other: PhraseCounter): this;
}

export interface Aggregator {
  /** Counts every phrase of `input` into `counts`. Stream errors reject. */
  ingest(input: Readable, counts: PhraseCounter, source?: string): Promise<IngestReport>;
  /** Like ingest, but all-or-nothing: a failing input adds nothing and is reported as skipped. */
  ingestOrSkip(input: Readable, counts: PhraseCounter, source?: string): Promise<IngestReport>;
  /** ingestOrSkip over a file; a file that cannot be opened is skipped too. */
  ingestFile(path: string, counts: PhraseCounter): Promise<IngestReport>;
}
