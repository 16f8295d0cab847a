/** Shared core types used by module contracts. */

export type Phrase = string;

/** One (phrase, count) pair as it appears in a result. */
export interface PhraseCount {
  phrase: Phrase;
  count: number;
}

/**
 * One contiguous byte range of the source file, materialized as its own file.
 * `index` is 1-based and matches the file name (`split.<index>.txt`).
 */
export interface SplitDescriptor {
  index: number;
  offset: number;
  length: number;
  path: string;
}

/** Ordered by count descending, ties by first occurrence. */
export type TopPhrasesResult = readonly PhraseCount[];

export interface IngestReport {
  path: string;
  lines: number;
  /** non-empty tokens counted from this input */
  phrases: number;
  skipped: boolean;
  error?: Error;
}
