import { open, type FileHandle } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { IngestError, toError } from "../errors.js";
import type { Aggregator, PhraseCounter } from "../aggregator.js";
import type { Tokenizer } from "../tokenizer.js";
import type { IngestReport } from "../types.js";
import { aggregatorLogger as logger } from "../../utils/logger.js";
import { PhraseCounts } from "./phraseCounts.js";

/**
 * Reads newline-delimited text (`\n` or `\r\n`) and counts every phrase the
 * tokenizer yields into the shared accumulator.
 *
 * `ingestFile` and `ingestOrSkip` count into their own partial and merge it only
 * once the whole input was read, so an input that fails midway contributes nothing.
 */
export class LineAggregator implements Aggregator {
  constructor(
    private readonly tokenizer: Tokenizer,
    private readonly createPartial: () => PhraseCounter = () => new PhraseCounts(),
  ) {}

  async ingest(input: Readable, counts: PhraseCounter, source: string = "<stream>"): Promise<IngestReport> {
    const rl = createInterface({ input, crlfDelay: Infinity });
    let lines = 0;
    let phrases = 0;

    try {
      for await (const line of rl) {
        lines++;
        for (const phrase of this.tokenizer.tokenize(line)) {
          counts.increment(phrase);
          phrases++;
        }
      }
    } finally {
      rl.close();
    }

    return { path: source, lines, phrases, skipped: false };
  }

  async ingestFile(path: string, counts: PhraseCounter): Promise<IngestReport> {
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (e) {
      return this.skip(path, e);
    }

    try {
      return await this.ingestOrSkip(handle.createReadStream({ encoding: "utf8", autoClose: false }), counts, path);
    } finally {
      await handle.close();
    }
  }

  /**
   * Counts `input` into a fresh partial and merges it into `counts` only when
   * the whole input was read. A failing input is reported as skipped.
   */
  async ingestOrSkip(input: Readable, counts: PhraseCounter, source: string = "<stream>"): Promise<IngestReport> {
    const partial = this.createPartial();
    let report: IngestReport;
    try {
      report = await this.ingest(input, partial, source);
    } catch (e) {
      return this.skip(source, e);
    }

    counts.merge(partial);
    logger.debug({ path: source, lines: report.lines, phrases: report.phrases, unique: partial.size }, "split ingested");
    return report;
  }

  private skip(path: string, cause: unknown): IngestReport {
    const error = new IngestError(path, { cause: toError(cause) });
    logger.warn({ err: error, path }, "split skipped");
    return { path, lines: 0, phrases: 0, skipped: true, error };
  }
}
