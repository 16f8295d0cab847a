import { rm } from "node:fs/promises";

import type { PipelineConfig } from "../config.js";
import { toError } from "../core/errors.js";
import type { Aggregator, PhraseCounter } from "../core/aggregator.js";
import type { TopKSelector } from "../core/heap.js";
import type { Splitter } from "../core/splitter.js";
import type { IngestReport, SplitDescriptor, TopPhrasesResult } from "../core/types.js";
import type { OutputWriter, WriteResult } from "../core/writer.js";
import {
  DelimiterTokenizer,
  FileOutputWriter,
  FileSplitter,
  LineAggregator,
  MinHeapTopKSelector,
  PhraseCounts,
  SortTopKSelector,
  selectTopPhrases,
  type Ranked,
} from "../core/impl/index.js";
import { logPerformance, pipelineLogger as logger } from "../utils/logger.js";

export interface PipelineDeps {
  splitter: Splitter;
  aggregator: Aggregator;
  selector: TopKSelector<Ranked>;
  writer: OutputWriter;
  createCounts: () => PhraseCounter;
}

export interface RunReport {
  splits: SplitDescriptor[];
  ingests: IngestReport[];
  uniquePhrases: number;
  result: TopPhrasesResult;
  output: WriteResult;
}

export function createPipelineDeps(config: PipelineConfig): PipelineDeps {
  return {
    splitter: new FileSplitter(config.workDir, { bufferSize: config.bufferSize }),
    aggregator: new LineAggregator(new DelimiterTokenizer(config.delimiter)),
    selector: config.strategy === "sort" ? new SortTopKSelector<Ranked>() : new MinHeapTopKSelector<Ranked>(),
    writer: new FileOutputWriter(config.mode),
    createCounts: () => new PhraseCounts(),
  };
}

/**
 * split -> ingest every split into one accumulator -> select top N -> write.
 *
 * Rejects only when splitting fails. Unreadable splits are recorded in
 * `ingests` and an output failure in `output`. Split cleanup runs last and
 * only logs what it could not remove.
 */
export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = createPipelineDeps(config)): Promise<RunReport> {
  const started = Date.now();
  logger.info({ sourcePath: config.sourcePath, splitCount: config.splitCount, limit: config.limit }, "run started");

  const splits = await deps.splitter.split(config.sourcePath, config.splitCount, { bufferSize: config.bufferSize });

  const counts = deps.createCounts();
  const ingests: IngestReport[] = [];
  for (const split of splits) {
    ingests.push(await deps.aggregator.ingestFile(split.path, counts));
  }

  const skipped = ingests.filter((r) => r.skipped).length;
  if (skipped > 0) {
    logger.warn({ skipped, total: ingests.length }, "some splits were skipped");
  }

  const result = selectTopPhrases(counts, config.limit, deps.selector);
  const output = await deps.writer.write(result, config.outputPath);

  if (!config.keepSplits) await removeSplits(splits);

  logPerformance(logger, "run", started, {
    splits: splits.length,
    skipped,
    uniquePhrases: counts.size,
    returned: result.length,
    outputOk: output.ok,
  });

  return { splits, ingests, uniquePhrases: counts.size, result, output };
}

async function removeSplits(splits: SplitDescriptor[]): Promise<void> {
  let removed = 0;
  for (const split of splits) {
    try {
      await rm(split.path, { force: true });
      removed++;
    } catch (e) {
      logger.warn({ err: toError(e), path: split.path }, "split file not removed");
    }
  }
  logger.debug({ removed, total: splits.length }, "split files removed");
}
