import { mkdir, open, type FileHandle } from "node:fs/promises";
import path from "node:path";

import { SplitError } from "../errors.js";
import type { SplitOptions, Splitter } from "../splitter.js";
import type { SplitDescriptor } from "../types.js";
import { logPerformance, splitterLogger as logger } from "../../utils/logger.js";

/** Transfer buffer size (8 KiB). */
export const DEFAULT_BUFFER_SIZE = 8 * 1024;

export function splitFileName(index: number): string {
  return `split.${index}.txt`;
}

/**
 * Byte-range plan for a source of `size` bytes cut into `splitCount` parts.
 * The remainder of the integer division becomes one extra trailing part.
 */
export function planSplits(size: number, splitCount: number): Array<Omit<SplitDescriptor, "path">> {
  const bytesPerSplit = Math.floor(size / splitCount);
  const remainder = size % splitCount;

  const plan: Array<Omit<SplitDescriptor, "path">> = [];
  for (let i = 0; i < splitCount; i++) {
    plan.push({ index: i + 1, offset: i * bytesPerSplit, length: bytesPerSplit });
  }
  if (remainder > 0) {
    plan.push({ index: splitCount + 1, offset: splitCount * bytesPerSplit, length: remainder });
  }
  return plan;
}

/**
 * Copies each byte range into `<workDir>/split.<index>.txt` through one
 * reusable buffer, so memory stays at `bufferSize` whatever the split size.
 */
export class FileSplitter implements Splitter {
  constructor(
    private readonly workDir: string,
    private readonly defaults: SplitOptions = {},
  ) {}

  async split(sourcePath: string, splitCount: number, options?: SplitOptions): Promise<SplitDescriptor[]> {
    const bufferSize = options?.bufferSize ?? this.defaults.bufferSize ?? DEFAULT_BUFFER_SIZE;
    if (!Number.isInteger(splitCount) || splitCount < 1) {
      throw new SplitError(`split count must be a positive integer, got ${splitCount}`);
    }
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new SplitError(`buffer size must be a positive integer, got ${bufferSize}`);
    }

    const started = Date.now();
    let source: FileHandle;
    try {
      source = await open(sourcePath, "r");
    } catch (e) {
      throw new SplitError(`cannot open source ${sourcePath}`, { cause: e });
    }

    try {
      await mkdir(this.workDir, { recursive: true });
      const { size } = await source.stat();
      const buffer = Buffer.alloc(bufferSize);
      const splits: SplitDescriptor[] = [];

      for (const part of planSplits(size, splitCount)) {
        const target = path.join(this.workDir, splitFileName(part.index));
        await copyRange(source, target, part.offset, part.length, buffer);
        splits.push({ ...part, path: target });
        logger.debug({ ...part, target }, "split written");
      }

      logPerformance(logger, "split", started, { sourcePath, size, splits: splits.length, bufferSize });
      return splits;
    } catch (e) {
      if (e instanceof SplitError) throw e;
      throw new SplitError(`splitting ${sourcePath} failed`, { cause: e });
    } finally {
      await source.close();
    }
  }
}

async function copyRange(
  source: FileHandle,
  targetPath: string,
  offset: number,
  length: number,
  buffer: Buffer,
): Promise<void> {
  const target = await open(targetPath, "w");
  try {
    let copied = 0;
    while (copied < length) {
      const want = Math.min(buffer.length, length - copied);
      const { bytesRead } = await source.read(buffer, 0, want, offset + copied);
      if (bytesRead === 0) {
        throw new SplitError(`source ended at byte ${offset + copied}, expected ${offset + length}`);
      }

      let written = 0;
      while (written < bytesRead) {
        const { bytesWritten } = await target.write(buffer, written, bytesRead - written);
        written += bytesWritten;
      }
      copied += bytesRead;
    }
  } finally {
    await target.close();
  }
}
