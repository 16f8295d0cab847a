import type { SplitDescriptor } from "./types.js";

export interface SplitOptions {
  /** Transfer buffer size in bytes. */
  bufferSize?: number;
}

/**
 * Partitions a file into contiguous byte ranges on disk.
 *
 * Contract notes:
 * - concatenating the outputs in index order reproduces the source byte-for-byte
 * - returns `splitCount` descriptors, or `splitCount + 1` when the size leaves a remainder
 * - the source is opened read-only
 * - any I/O failure rejects with a SplitError
 */
export interface Splitter {
  split(sourcePath: string, splitCount: number, options?: SplitOptions): Promise<SplitDescriptor[]>;
}
