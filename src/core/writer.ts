import type { OutputWriteError } from "./errors.js";
import type { TopPhrasesResult } from "./types.js";

export type WriteMode = "append" | "overwrite";

export type WriteResult =
  | { ok: true; path: string; bytes: number }
  | { ok: false; path: string; error: OutputWriteError };

export interface OutputWriter {
  write(result: TopPhrasesResult, path: string): Promise<WriteResult>;
}
