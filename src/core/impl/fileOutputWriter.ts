import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { OutputWriteError } from "../errors.js";
import type { OutputWriter, WriteMode, WriteResult } from "../writer.js";
import type { TopPhrasesResult } from "../types.js";
import { logError, writerLogger as logger } from "../../utils/logger.js";

/** `{a=3, b=2}` in result order; `{}` when empty. */
export function renderResult(result: TopPhrasesResult): string {
  return `{${result.map(({ phrase, count }) => `${phrase}=${count}`).join(", ")}}`;
}

/**
 * Writes one rendered result per call, terminated by a newline.
 * In append mode repeated runs accumulate in the same file.
 */
export class FileOutputWriter implements OutputWriter {
  constructor(private readonly mode: WriteMode = "append") {}

  async write(result: TopPhrasesResult, target: string): Promise<WriteResult> {
    const text = renderResult(result) + "\n";

    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, text, { encoding: "utf8", flag: this.mode === "append" ? "a" : "w" });
    } catch (e) {
      const error = new OutputWriteError(target, { cause: e });
      logError(logger, error, { target, mode: this.mode });
      return { ok: false, path: target, error };
    }

    const bytes = Buffer.byteLength(text, "utf8");
    logger.info({ target, mode: this.mode, entries: result.length, bytes }, "result written");
    return { ok: true, path: target, bytes };
  }
}
