import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SplitError } from "../../errors.js";
import { splitterLogger } from "../../../utils/logger.js";
import { FileSplitter, planSplits } from "../fileSplitter.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "phrase-tally-split-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function splitSource(content: string, splitCount: number, bufferSize = 4) {
  const source = path.join(dir, "source.txt");
  await writeFile(source, content);
  const splitter = new FileSplitter(path.join(dir, "work"), { bufferSize });
  const splits = await splitter.split(source, splitCount);
  const parts = await Promise.all(splits.map((s) => readFile(s.path, "utf8")));
  return { source, splits, parts };
}

describe("planSplits", () => {
  it("gives the remainder its own trailing range", () => {
    expect(planSplits(10, 3)).toEqual([
      { index: 1, offset: 0, length: 3 },
      { index: 2, offset: 3, length: 3 },
      { index: 3, offset: 6, length: 3 },
      { index: 4, offset: 9, length: 1 },
    ]);
  });

  it("makes empty ranges when there are more splits than bytes", () => {
    const plan = planSplits(2, 4);
    expect(plan.map((p) => p.length)).toEqual([0, 0, 0, 0, 2]);
    expect(plan[4]).toEqual({ index: 5, offset: 0, length: 2 });
  });
});

describe("FileSplitter", () => {
  it("covers a source that divides evenly", async () => {
    const { splits, parts } = await splitSource("abcdefghij", 5);
    expect(splits).toHaveLength(5);
    expect(parts).toEqual(["ab", "cd", "ef", "gh", "ij"]);
    expect(path.basename(splits[0]!.path)).toBe("split.1.txt");
  });

  it("writes one extra split for the remainder", async () => {
    const { splits, parts } = await splitSource("abcdefghij", 3);
    expect(splits.map((s) => s.index)).toEqual([1, 2, 3, 4]);
    expect(parts).toEqual(["abc", "def", "ghi", "j"]);
  });

  it("copies splits larger than the transfer buffer", async () => {
    const content = "0123456789".repeat(7);
    const { parts } = await splitSource(content, 2, 3);
    expect(parts.join("")).toBe(content);
    expect(parts[0]).toHaveLength(35);
  });

  it("handles a single-byte source", async () => {
    const { splits, parts } = await splitSource("x", 10);
    expect(splits).toHaveLength(11);
    expect(parts.slice(0, 10).every((p) => p === "")).toBe(true);
    expect(parts[10]).toBe("x");
  });

  it("handles an empty source", async () => {
    const { splits, parts } = await splitSource("", 10);
    expect(splits).toHaveLength(10);
    expect(parts.join("")).toBe("");
  });

  it("leaves the source untouched", async () => {
    const { source } = await splitSource("a|b\nc|d\n", 3);
    expect(await readFile(source, "utf8")).toBe("a|b\nc|d\n");
  });

  it("fails with SplitError when the source is missing", async () => {
    const splitter = new FileSplitter(path.join(dir, "work"));
    await expect(splitter.split(path.join(dir, "nope.txt"), 2)).rejects.toBeInstanceOf(SplitError);
  });

  it("leaves logging a fatal error to the caller and keeps its cause", async () => {
    const logged = vi.spyOn(splitterLogger, "error");
    const splitter = new FileSplitter(path.join(dir, "work"));

    const failure = await splitter.split(path.join(dir, "nope.txt"), 2).catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(SplitError);
    expect(failure).toMatchObject({ cause: { code: "ENOENT" } });
    expect(logged).not.toHaveBeenCalled();
  });

  it("fails with SplitError when the work dir cannot be created", async () => {
    const source = path.join(dir, "source.txt");
    await writeFile(source, "abc");
    const splitter = new FileSplitter(source);
    await expect(splitter.split(source, 2)).rejects.toMatchObject({ code: "SPLIT_FAILED" });
  });

  it("rejects a non-positive split count", async () => {
    const splitter = new FileSplitter(dir);
    await expect(splitter.split("ignored.txt", 0)).rejects.toThrow("split count must be a positive integer, got 0");
  });
});
