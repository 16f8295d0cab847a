import path from "node:path";
import { z } from "zod";

import { ConfigError, type FieldError } from "./core/errors.js";
import { DEFAULT_BUFFER_SIZE } from "./core/impl/fileSplitter.js";
import { DEFAULT_DELIMITER } from "./core/impl/delimiterTokenizer.js";
import { DEFAULT_LIMIT } from "./core/impl/topPhrases.js";

export const DEFAULT_SPLIT_COUNT = 10;
export const DEFAULT_WORK_DIR = "splits";
export const OUTPUT_FILE_NAME = "top-phrases.txt";

export const pipelineConfigSchema = z
  .object({
    sourcePath: z.string().min(1),
    splitCount: z.coerce.number().int().positive().default(DEFAULT_SPLIT_COUNT),
    limit: z.coerce.number().int().nonnegative().default(DEFAULT_LIMIT),
    bufferSize: z.coerce.number().int().positive().default(DEFAULT_BUFFER_SIZE),
    delimiter: z.string().length(1, "must be a single character").default(DEFAULT_DELIMITER),
    workDir: z.string().min(1).default(DEFAULT_WORK_DIR),
    outputPath: z.string().min(1).optional(),
    mode: z.enum(["append", "overwrite"]).default("append"),
    strategy: z.enum(["heap", "sort"]).default("heap"),
    keepSplits: z.boolean().default(true),
  })
  .transform((c) => ({
    ...c,
    outputPath: c.outputPath ?? path.join(c.workDir, OUTPUT_FILE_NAME),
  }));

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;

type RawConfig = { [K in keyof PipelineConfigInput]?: unknown };

/** Environment variable backing each setting that can come from the environment. */
export const ENV_KEYS: ReadonlyArray<readonly [keyof RawConfig, string]> = [
  ["splitCount", "PHRASE_TALLY_SPLITS"],
  ["limit", "PHRASE_TALLY_LIMIT"],
  ["bufferSize", "PHRASE_TALLY_BUFFER_SIZE"],
  ["delimiter", "PHRASE_TALLY_DELIMITER"],
  ["workDir", "PHRASE_TALLY_WORK_DIR"],
  ["outputPath", "PHRASE_TALLY_OUTPUT"],
];

/**
 * Resolves the run configuration: explicit values, then environment, then defaults.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(input: RawConfig, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const raw: RawConfig = { ...input };
  for (const [key, envKey] of ENV_KEYS) {
    const fromEnv = env[envKey];
    if (raw[key] === undefined && fromEnv !== undefined && fromEnv !== "") raw[key] = fromEnv;
  }

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const errors: FieldError[] = parsed.error.issues.map((issue) => ({
      path: ["$", ...issue.path].join("."),
      message: issue.message,
    }));
    throw new ConfigError(errors);
  }
  return parsed.data;
}
