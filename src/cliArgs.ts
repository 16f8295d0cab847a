import { parseArgs } from "node:util";

import type { PipelineConfigInput } from "./config.js";
import { ConfigError } from "./core/errors.js";

export const USAGE = `usage: phrase-tally <source> [options]

  -k, --splits <n>       number of byte-range splits (default 10)
  -n, --limit <n>        phrases to report (default 100000)
      --buffer-size <n>  split transfer buffer in bytes (default 8192)
  -d, --delimiter <c>    phrase delimiter (default "|")
      --work-dir <dir>   where split files go (default ./splits)
  -o, --output <file>    result file (default <work-dir>/top-phrases.txt)
      --mode <mode>      append | overwrite (default append)
      --strategy <s>     heap | sort (default heap)
      --clean            remove split files after counting
  -h, --help             show this help
`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "run"; input: { [K in keyof PipelineConfigInput]?: unknown } };

/** Maps argv (without node and script) onto raw config input; validation happens in loadConfig. */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      splits: { type: "string", short: "k" },
      limit: { type: "string", short: "n" },
      "buffer-size": { type: "string" },
      delimiter: { type: "string", short: "d" },
      "work-dir": { type: "string" },
      output: { type: "string", short: "o" },
      mode: { type: "string" },
      strategy: { type: "string" },
      clean: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) return { kind: "help" };

  return {
    kind: "run",
    input: {
      sourcePath: positionals[0],
      splitCount: values.splits,
      limit: values.limit,
      bufferSize: values["buffer-size"],
      delimiter: values.delimiter,
      workDir: values["work-dir"],
      outputPath: values.output,
      mode: values.mode,
      strategy: values.strategy,
      keepSplits: !values.clean,
    },
  };
}

/** Errors caused by the command line itself, which get the usage text. */
export function isUsageError(e: unknown): boolean {
  if (e instanceof ConfigError) return true;
  return e instanceof Error && "code" in e && typeof e.code === "string" && e.code.startsWith("ERR_PARSE_ARGS_");
}
