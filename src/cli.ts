#!/usr/bin/env node
import { USAGE, isUsageError, parseCliArgs } from "./cliArgs.js";
import { loadConfig } from "./config.js";
import { runPipeline } from "./pipeline/pipeline.js";
import { cliLogger as logger, logError } from "./utils/logger.js";

try {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === "help") {
    process.stdout.write(USAGE);
  } else {
    const config = loadConfig(command.input);
    const report = await runPipeline(config);

    if (report.output.ok) {
      logger.info({ output: report.output.path, phrases: report.result.length }, "done");
    } else {
      process.exitCode = 1;
    }
  }
} catch (e) {
  if (isUsageError(e)) process.stderr.write(USAGE);
  logError(logger, e, { context: "run" });
  process.exitCode = 1;
}
