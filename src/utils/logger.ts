import pino from "pino";
import type { Logger } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    service: "phrase-tally",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// stderr, so a result printed to stdout stays clean
export const logger = pino(baseConfig, pino.destination(2));

export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const splitterLogger = createLogger("splitter");
export const aggregatorLogger = createLogger("aggregator");
export const writerLogger = createLogger("writer");
export const pipelineLogger = createLogger("pipeline");
export const cliLogger = createLogger("cli");

export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>,
): void => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: Record<string, unknown>,
): void => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, "Unknown error occurred");
  }
};

export type { Logger };
