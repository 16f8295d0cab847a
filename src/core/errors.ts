export type ErrorCode = "SPLIT_FAILED" | "INGEST_FAILED" | "OUTPUT_WRITE_FAILED" | "INVALID_CONFIG";

export interface FieldError {
  path: string;
  message: string;
}

export class PhraseTallyError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fatal: the run cannot continue once splitting has failed. */
export class SplitError extends PhraseTallyError {
  constructor(message: string, options?: ErrorOptions) {
    super("SPLIT_FAILED", message, options);
  }
}

/** Recorded per split; aggregation carries on with the remaining files. */
export class IngestError extends PhraseTallyError {
  constructor(readonly path: string, options?: ErrorOptions) {
    super("INGEST_FAILED", `could not read split ${path}`, options);
  }
}

export class OutputWriteError extends PhraseTallyError {
  constructor(readonly path: string, options?: ErrorOptions) {
    super("OUTPUT_WRITE_FAILED", `could not write result to ${path}`, options);
  }
}

export class ConfigError extends PhraseTallyError {
  constructor(readonly errors: FieldError[]) {
    super("INVALID_CONFIG", `invalid configuration: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`);
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
