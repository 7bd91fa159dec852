/**
 * Error taxonomy
 *
 * Span, config and format errors abort the current document. Generator
 * exhaustion is logged and absorbed; residual findings are report data.
 */

export type RedactionErrorCode =
  | "SPAN_OUT_OF_BOUNDS"
  | "SPAN_OVERLAP"
  | "CONFIG_INVALID"
  | "UNSUPPORTED_FORMAT"
  | "SECRET_MISSING"
  | "PIPELINE_FAILED";

export class RedactionError extends Error {
  readonly code: RedactionErrorCode;

  constructor(code: RedactionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SpanOutOfBoundsError extends RedactionError {
  constructor(message: string) {
    super("SPAN_OUT_OF_BOUNDS", message);
  }
}

export class OverlapError extends RedactionError {
  constructor(message: string) {
    super("SPAN_OVERLAP", message);
  }
}

export class ConfigError extends RedactionError {
  /** Dotted paths of the offending keys, e.g. "verification.min_confidence" */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", message);
    this.issues = issues;
  }
}

export class UnsupportedFormatError extends RedactionError {
  constructor(path: string) {
    super("UNSUPPORTED_FORMAT", `No reader/writer for ${path}`);
  }
}

export class MissingSecretError extends RedactionError {
  constructor(envName: string) {
    super("SECRET_MISSING", `Seed secret required but ${envName} is not set`);
  }
}

export class PipelineError extends RedactionError {
  readonly stage: string;

  constructor(stage: string, message: string, cause?: unknown) {
    super("PIPELINE_FAILED", `${stage}: ${message}`, { cause });
    this.stage = stage;
  }
}
