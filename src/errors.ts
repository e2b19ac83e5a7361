/**
 * Error hierarchy for the extractor. `code` is stable and safe to match on;
 * `context` carries structured details for the logger.
 */
export class ExtractorError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Missing credential or unusable setting. Nothing runs after this. */
export class ConfigError extends ExtractorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
  }
}

export class ExtractionServiceError extends ExtractorError {
  public readonly status?: number;

  constructor(message: string, context?: Record<string, unknown> & { status?: number }) {
    super(message, "EXTRACTION_SERVICE_ERROR", context);
    this.status = context?.status;
  }
}

export class ArtifactValidationError extends ExtractorError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Artifact failed validation: ${errors.join("; ")}`, "ARTIFACT_INVALID", { errors });
    this.errors = errors;
  }
}
