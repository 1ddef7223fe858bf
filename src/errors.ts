import type { ZodIssue } from 'zod';

/**
 * Base class for failures surfaced by the ingestion core
 */
export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Neither the caller's hint nor the detector produced a registered source
 */
export class UnrecognizedSourceError extends IngestionError {
  constructor(readonly sourceHint?: string) {
    super(
      sourceHint
        ? `Unrecognized source: no parser registered for hint "${sourceHint}" and none detected`
        : 'Unrecognized source: no parser detected for content'
    );
  }
}

/**
 * A source document could not be read at all (as opposed to yielding zero jobs)
 */
export class SourceParseError extends IngestionError {
  constructor(readonly source: string, cause: unknown) {
    super(
      `Failed to parse ${source} content: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class CaptureValidationError extends IngestionError {
  constructor(readonly issues: ZodIssue[]) {
    super(`Invalid capture submission: ${issues.map(issue => issue.message).join(', ')}`);
  }
}

export class ConfigError extends IngestionError {}
