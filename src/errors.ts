// Child Affect Analyzer - Error taxonomy
// Validation errors abort a session before any stage runs. Configuration and
// environment errors abort startup or the whole run. Service errors are
// converted into stage errors by the orchestrator.

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Malformed model manifest: bad weight or shape, or a duplicate name with a conflicting shape. */
export class EnsembleConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnsembleConfigError";
  }
}

export class TranscriptionError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = "TranscriptionError";
    this.attempts = attempts;
  }
}

export class RecommendationServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecommendationServiceError";
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/** Required storage cannot be created; the run is aborted. */
export class FatalEnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalEnvironmentError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
