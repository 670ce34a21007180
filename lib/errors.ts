export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credentials or unusable local setup. Never retried. */
export class ConfigurationError extends PipelineError {}

/** An API key the backends need is not set. */
export class MissingCredentialsError extends ConfigurationError {}

export class DownloadFailure extends PipelineError {
  readonly attempts: string[];

  constructor(message: string, attempts: string[], options?: { cause?: unknown }) {
    super(message, options);
    this.attempts = attempts;
  }
}

export class TranscriptionFailure extends PipelineError {}

export class ValidationError extends PipelineError {}

export class GenerationFailure extends PipelineError {}

export function errorMessage(error: unknown, fallback = "Unexpected failure"): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return fallback;
}
