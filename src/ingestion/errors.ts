export type IngestionStage = 'source' | 'startup';

export class IngestionError extends Error {
  readonly stage: IngestionStage;

  constructor(stage: IngestionStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/**
 * Retryable source failure: network error, timeout, 5xx or 429.
 * `retryAfterMs` carries the server's Retry-After hint when one was sent.
 */
export class SourceTransientError extends IngestionError {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super('source', message, { cause: details.cause });
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

// Non-retryable source failure: bad credentials, bad parameters, unusable window
export class SourceFatalError extends IngestionError {
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, details: { status?: number; code?: string; cause?: unknown } = {}) {
    super('source', message, { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
  }
}

// Raised only by the startup connectivity check; ends the process
export class BackendConnectivityError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('startup', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
