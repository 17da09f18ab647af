/**
 * Request-level error types. Source failures (disabled or unreachable
 * sources) never use these: adapters report them inside their snapshots.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'MODEL_ERROR'
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: 400 | 404 | 429 | 500 | 503 | 504;

  constructor(message: string, code: ErrorCode, status: AppError['status'], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }
}

/** Malformed input: unsupported mode, bad session id, unreadable body */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/** The narrative service was unreachable or returned nothing usable */
export class NarrativeServiceError extends AppError {
  readonly provider: string | null;

  constructor(message: string, options?: { cause?: unknown; provider?: string | null }) {
    super(message, 'MODEL_ERROR', 503, { cause: options?.cause });
    this.name = 'NarrativeServiceError';
    this.provider = options?.provider ?? null;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
