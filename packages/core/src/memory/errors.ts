/**
 * Error taxonomy shared by the engine and the HTTP gateway.
 *
 * Every error carries a stable `code` for the wire and the HTTP status the
 * gateway answers with.
 */

export type MemoryErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_TIMEOUT'
  | 'STORE_IO_ERROR'
  | 'CONCURRENCY_CONFLICT';

export abstract class MemoryError extends Error {
  abstract readonly code: MemoryErrorCode;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Whether a caller may retry the same request unchanged. */
  get retryable(): boolean {
    return false;
  }
}

export class ValidationError extends MemoryError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class NotFoundError extends MemoryError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(id: string) {
    super(`Learning ${id} not found`, { id });
  }
}

export type EmbeddingFailureReason =
  | 'request_failed'
  | 'invalid_response'
  | 'dimension_mismatch'
  | 'not_configured';

export class EmbeddingUnavailableError extends MemoryError {
  readonly code = 'EMBEDDING_UNAVAILABLE';
  readonly statusCode = 503;

  constructor(
    message: string,
    public readonly reason: EmbeddingFailureReason,
    cause?: unknown,
  ) {
    super(message, { reason }, { cause });
  }

  override get retryable(): boolean {
    return this.reason === 'request_failed';
  }
}

export class EmbeddingTimeoutError extends MemoryError {
  readonly code = 'EMBEDDING_TIMEOUT';
  readonly statusCode = 504;

  constructor(public readonly timeoutMs: number) {
    super(`Embedding provider did not answer within ${timeoutMs}ms`, { timeoutMs });
  }

  override get retryable(): boolean {
    return true;
  }
}

export class StoreIOError extends MemoryError {
  readonly code = 'STORE_IO_ERROR';
  readonly statusCode = 500;

  constructor(operation: string, cause: unknown) {
    super(`Record store ${operation} failed: ${errorMessage(cause)}`, { operation }, { cause });
  }
}

export class ConcurrencyConflictError extends MemoryError {
  readonly code = 'CONCURRENCY_CONFLICT';
  readonly statusCode = 409;

  constructor(key: string, waitedMs: number) {
    super(`Could not acquire lock for ${key} within ${waitedMs}ms`, { key, waitedMs });
  }

  override get retryable(): boolean {
    return true;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
