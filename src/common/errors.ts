export enum ErrorCode {
  PARSE_FAILED = 'PARSE_FAILED',
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  RETRIEVAL_UNAVAILABLE = 'RETRIEVAL_UNAVAILABLE',
  GENERATION_FAILED = 'GENERATION_FAILED',
  INDEX_INCONSISTENT = 'INDEX_INCONSISTENT',
}

export const TEMPORARILY_UNAVAILABLE_MESSAGE =
  'The knowledge service is temporarily unavailable. Please try again shortly.';

/**
 * Base class for every failure the retrieval pipeline reports.
 * `retryable` tells callers (and the retry helper) whether another attempt can succeed.
 */
export abstract class RagError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ParseError extends RagError {
  readonly code = ErrorCode.PARSE_FAILED;
  readonly retryable = false;

  constructor(
    message: string,
    readonly documentId?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class EmbeddingError extends RagError {
  readonly code = ErrorCode.EMBEDDING_FAILED;

  constructor(
    message: string,
    readonly retryable: boolean,
    readonly failedIndices: readonly number[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class RetrievalError extends RagError {
  readonly code = ErrorCode.RETRIEVAL_UNAVAILABLE;
  readonly retryable = true;
}

export class GenerationError extends RagError {
  readonly code = ErrorCode.GENERATION_FAILED;

  constructor(
    message: string,
    readonly retryable: boolean,
    readonly cancelled = false,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

/** A swap left the document with mixed or missing records; writes to it stay halted. */
export class IndexConsistencyError extends RagError {
  readonly code = ErrorCode.INDEX_INCONSISTENT;
  readonly retryable = false;

  constructor(
    message: string,
    readonly documentId: string,
  ) {
    super(message);
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof RagError) return error.retryable;
  return error instanceof TimeoutError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof RetrievalError || error instanceof EmbeddingError) {
    return error.retryable ? TEMPORARILY_UNAVAILABLE_MESSAGE : error.message;
  }
  if (error instanceof GenerationError) {
    return TEMPORARILY_UNAVAILABLE_MESSAGE;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
