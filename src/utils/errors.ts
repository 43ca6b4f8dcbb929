import type { ExtractionIssue, Locator, ProcessingSummary } from '../types/index';
import { MAX_QUERY_LENGTH, MAX_TOP_K, MIN_CONTEXT_SIZE } from '../constants/rag';

/**
 * Custom error types for the extraction, indexing and generation stages
 */
export class ExtractionError extends Error {
  public readonly errorCause?: unknown;
  public readonly documentId: string;
  public readonly locator?: Locator;

  constructor(
    message: string,
    documentId: string,
    locator?: Locator,
    cause?: unknown
  ) {
    super(message);
    this.name = 'ExtractionError';
    this.documentId = documentId;
    this.locator = locator;
    this.errorCause = cause;
  }

  toIssue(): ExtractionIssue {
    return this.locator
      ? { documentId: this.documentId, locator: this.locator, message: this.message }
      : { documentId: this.documentId, message: this.message };
  }
}

export class EmptyCorpusError extends Error {
  public readonly summary?: ProcessingSummary;

  constructor(
    message: string = 'No chunks were produced from the documents',
    summary?: ProcessingSummary
  ) {
    super(message);
    this.name = 'EmptyCorpusError';
    this.summary = summary;
  }
}

export class IndexBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IndexBuildError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type GenerationFailureReason =
  | 'not_found'
  | 'exit_code'
  | 'timeout'
  | 'cancelled'
  | 'empty_output'
  | 'request_failed';

export class GenerationUnavailable extends Error {
  public readonly errorCause?: unknown;
  public readonly reason: GenerationFailureReason;

  constructor(
    message: string,
    reason: GenerationFailureReason,
    cause?: unknown
  ) {
    super(message);
    this.name = 'GenerationUnavailable';
    this.reason = reason;
    this.errorCause = cause;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Validate input parameters
 */
export function validateQueryInput(
  query: string,
  maxLength: number = MAX_QUERY_LENGTH
): void {
  if (!query || typeof query !== 'string') {
    throw new ValidationError('Query must be a non-empty string');
  }
  if (query.trim().length === 0) {
    throw new ValidationError('Query cannot be empty or whitespace only');
  }
  if (query.length > maxLength) {
    throw new ValidationError(
      `Query too long: ${query.length} characters (max: ${maxLength})`
    );
  }
}

export function validateTopK(topK: number, maxK: number = MAX_TOP_K): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError('topK must be a positive integer');
  }
  if (topK > maxK) {
    throw new ValidationError(`topK too large: ${topK} (max: ${maxK})`);
  }
}

export function validatePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
}

export function validateContextSize(size: number): void {
  validatePositiveInteger(size, 'maxContextSize');
  if (size < MIN_CONTEXT_SIZE) {
    throw new ValidationError(
      `maxContextSize too small: ${size} (min: ${MIN_CONTEXT_SIZE})`
    );
  }
}
