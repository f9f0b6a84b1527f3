/**
 * Typed exception classes for Cohort
 *
 * Error hierarchy:
 * - CohortError: Base error class for all Cohort errors
 *   - InvariantError: Violated engine preconditions (programming errors)
 *   - QueryError: Query registry issues (unknown operation)
 *   - ValidationError: Configuration and input validation failures
 *
 * The query engine itself has no recoverable errors: its inputs are
 * well-formed in-memory data. InvariantError marks a caller that skipped a
 * precondition (for example aggregating an empty bucket) and is not meant
 * to be caught and retried.
 *
 * @example
 * ```typescript
 * import { QueryError, ValidationError, ErrorCode } from '@cohort/core';
 *
 * try {
 *   getOperation(id);
 * } catch (error) {
 *   if (error instanceof QueryError && error.code === ErrorCode.UNKNOWN_OPERATION) {
 *     logger.warn(error.message, { suggestion: error.suggestion ?? null });
 *   }
 * }
 * ```
 */

import { isLogContextValue, type LogContext } from './logging.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Engine preconditions
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  EMPTY_BUCKET = 'EMPTY_BUCKET',

  // Query errors
  QUERY_ERROR = 'QUERY_ERROR',
  UNKNOWN_OPERATION = 'UNKNOWN_OPERATION',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all Cohort errors
 *
 * Carries a `code` for programmatic identification, optional structured
 * `details` and an optional `suggestion` for resolving the error.
 */
export class CohortError extends Error {
  /** Error code for programmatic identification (see ErrorCode) */
  public readonly code: string;

  /** Structured details for debugging */
  public readonly details?: Record<string, unknown>;

  /** Suggestion for resolving the error, when one applies */
  public readonly suggestion?: string;

  /** Milliseconds since epoch when the error was created */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'CohortError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, CohortError);
  }

  /**
   * Fields for a log entry about this error. The message is left out: it
   * is the entry's own message. Details that are not JSON values are
   * dropped.
   */
  toLogContext(): LogContext {
    const context: LogContext = {
      errorCode: this.code,
      errorName: this.name,
      timestamp: this.timestamp,
    };
    if (this.details !== undefined && isLogContextValue(this.details)) {
      context.details = this.details;
    }
    if (this.suggestion !== undefined) {
      context.suggestion = this.suggestion;
    }
    return context;
  }
}

// =============================================================================
// Invariant Errors
// =============================================================================

/**
 * Error thrown when an engine precondition is violated.
 *
 * @example
 * ```typescript
 * throw InvariantError.emptyBucket('avg');
 * ```
 */
export class InvariantError extends CohortError {
  constructor(
    message: string,
    code: string = ErrorCode.INVARIANT_VIOLATION,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'InvariantError';
    captureStackTrace(this, InvariantError);
  }

  /**
   * An aggregate was asked to summarize a bucket with no rows.
   */
  static emptyBucket(operation: string): InvariantError {
    return new InvariantError(
      `Cannot aggregate an empty bucket (${operation})`,
      ErrorCode.EMPTY_BUCKET,
      { operation }
    );
  }
}

/**
 * Assert an engine precondition.
 *
 * @throws InvariantError when `condition` is false
 */
export function invariant(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new InvariantError(message, ErrorCode.INVARIANT_VIOLATION, details);
  }
}

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when a query operation cannot be resolved or run.
 */
export class QueryError extends CohortError {
  constructor(
    message: string,
    code: string = ErrorCode.QUERY_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'QueryError';
    captureStackTrace(this, QueryError);
  }

  /**
   * Create an "unknown operation" error listing the known ids.
   */
  static unknownOperation(id: string, known: readonly string[]): QueryError {
    return new QueryError(
      `Unknown query operation "${id}"`,
      ErrorCode.UNKNOWN_OPERATION,
      { operation: id, known: [...known] },
      `Use one of: ${known.join(', ')}`
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when configuration fails validation.
 *
 * @example
 * ```typescript
 * throw new ValidationError('Invalid configuration', ErrorCode.INVALID_CONFIG, { errors });
 * ```
 */
export class ValidationError extends CohortError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }
}

// =============================================================================
// Error Factory Utilities
// =============================================================================

/**
 * Wrap an unknown error as a CohortError.
 *
 * @returns The original error if it already is a CohortError, otherwise a wrapper
 */
export function wrapError(error: unknown, operation?: string): CohortError {
  if (error instanceof CohortError) {
    return error;
  }

  if (error instanceof Error) {
    return new CohortError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      { operation, originalError: error.name }
    );
  }

  return new CohortError(
    String(error),
    ErrorCode.INTERNAL_ERROR,
    { operation }
  );
}
