/**
 * Typed exception classes for widecol
 *
 * Error hierarchy:
 * - WidecolError: Base error class for all widecol errors
 *   - ValidationError: Invalid input (identifiers, filters, mutations, config)
 *   - MalformedChunkSequenceError: A read stream delivered chunks that cannot
 *     be assembled into rows (data-integrity fault, never retried)
 *   - NotFoundError / AlreadyExistsError / FailedPreconditionError:
 *     Server-reported resource state errors
 *   - TransportError: Any other non-OK status returned by a transport
 *   - TimeoutError: A long-running operation did not finish in time
 *   - RetryError: Retries of a transient failure were exhausted
 *   - StreamingCancelledError: A read stream was cancelled while awaited
 *
 * Every error carries a `code` (see {@link ErrorCode}) and, for errors that
 * came from a transport, a numeric {@link StatusCode}.
 *
 * @example
 * ```typescript
 * import { NotFoundError, MalformedChunkSequenceError } from '@widecol/core';
 *
 * try {
 *   const row = await table.readRow('user#42');
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     logger.warn('Table is gone', { table: table.tableId });
 *   } else if (error instanceof MalformedChunkSequenceError) {
 *     logger.error('Corrupt read stream', error, { code: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Codes
// =============================================================================

/**
 * Error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
  INVALID_FILTER = 'INVALID_FILTER',
  INVALID_TIMESTAMP = 'INVALID_TIMESTAMP',
  INVALID_MUTATION = 'INVALID_MUTATION',
  TOO_MANY_MUTATIONS = 'TOO_MANY_MUTATIONS',
  SCHEMA_VALIDATION_ERROR = 'SCHEMA_VALIDATION_ERROR',
  ADMIN_REQUIRED = 'ADMIN_REQUIRED',

  // Row data assembly
  INVALID_CHUNK = 'INVALID_CHUNK',
  ROW_KEY_OUT_OF_ORDER = 'ROW_KEY_OUT_OF_ORDER',
  PENDING_ROW_AT_END_OF_STREAM = 'PENDING_ROW_AT_END_OF_STREAM',
  ROW_NOT_COMMITTED = 'ROW_NOT_COMMITTED',

  // Resource state
  NOT_FOUND = 'NOT_FOUND',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  FAILED_PRECONDITION = 'FAILED_PRECONDITION',

  // Transport
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  UNAVAILABLE = 'UNAVAILABLE',
  DEADLINE_EXCEEDED = 'DEADLINE_EXCEEDED',
  RETRY_EXHAUSTED = 'RETRY_EXHAUSTED',

  // Operations and streams
  OPERATION_TIMEOUT = 'OPERATION_TIMEOUT',
  STREAMING_CANCELLED = 'STREAMING_CANCELLED',
}

/**
 * Numeric status codes reported by transports, aligned with gRPC codes.
 */
export enum StatusCode {
  OK = 0,
  CANCELLED = 1,
  UNKNOWN = 2,
  INVALID_ARGUMENT = 3,
  DEADLINE_EXCEEDED = 4,
  NOT_FOUND = 5,
  ALREADY_EXISTS = 6,
  PERMISSION_DENIED = 7,
  RESOURCE_EXHAUSTED = 8,
  FAILED_PRECONDITION = 9,
  ABORTED = 10,
  OUT_OF_RANGE = 11,
  UNIMPLEMENTED = 12,
  INTERNAL = 13,
  UNAVAILABLE = 14,
}

/**
 * Outcome of a single RPC or of one entry of a batched mutation.
 */
export interface Status {
  code: StatusCode;
  message: string;
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return (Object.values(ErrorCode) as string[]).includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all widecol errors.
 *
 * Catch `WidecolError` to handle every library error in one place, then
 * branch on `code` or on the subclass.
 */
export class WidecolError extends Error {
  /** Error code for programmatic identification */
  public readonly code: string;

  /** Structured details for debugging (operation, resource, row key, ...) */
  public readonly details?: Record<string, unknown>;

  /** Suggestion for resolving the error, when there is one */
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
    this.name = 'WidecolError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();
    captureStackTrace(this, WidecolError);
  }

  /**
   * Structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line description for debugging output.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when caller-supplied input is invalid.
 *
 * @example
 * ```typescript
 * throw ValidationError.invalidIdentifier('table', 'bad table!', '[_a-zA-Z0-9][-_.a-zA-Z0-9]*');
 * throw ValidationError.invalidFilter('cellsRowLimit count must be a non-negative integer', { count: -1 });
 * ```
 */
export class ValidationError extends WidecolError {
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

  static invalidIdentifier(kind: string, value: string, pattern: string): ValidationError {
    return new ValidationError(
      `Invalid ${kind} id "${value}"`,
      ErrorCode.INVALID_IDENTIFIER,
      { kind, value, pattern },
      `A ${kind} id must match ${pattern}`
    );
  }

  static invalidFilter(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(
      `Invalid row filter: ${message}`,
      ErrorCode.INVALID_FILTER,
      { operation: 'filter', ...details }
    );
  }

  static invalidTimestamp(value: unknown, reason: string): ValidationError {
    return new ValidationError(
      `Invalid timestamp: ${reason}`,
      ErrorCode.INVALID_TIMESTAMP,
      { value: typeof value === 'number' ? value : String(value) },
      'Timestamps are integral microseconds since the Unix epoch'
    );
  }

  static tooManyMutations(rowKey: string, count: number, max: number): ValidationError {
    return new ValidationError(
      `Row "${rowKey}" has ${count} pending mutations, more than the maximum of ${max}`,
      ErrorCode.TOO_MANY_MUTATIONS,
      { rowKey, count, max },
      'Split the mutations across several commits'
    );
  }

  static adminRequired(operation: string): ValidationError {
    return new ValidationError(
      `"${operation}" requires a client created with admin enabled`,
      ErrorCode.ADMIN_REQUIRED,
      { operation },
      'Create the client with { config: { client: { admin: true } } }'
    );
  }
}

// =============================================================================
// Row Data Errors
// =============================================================================

/**
 * Error thrown when a read stream's chunks cannot be assembled into rows.
 *
 * This is a data-integrity fault: the reader fails fast instead of guessing
 * the server's intent, and the error is never retried.
 */
export class MalformedChunkSequenceError extends WidecolError {
  constructor(
    message: string,
    code: string = ErrorCode.INVALID_CHUNK,
    details?: Record<string, unknown>
  ) {
    super(message, code, details, 'The read stream is corrupt; issue a fresh read request');
    this.name = 'MalformedChunkSequenceError';
    captureStackTrace(this, MalformedChunkSequenceError);
  }

  static invalidChunk(reason: string, details?: Record<string, unknown>): MalformedChunkSequenceError {
    return new MalformedChunkSequenceError(`Invalid chunk: ${reason}`, ErrorCode.INVALID_CHUNK, details);
  }

  static rowKeyOutOfOrder(previous: string, next: string): MalformedChunkSequenceError {
    return new MalformedChunkSequenceError(
      `Row key "${next}" does not sort after previous row key "${previous}"`,
      ErrorCode.ROW_KEY_OUT_OF_ORDER,
      { previous, next }
    );
  }

  static pendingRowAtEndOfStream(rowKey: string): MalformedChunkSequenceError {
    return new MalformedChunkSequenceError(
      `Read stream ended while row "${rowKey}" was still in progress`,
      ErrorCode.PENDING_ROW_AT_END_OF_STREAM,
      { rowKey }
    );
  }

  static rowNotCommitted(rowKey: string): MalformedChunkSequenceError {
    return new MalformedChunkSequenceError(
      `Row "${rowKey}" has not been committed`,
      ErrorCode.ROW_NOT_COMMITTED,
      { rowKey }
    );
  }
}

// =============================================================================
// Transport and Resource Errors
// =============================================================================

/**
 * Error carrying a non-OK transport status.
 */
export class TransportError extends WidecolError {
  public readonly status: StatusCode;

  constructor(
    message: string,
    status: StatusCode = StatusCode.UNKNOWN,
    details?: Record<string, unknown>,
    code: string = transportErrorCode(status)
  ) {
    super(message, code, { status: StatusCode[status], ...details });
    this.name = 'TransportError';
    this.status = status;
    captureStackTrace(this, TransportError);
  }

  static unavailable(message = 'Service unavailable', details?: Record<string, unknown>): TransportError {
    return new TransportError(message, StatusCode.UNAVAILABLE, details);
  }
}

function transportErrorCode(status: StatusCode): string {
  switch (status) {
    case StatusCode.UNAVAILABLE:
      return ErrorCode.UNAVAILABLE;
    case StatusCode.DEADLINE_EXCEEDED:
      return ErrorCode.DEADLINE_EXCEEDED;
    case StatusCode.NOT_FOUND:
      return ErrorCode.NOT_FOUND;
    case StatusCode.ALREADY_EXISTS:
      return ErrorCode.ALREADY_EXISTS;
    case StatusCode.FAILED_PRECONDITION:
      return ErrorCode.FAILED_PRECONDITION;
    case StatusCode.INVALID_ARGUMENT:
      return ErrorCode.VALIDATION_ERROR;
    default:
      return ErrorCode.TRANSPORT_ERROR;
  }
}

/**
 * A requested resource (instance, table, family, app profile) does not exist.
 */
export class NotFoundError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, StatusCode.NOT_FOUND, details);
    this.name = 'NotFoundError';
    captureStackTrace(this, NotFoundError);
  }

  static resource(kind: string, name: string): NotFoundError {
    return new NotFoundError(`${kind} not found: ${name}`, { kind, name });
  }
}

/**
 * A resource being created already exists.
 */
export class AlreadyExistsError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, StatusCode.ALREADY_EXISTS, details);
    this.name = 'AlreadyExistsError';
    captureStackTrace(this, AlreadyExistsError);
  }

  static resource(kind: string, name: string): AlreadyExistsError {
    return new AlreadyExistsError(`${kind} already exists: ${name}`, { kind, name });
  }
}

/**
 * The server refused a request in the resource's current state.
 */
export class FailedPreconditionError extends TransportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, StatusCode.FAILED_PRECONDITION, details);
    this.name = 'FailedPreconditionError';
    captureStackTrace(this, FailedPreconditionError);
  }
}

/**
 * Convert a non-OK status into the matching error class.
 */
export function statusToError(status: Status, details?: Record<string, unknown>): TransportError {
  switch (status.code) {
    case StatusCode.NOT_FOUND:
      return new NotFoundError(status.message, details);
    case StatusCode.ALREADY_EXISTS:
      return new AlreadyExistsError(status.message, details);
    case StatusCode.FAILED_PRECONDITION:
      return new FailedPreconditionError(status.message, details);
    default:
      return new TransportError(status.message, status.code, details);
  }
}

// =============================================================================
// Timeouts, Retries, Cancellation
// =============================================================================

/**
 * A long-running operation did not complete within its timeout.
 */
export class TimeoutError extends WidecolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.OPERATION_TIMEOUT, details, 'Consider increasing the timeout');
    this.name = 'TimeoutError';
    captureStackTrace(this, TimeoutError);
  }

  static operationTimeout(operation: string, timeoutMs: number): TimeoutError {
    return new TimeoutError(`Operation "${operation}" timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    });
  }
}

/**
 * Every retry of a transient failure failed.
 */
export class RetryError extends WidecolError {
  public readonly cause: Error;
  public readonly attempts: number;

  constructor(message: string, cause: Error, attempts: number) {
    super(message, ErrorCode.RETRY_EXHAUSTED, { attempts, originalError: cause.message });
    this.name = 'RetryError';
    this.cause = cause;
    this.attempts = attempts;
    captureStackTrace(this, RetryError);
  }
}

/**
 * A read stream was cancelled through its AbortSignal while being awaited.
 */
export class StreamingCancelledError extends WidecolError {
  constructor(message = 'Read stream was cancelled') {
    super(message, ErrorCode.STREAMING_CANCELLED);
    this.name = 'StreamingCancelledError';
    captureStackTrace(this, StreamingCancelledError);
  }
}
