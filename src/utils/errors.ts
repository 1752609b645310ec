/**
 * Error taxonomy
 *
 * Every external dependency has one error class. Only `EmbeddingUnavailable`
 * (and validation / admin errors) reach callers; the others are converted to
 * degraded results at the boundary that owns the dependency.
 */

import type { Logger } from './logger.js';

// ============================================
// Error Codes
// ============================================

export const ErrorCodes = {
  EMBEDDING_UNAVAILABLE: 'EMBEDDING_UNAVAILABLE',
  INDEX_UNAVAILABLE: 'INDEX_UNAVAILABLE',
  ORACLE_FAILURE: 'ORACLE_FAILURE',
  STORE_FAILURE: 'STORE_FAILURE',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = typeof ErrorCodes[keyof typeof ErrorCodes];

interface MatchErrorOptions {
  details?: unknown;
  cause?: unknown;
  isRetryable?: boolean;
}

function asError(value: unknown): Error | undefined {
  if (value === undefined) return undefined;
  return value instanceof Error ? value : new Error(String(value));
}

// ============================================
// Base Error
// ============================================

export class MatchError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: unknown;
  readonly timestamp: Date;
  readonly isRetryable: boolean;
  readonly causeError?: Error;

  constructor(code: ErrorCodeType, message: string, options: MatchErrorOptions = {}) {
    super(message);
    this.name = 'MatchError';
    this.code = code;
    this.details = options.details;
    this.causeError = asError(options.cause);
    this.timestamp = new Date();
    this.isRetryable = options.isRetryable ?? false;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      isRetryable: this.isRetryable,
      stack: this.stack,
      cause: this.causeError
        ? { message: this.causeError.message, stack: this.causeError.stack }
        : undefined,
    };
  }
}

// ============================================
// Specialized Error Classes
// ============================================

/** The embedding model cannot be loaded or reached. */
export class EmbeddingUnavailable extends MatchError {
  readonly model?: string;

  constructor(message: string, options: MatchErrorOptions & { model?: string } = {}) {
    super(ErrorCodes.EMBEDDING_UNAVAILABLE, message, { isRetryable: true, ...options });
    this.name = 'EmbeddingUnavailable';
    this.model = options.model;
  }
}

/** The vector index cannot be reached or refused the operation. */
export class IndexUnavailable extends MatchError {
  readonly operation: string;

  constructor(operation: string, message: string, options: MatchErrorOptions = {}) {
    super(ErrorCodes.INDEX_UNAVAILABLE, message, { isRetryable: true, ...options });
    this.name = 'IndexUnavailable';
    this.operation = operation;
  }
}

/** The lexical profile store cannot be reached or refused the operation. */
export class StoreFailure extends MatchError {
  readonly operation: string;

  constructor(operation: string, message: string, options: MatchErrorOptions = {}) {
    super(ErrorCodes.STORE_FAILURE, message, { isRetryable: true, ...options });
    this.name = 'StoreFailure';
    this.operation = operation;
  }
}

export type OracleFailureKind = 'timeout' | 'transport' | 'malformed';

/** The reasoning oracle timed out, errored, or answered with something unusable. */
export class OracleFailure extends MatchError {
  readonly kind: OracleFailureKind;

  constructor(kind: OracleFailureKind, message: string, options: MatchErrorOptions = {}) {
    super(ErrorCodes.ORACLE_FAILURE, message, { isRetryable: kind !== 'malformed', ...options });
    this.name = 'OracleFailure';
    this.kind = kind;
  }
}

export class ValidationError extends MatchError {
  readonly field?: string;
  readonly value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
      details?: unknown;
    }
  ) {
    super(ErrorCodes.VALIDATION_ERROR, message, { details: options?.details });
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

export class TimeoutError extends MatchError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(operation: string, timeoutMs: number) {
    super(
      ErrorCodes.TIMEOUT_ERROR,
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      { isRetryable: true }
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.operation = operation;
  }
}

export class ConfigError extends MatchError {
  constructor(message: string, options: MatchErrorOptions = {}) {
    super(ErrorCodes.CONFIG_ERROR, message, options);
    this.name = 'ConfigError';
  }
}

// ============================================
// Error Utilities
// ============================================

export function isMatchError(error: unknown): error is MatchError {
  return error instanceof MatchError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toMatchError(error: unknown): MatchError {
  if (isMatchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MatchError(ErrorCodes.UNKNOWN_ERROR, error.message, { cause: error });
  }

  return new MatchError(ErrorCodes.UNKNOWN_ERROR, String(error));
}

// ============================================
// Safe Execution Wrapper
// ============================================

export type SafeResult<T> = { success: true; data: T } | { success: false; error: MatchError };

/**
 * Runs `operation` and turns a thrown error into a failed result. The failure
 * is logged at `warn` on the given logger.
 */
export async function safeExecute<T>(
  operation: () => Promise<T>,
  options: {
    operationName?: string;
    logger?: Logger;
    onError?: (error: MatchError) => void;
  } = {}
): Promise<SafeResult<T>> {
  try {
    const data = await operation();
    return { success: true, data };
  } catch (error) {
    const matchError = toMatchError(error);

    options.onError?.(matchError);

    options.logger?.warn(`${options.operationName ?? 'Operation'} failed`, {
      code: matchError.code,
      message: matchError.message,
    });

    return { success: false, error: matchError };
  }
}
