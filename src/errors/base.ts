/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the graph enrichment engine.
 * Provides a hierarchical error structure with serialization
 * and cause chaining.
 */

import { type ErrorCode, type ErrorSeverity, GeneralErrorCodes, getSeverityForCode } from './codes';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Pipeline stage being executed */
  stage?: string;
  /** Node the error relates to */
  nodeId?: string;
  /** Handler pattern the error relates to */
  pattern?: string;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  severity: ErrorSeverity;
  timestamp: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all engine errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Whether the error aborts a run or is collected as a warning */
  public readonly severity: ErrorSeverity;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors come from input and configuration;
   * non-operational errors are bugs.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.severity = getSeverityForCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error is operational (expected error)
 */
export function isOperationalError(error: unknown): boolean {
  return isBaseError(error) ? error.isOperational : false;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

/**
 * Internal error for wrapping unknown errors
 */
class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context, false);
    this.name = 'WrappedError';
  }
}

/**
 * Wrap an unknown thrown value into a BaseError
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = GeneralErrorCodes.INTERNAL_ERROR
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, {
    details: { originalValue: error },
  });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
