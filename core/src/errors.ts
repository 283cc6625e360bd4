/**
 * Standardized Error Handling for @sortid/core
 *
 * This module provides a unified error handling approach with:
 * - A base error class with error codes
 * - Error codes enum for categorization
 * - Utilities for converting and classifying errors
 *
 * @example Basic Usage
 * ```typescript
 * import { Id, isInvalidIdError } from '@sortid/core'
 *
 * try {
 *   Id.fromString(input)
 * } catch (error) {
 *   if (isInvalidIdError(error)) {
 *     console.error(error.details?.reason)
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 * @module errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Standardized error codes.
 * These codes categorize errors for logging and client handling.
 */
export enum ErrorCode {
  // Input errors
  INVALID_ID = 'INVALID_ID',
  UNSUPPORTED_VALUE = 'UNSUPPORTED_VALUE',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Everything else
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/** Why an id failed to parse */
export type InvalidIdReason = 'length' | 'character' | 'checksum' | 'byte-length'

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all sortid errors.
 * Provides error code, metadata, and serialization support.
 */
export class SortIdError extends Error {
  /** Error code for categorization */
  readonly code: ErrorCode

  /** Additional metadata about the error */
  readonly details?: Record<string, unknown> | undefined

  /** Original error that caused this error */
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    options?: {
      details?: Record<string, unknown> | undefined
      cause?: Error | undefined
    }
  ) {
    super(message)
    this.name = 'SortIdError'
    this.code = code
    if (options?.details !== undefined) {
      this.details = options.details
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }

    // V8's captureStackTrace is a non-standard extension
    const ErrorWithCapture = Error as typeof Error & { captureStackTrace?: (target: object, constructor: Function) => void }
    if (typeof ErrorWithCapture.captureStackTrace === 'function') {
      ErrorWithCapture.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Convert error to a JSON-serializable object
   */
  toJSON(): ErrorObject {
    return {
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    }
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Invalid id - the text or bytes do not describe an id.
 * The only failure the codec and the id constructors raise.
 */
export class InvalidIdError extends SortIdError {
  readonly reason: InvalidIdReason

  constructor(
    reason: InvalidIdReason,
    details?: { length?: number; position?: number; char?: string }
  ) {
    super('sortid: invalid id', ErrorCode.INVALID_ID, { details: { reason, ...details } })
    this.name = 'InvalidIdError'
    this.reason = reason
  }
}

/**
 * Unsupported value - a boundary helper was handed a type it cannot read
 */
export class UnsupportedValueError extends SortIdError {
  constructor(received: string) {
    super(`sortid: unsupported value type: ${received}`, ErrorCode.UNSUPPORTED_VALUE, {
      details: { received },
    })
    this.name = 'UnsupportedValueError'
  }
}

/**
 * Invalid config error - thrown when configuration or options are invalid
 */
export class InvalidConfigError extends SortIdError {
  constructor(
    message: string,
    details?: { field?: string; errors?: string[] }
  ) {
    super(message, ErrorCode.INVALID_CONFIG, { details })
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Error Objects
// ============================================================================

/**
 * Serialized error format
 */
export interface ErrorObject {
  /** Human-readable error message */
  error: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Additional details about the error */
  details?: Record<string, unknown>
}

/**
 * Converts an error to a JSON-serializable object.
 * Useful for logging or printing machine-readable output.
 */
export function toErrorObject(error: unknown): ErrorObject {
  if (isSortIdError(error)) {
    return error.toJSON()
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      code: ErrorCode.INTERNAL_ERROR,
    }
  }

  return {
    error: String(error) || 'Unknown error',
    code: ErrorCode.INTERNAL_ERROR,
  }
}

/**
 * Type guard to check if a value is a SortIdError
 */
export function isSortIdError(error: unknown): error is SortIdError {
  return error instanceof SortIdError
}

/**
 * Type guard to check if a value is an invalid id error
 */
export function isInvalidIdError(error: unknown): error is InvalidIdError {
  return error instanceof InvalidIdError || (
    error instanceof SortIdError && error.code === ErrorCode.INVALID_ID
  )
}

/**
 * Wraps an error with a SortIdError if it isn't already one.
 * Preserves the original error as the cause.
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): SortIdError {
  if (error instanceof SortIdError) {
    return error
  }

  const cause = error instanceof Error ? error : undefined
  const errorMessage = message ?? (error instanceof Error ? error.message : String(error))

  return new SortIdError(errorMessage, code, { cause })
}
