/**
 * Consolidated error system for date-intervals.
 *
 * All error classes extend DateIntervalError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import from either place.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DateIntervalErrorCode = {
  // Construction
  INVALID_RANGE: 'INVALID_RANGE',

  // Decoding / parsing
  INVALID_INPUT: 'INVALID_INPUT',
  PARSE_ERROR: 'PARSE_ERROR',

  // Closed-range operations
  RANGE_NOT_CLOSED: 'RANGE_NOT_CLOSED',
} as const

export type DateIntervalErrorCode = (typeof DateIntervalErrorCode)[keyof typeof DateIntervalErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DateIntervalError extends Error {
  readonly code: DateIntervalErrorCode

  constructor(code: DateIntervalErrorCode, message: string) {
    super(message)
    this.name = 'DateIntervalError'
    this.code = code
  }
}

// ============================================================================
// Construction Errors
// ============================================================================

export class InvalidRangeError extends DateIntervalError {
  constructor(message: string) {
    super(DateIntervalErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

// ============================================================================
// Decoding Errors
// ============================================================================

export class InvalidInputError extends DateIntervalError {
  constructor(message: string) {
    super(DateIntervalErrorCode.INVALID_INPUT, message)
    this.name = 'InvalidInputError'
  }
}

export class ParseError extends DateIntervalError {
  constructor(message: string) {
    super(DateIntervalErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Closed-Range Errors
// ============================================================================

export class RangeNotClosedError extends DateIntervalError {
  constructor(message: string) {
    super(DateIntervalErrorCode.RANGE_NOT_CLOSED, message)
    this.name = 'RangeNotClosedError'
  }
}
