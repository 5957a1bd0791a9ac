/**
 * Consolidated error system for temporal-iso-core.
 *
 * All error classes extend TemporalError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are working with.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TemporalErrorCode = {
  // Out-of-range values, invalid option strings, unrepresentable results
  RANGE: 'RANGE',

  // Option values of the wrong type
  TYPE: 'TYPE',
} as const

export type TemporalErrorCode = (typeof TemporalErrorCode)[keyof typeof TemporalErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TemporalError extends Error {
  readonly code: TemporalErrorCode

  constructor(code: TemporalErrorCode, message: string) {
    super(message)
    this.name = 'TemporalError'
    this.code = code
  }
}

// ============================================================================
// Range Errors
// ============================================================================

export class TemporalRangeError extends TemporalError {
  constructor(message: string) {
    super(TemporalErrorCode.RANGE, message)
    this.name = 'TemporalRangeError'
  }
}

// ============================================================================
// Type Errors
// ============================================================================

export class TemporalTypeError extends TemporalError {
  constructor(message: string) {
    super(TemporalErrorCode.TYPE, message)
    this.name = 'TemporalTypeError'
  }
}

/** True for any error raised by this library. */
export function isTemporalError(value: unknown): value is TemporalError {
  return value instanceof TemporalError
}
