/**
 * Consolidated error system for the calendar CSP solver.
 *
 * All error classes extend CspError, which carries a typed error code.
 * An unsatisfiable problem is not an error: solve() returns null for it.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CspErrorCode = {
  // Solver input validation
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_RANGE: 'INVALID_RANGE',

  // Date & constraint parsing
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type CspErrorCode = (typeof CspErrorCode)[keyof typeof CspErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CspError extends Error {
  readonly code: CspErrorCode

  constructor(code: CspErrorCode, message: string) {
    super(message)
    this.name = 'CspError'
    this.code = code
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class InvalidInputError extends CspError {
  constructor(message: string) {
    super(CspErrorCode.INVALID_INPUT, message)
    this.name = 'InvalidInputError'
  }
}

export class InvalidRangeError extends CspError {
  constructor(message: string) {
    super(CspErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export class ParseError extends CspError {
  constructor(message: string) {
    super(CspErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
