/**
 * Error system for civil-time.
 *
 * All error classes extend DateTimeError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DateTimeErrorCode = {
  // Values and arithmetic
  RANGE: 'RANGE',
  UNSUPPORTED: 'UNSUPPORTED',
  NULL_ARGUMENT: 'NULL_ARGUMENT',
  ARITHMETIC: 'ARITHMETIC',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Text
  PARSE: 'PARSE',

  // Zones
  ZONE_RECONCILIATION: 'ZONE_RECONCILIATION',
  UNKNOWN_ZONE: 'UNKNOWN_ZONE',
  CORRUPT_DATA: 'CORRUPT_DATA',
} as const

export type DateTimeErrorCode = (typeof DateTimeErrorCode)[keyof typeof DateTimeErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DateTimeError extends Error {
  readonly code: DateTimeErrorCode

  constructor(code: DateTimeErrorCode, message: string) {
    super(message)
    this.name = 'DateTimeError'
    this.code = code
  }
}

// ============================================================================
// Value Errors
// ============================================================================

export class DateTimeRangeError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.RANGE, message)
    this.name = 'DateTimeRangeError'
  }
}

export class UnsupportedFieldError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.UNSUPPORTED, message)
    this.name = 'UnsupportedFieldError'
  }
}

export class NullArgumentError extends DateTimeError {
  constructor(name: string) {
    super(DateTimeErrorCode.NULL_ARGUMENT, `${name} must not be null`)
    this.name = 'NullArgumentError'
  }
}

export class ArithmeticOverflowError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.ARITHMETIC, message)
    this.name = 'ArithmeticOverflowError'
  }
}

export class InvalidArgumentError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export class ParseError extends DateTimeError {
  readonly parsedText: string
  readonly errorIndex: number

  constructor(message: string, parsedText = '', errorIndex = 0) {
    super(DateTimeErrorCode.PARSE, message)
    this.name = 'ParseError'
    this.parsedText = parsedText
    this.errorIndex = errorIndex
  }
}

// ============================================================================
// Zone Errors
// ============================================================================

export class ZoneReconciliationError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.ZONE_RECONCILIATION, message)
    this.name = 'ZoneReconciliationError'
  }
}

export class ZoneRulesError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.UNKNOWN_ZONE, message)
    this.name = 'ZoneRulesError'
  }
}

export class CorruptDataError extends DateTimeError {
  constructor(message: string) {
    super(DateTimeErrorCode.CORRUPT_DATA, message)
    this.name = 'CorruptDataError'
  }
}

// ============================================================================
// Guards
// ============================================================================

/** Throws NullArgumentError when a value that the types forbid arrives as null or undefined. */
export function requireNonNull<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) throw new NullArgumentError(name)
  return value
}
