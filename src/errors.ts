/**
 * Consolidated error system for the calendar library.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * wherever the failing operation lives.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Date engine
  INVALID_DATE: 'INVALID_DATE',
  INVALID_MONTH: 'INVALID_MONTH',
  ORDINAL_OUT_OF_RANGE: 'ORDINAL_OUT_OF_RANGE',

  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Presentation
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_FORMAT: 'INVALID_FORMAT',

  // Reference tables
  INVALID_RANGE: 'INVALID_RANGE',
  STORAGE: 'STORAGE',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Date Engine Errors
// ============================================================================

export class InvalidDateError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

export class InvalidMonthError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_MONTH, message)
    this.name = 'InvalidMonthError'
  }
}

export class OrdinalOutOfRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.ORDINAL_OUT_OF_RANGE, message)
    this.name = 'OrdinalOutOfRangeError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Presentation Errors
// ============================================================================

export class ParseError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidFormatError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_FORMAT, message)
    this.name = 'InvalidFormatError'
  }
}

// ============================================================================
// Reference Table Errors
// ============================================================================

export class InvalidRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

export class StorageError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.STORAGE, message)
    this.name = 'StorageError'
  }
}
