/**
 * Generators for calendar and Gregorian dates.
 *
 * Provides type-safe wrappers around fast-check's Arbitrary for domain types.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { CalendarDate } from '../../../src/calendar-date'
import { daysInMonth } from '../../../src/month-table'
import { gregorianDaysInMonth, type GregorianDate } from '../../../src/gregorian'

// ============================================================================
// Type-Safe Generator Aliases
// ============================================================================

export type GenCalendarDate = Arbitrary<CalendarDate>

export type GenGregorianDate = Arbitrary<GregorianDate>

// ============================================================================
// Builders
// ============================================================================

/**
 * Non-zero years in [min, max]. Defaults span well before the epoch and far
 * past the present era.
 */
export function yearGen(options?: { min?: number; max?: number }): Arbitrary<number> {
  const min = options?.min ?? -20000
  const max = options?.max ?? 20000
  return fc.integer({ min, max }).filter((y) => y !== 0)
}

export function calendarDateGen(options?: { minYear?: number; maxYear?: number }): GenCalendarDate {
  return yearGen({ min: options?.minYear, max: options?.maxYear }).chain((year) =>
    fc.integer({ min: 1, max: 12 }).chain((month) =>
      fc.integer({ min: 1, max: daysInMonth(year, month) }).map((day) => CalendarDate.of(year, month, day)),
    ),
  )
}

export function gregorianDateGen(options?: { minYear?: number; maxYear?: number }): GenGregorianDate {
  const min = options?.minYear ?? -20000
  const max = options?.maxYear ?? 20000
  return fc.integer({ min, max }).chain((year) =>
    fc.integer({ min: 1, max: 12 }).chain((month) =>
      fc.integer({ min: 1, max: gregorianDaysInMonth(year, month) }).map((day) => ({ year, month, day })),
    ),
  )
}

/** Dates clustered on the last days of the year, where leap handling matters */
export function yearEndDateGen(): GenCalendarDate {
  return yearGen().chain((year) =>
    fc.integer({ min: 28, max: daysInMonth(year, 12) }).map((day) => CalendarDate.of(year, 12, day)),
  )
}
