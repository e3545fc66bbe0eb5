/**
 * CalendarDate
 *
 * The validated (year, month, day) value. Instances can only be obtained
 * through CalendarDate.of, which rejects invalid triples instead of
 * normalizing them, so every instance is a real day of the calendar.
 */

import { daysInMonth, isValidMonth } from './month-table'
import { InvalidDateError } from './errors'

export { InvalidDateError } from './errors'

export type DateTuple = readonly [year: number, month: number, day: number]

/**
 * Largest supported year magnitude. Serial days and the Gregorian day-number
 * intermediates stay exact integers for every year within it.
 */
export const MAX_YEAR = 1e12

/** Non-zero integer year within +/- MAX_YEAR */
export function isSupportedYear(year: number): boolean {
  return Number.isInteger(year) && year !== 0 && Math.abs(year) <= MAX_YEAR
}

export class CalendarDate {
  readonly year: number
  readonly month: number
  readonly day: number

  private constructor(year: number, month: number, day: number) {
    this.year = year
    this.month = month
    this.day = day
    Object.freeze(this)
  }

  /** Year 0 does not exist: year -1 is followed directly by year 1. */
  static isValid(year: number, month: number, day: number): boolean {
    if (!isSupportedYear(year)) return false
    if (!isValidMonth(month) || !Number.isInteger(day)) return false
    return day >= 1 && day <= daysInMonth(year, month)
  }

  static of(year: number, month: number, day: number): CalendarDate {
    if (!CalendarDate.isValid(year, month, day)) {
      throw new InvalidDateError(
        `Invalid date: ${year}/${month}/${day}. Year must be non-zero and within +/-${MAX_YEAR}, month 1-12, and day valid for that month.`,
      )
    }
    return new CalendarDate(year, month, day)
  }

  asTuple(): DateTuple {
    return [this.year, this.month, this.day]
  }

  compare(other: CalendarDate): number {
    return compareDates(this, other)
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day
  }

  isBefore(other: CalendarDate): boolean {
    return compareDates(this, other) < 0
  }

  isAfter(other: CalendarDate): boolean {
    return compareDates(this, other) > 0
  }

  toString(): string {
    const sign = this.year < 0 ? '-' : ''
    const y = String(Math.abs(this.year)).padStart(4, '0')
    const m = String(this.month).padStart(2, '0')
    const d = String(this.day).padStart(2, '0')
    return `${sign}${y}-${m}-${d}`
  }
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Lexicographic on (year, month, day). Negative years sort before positive
 * ones under plain integer comparison, which is also chronological order.
 */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.day !== b.day) return a.day < b.day ? -1 : 1
  return 0
}

export function dateEquals(a: CalendarDate, b: CalendarDate): boolean {
  return a.equals(b)
}

export function dateBefore(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) < 0
}

export function dateAfter(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) > 0
}
