/**
 * Month Table
 *
 * Six 31-day months, five 30-day months, and a final month of 29 days
 * (30 in leap years).
 */

import { isLeapYear } from './leap-rule'
import { InvalidMonthError } from './errors'

export { InvalidMonthError } from './errors'

export type MonthEntry = {
  readonly month: number
  /** Length in a common year */
  readonly days: number
}

export const MONTHS_PER_YEAR = 12

export const MONTH_TABLE: readonly MonthEntry[] = Object.freeze(
  [31, 31, 31, 31, 31, 31, 30, 30, 30, 30, 30, 29].map((days, i) =>
    Object.freeze({ month: i + 1, days }),
  ),
)

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= MONTHS_PER_YEAR
}

export function daysInMonth(year: number, month: number): number {
  const entry = isValidMonth(month) ? MONTH_TABLE[month - 1] : undefined
  if (!entry) {
    throw new InvalidMonthError(`Invalid month: ${month}. Must be 1-12.`)
  }
  if (month === MONTHS_PER_YEAR && isLeapYear(year)) return entry.days + 1
  return entry.days
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}
