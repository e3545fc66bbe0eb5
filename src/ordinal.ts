/**
 * Ordinal day-of-year mapping (1 Farvardin = 1).
 */

import { CalendarDate, isSupportedYear } from './calendar-date'
import { MONTHS_PER_YEAR, daysInMonth, daysInYear } from './month-table'
import { InvalidDateError, OrdinalOutOfRangeError } from './errors'

export { OrdinalOutOfRangeError } from './errors'

export function toOrdinal(date: CalendarDate): number {
  let days = 0
  for (let m = 1; m < date.month; m++) {
    days += daysInMonth(date.year, m)
  }
  return days + date.day
}

export function fromOrdinal(year: number, ordinal: number): CalendarDate {
  if (!isSupportedYear(year)) {
    throw new InvalidDateError(`Invalid year: ${year}`)
  }
  const length = daysInYear(year)
  if (!Number.isInteger(ordinal) || ordinal < 1 || ordinal > length) {
    throw new OrdinalOutOfRangeError(`Ordinal day must be 1-${length} for year ${year}, got ${ordinal}`)
  }

  let remaining = ordinal
  let month = 1
  while (month < MONTHS_PER_YEAR && remaining > daysInMonth(year, month)) {
    remaining -= daysInMonth(year, month)
    month++
  }
  return CalendarDate.of(year, month, remaining)
}
