/**
 * Date Arithmetic
 *
 * Day offsets, differences and weekdays, all computed on the serial day so
 * month and year lengths never need special cases.
 */

import { type CalendarDate, compareDates } from './calendar-date'
import { fromSerialDay, toSerialDay } from './epoch-converter'

/** Persian week order: the week starts on Saturday */
export type Weekday = 'sat' | 'sun' | 'mon' | 'tue' | 'wed' | 'thu' | 'fri'

export const WEEKDAYS: readonly Weekday[] = ['sat', 'sun', 'mon', 'tue', 'wed', 'thu', 'fri']

export function addDays(date: CalendarDate, n: number): CalendarDate {
  return fromSerialDay(toSerialDay(date) + n)
}

/** Positive when b is later than a */
export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return toSerialDay(b) - toSerialDay(a)
}

/**
 * Complete years from a to b. A year is complete once b reaches a's month/day;
 * the count is negative when b is earlier.
 */
export function yearsBetween(a: CalendarDate, b: CalendarDate): number {
  if (compareDates(b, a) < 0) {
    const forward = yearsBetween(b, a)
    return forward === 0 ? 0 : -forward
  }

  // Year 0 does not exist, so crossing the epoch spans one integer fewer
  let years = b.year - a.year
  if (a.year < 0 && b.year > 0) years--

  if (b.month < a.month || (b.month === a.month && b.day < a.day)) years--
  return years
}

/** 0 = Saturday ... 6 = Friday */
export function weekdayIndexOfSerial(serial: number): number {
  // Serial day 0 (Julian Day 0) was a Monday, index 2 in a Saturday-first week
  return (((serial + 2) % 7) + 7) % 7
}

export function weekdayIndex(date: CalendarDate): number {
  return weekdayIndexOfSerial(toSerialDay(date))
}

export function weekdayOfSerial(serial: number): Weekday {
  return WEEKDAYS[weekdayIndexOfSerial(serial)]!
}

export function dayOfWeek(date: CalendarDate): Weekday {
  return weekdayOfSerial(toSerialDay(date))
}
