/**
 * Proleptic Gregorian Calendar
 *
 * Leap rule, validation and the Julian Day Number used as the serial day
 * shared by every calendar in this library. Years use astronomical numbering:
 * year 0 is 1 BCE and year -2999 is 3000 BCE.
 */

import { InvalidDateError } from './errors'

export type GregorianDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Largest supported Gregorian year magnitude: twice the calendar's bound, so
 * every calendar year maps inside it under any accepted offset. The
 * day-number arithmetic below stays exact up to here.
 */
export const MAX_GREGORIAN_YEAR = 2e12

const MONTH_DAYS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

function mod(n: number, m: number): number {
  return ((n % m) + m) % m
}

export function isGregorianLeapYear(year: number): boolean {
  return (mod(year, 4) === 0 && mod(year, 100) !== 0) || mod(year, 400) === 0
}

export function gregorianDaysInMonth(year: number, month: number): number {
  if (month === 2 && isGregorianLeapYear(year)) return 29
  return MONTH_DAYS[month] ?? 0
}

export function isValidGregorianDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || Math.abs(year) > MAX_GREGORIAN_YEAR) return false
  if (!Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= gregorianDaysInMonth(year, month)
}

export function makeGregorianDate(year: number, month: number, day: number): GregorianDate {
  if (!isValidGregorianDate(year, month, day)) {
    throw new InvalidDateError(`Invalid Gregorian date: ${year}-${month}-${day}`)
  }
  return Object.freeze({ year, month, day })
}

export function compareGregorianDates(a: GregorianDate, b: GregorianDate): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.day !== b.day) return a.day < b.day ? -1 : 1
  return 0
}

// ============================================================================
// Julian Day Number
// ============================================================================

/** Serial day of a Gregorian date; floors keep it valid for negative years */
export function gregorianToSerial(date: GregorianDate): number {
  const { year, month, day } = date
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

export function serialToGregorian(serial: number): GregorianDate {
  const a = serial + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return Object.freeze({ year, month, day })
}

// ============================================================================
// Text Form
// ============================================================================

/** ISO 8601 form; years outside 0000-9999 keep their sign */
export function formatGregorianDate(date: GregorianDate): string {
  const sign = date.year < 0 ? '-' : ''
  const y = String(Math.abs(date.year)).padStart(4, '0')
  const m = String(date.month).padStart(2, '0')
  const d = String(date.day).padStart(2, '0')
  return `${sign}${y}-${m}-${d}`
}

export function parseGregorianDate(str: string): GregorianDate {
  const match = /^(-?\d{4,})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) {
    throw new InvalidDateError(`Invalid Gregorian date format: '${str}'`)
  }
  return makeGregorianDate(parseInt(match[1]!, 10), parseInt(match[2]!, 10), parseInt(match[3]!, 10))
}
