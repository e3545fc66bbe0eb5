/**
 * Epoch Converter
 *
 * Converts between the calendar and the proleptic Gregorian calendar through
 * a shared serial day (Julian Day Number). The calendar's serial day is the
 * epoch's serial day plus every whole year accumulated since year 1, plus the
 * ordinal within the target year. Both directions go through the serial day,
 * so the Nowruz boundary never needs separate handling.
 *
 * The epoch is the configured Nowruz month/day (March 21 by default) of
 * Gregorian year 1 - gregorianOffset, i.e. 3000 BCE. Nowruz is a fixed-date
 * approximation, not an equinox calculation.
 */

import { CalendarDate, MAX_YEAR } from './calendar-date'
import { CYCLE_DAYS, CYCLE_LENGTH, leapYearsBefore } from './leap-rule'
import { fromOrdinal, toOrdinal } from './ordinal'
import { daysInYear } from './month-table'
import {
  type GregorianDate,
  gregorianToSerial,
  isValidGregorianDate,
  serialToGregorian,
} from './gregorian'
import { type CalendarConfig, DEFAULT_CALENDAR_CONFIG } from './config'
import { InvalidDateError } from './errors'

export type { GregorianDate } from './gregorian'

export type EpochConverter = {
  readonly config: CalendarConfig
  /** Serial day of 1/1/1 */
  readonly epochSerial: number
  toSerialDay(date: CalendarDate): number
  fromSerialDay(serial: number): CalendarDate
  toGregorian(date: CalendarDate): GregorianDate
  fromGregorian(date: GregorianDate): CalendarDate
  /** Gregorian date of day 1 of month 1 in the given year */
  nowruzOf(year: number): GregorianDate
  /** Gregorian year containing the given day */
  gregorianYearOf(date: CalendarDate): number
}

// ============================================================================
// Year Accumulation
// ============================================================================

function nextYear(year: number): number {
  return year === -1 ? 1 : year + 1
}

function previousYear(year: number): number {
  return year === 1 ? -1 : year - 1
}

/**
 * Days from 1/1/1 to day 1 of the given year; negative before the epoch.
 * Year 0 is skipped, so year -1 ends the day before the epoch.
 */
export function daysBeforeYear(year: number): number {
  if (year >= 1) {
    return 365 * (year - 1) + leapYearsBefore(year)
  }
  return -(365 * -year + (leapYearsBefore(0) - leapYearsBefore(year)))
}

/** Year containing the day `offset` days after 1/1/1 */
function yearAtOffset(offset: number): number {
  // The cycle's mean year is CYCLE_DAYS / CYCLE_LENGTH, so the estimate is off by at most one
  const estimate = Math.floor((offset * CYCLE_LENGTH) / CYCLE_DAYS)
  let year = estimate >= 0 ? estimate + 1 : estimate
  while (daysBeforeYear(year) > offset) year = previousYear(year)
  while (daysBeforeYear(nextYear(year)) <= offset) year = nextYear(year)
  return year
}

// ============================================================================
// Factory
// ============================================================================

export function createEpochConverter(config: CalendarConfig = DEFAULT_CALENDAR_CONFIG): EpochConverter {
  const epochSerial = gregorianToSerial({
    year: 1 - config.gregorianOffset,
    month: config.nowruz.month,
    day: config.nowruz.day,
  })

  function toSerialDay(date: CalendarDate): number {
    return epochSerial + daysBeforeYear(date.year) + toOrdinal(date) - 1
  }

  const minSerial = epochSerial + daysBeforeYear(-MAX_YEAR)
  const maxSerial = epochSerial + daysBeforeYear(MAX_YEAR) + daysInYear(MAX_YEAR) - 1

  function fromSerialDay(serial: number): CalendarDate {
    if (!Number.isInteger(serial) || serial < minSerial || serial > maxSerial) {
      throw new InvalidDateError(`Serial day ${serial} is outside the supported range ${minSerial}..${maxSerial}`)
    }
    const offset = serial - epochSerial
    const year = yearAtOffset(offset)
    return fromOrdinal(year, offset - daysBeforeYear(year) + 1)
  }

  return {
    config,
    epochSerial,
    toSerialDay,
    fromSerialDay,

    toGregorian(date) {
      return serialToGregorian(toSerialDay(date))
    },

    fromGregorian(date) {
      if (!isValidGregorianDate(date.year, date.month, date.day)) {
        throw new InvalidDateError(`Invalid Gregorian date: ${date.year}-${date.month}-${date.day}`)
      }
      return fromSerialDay(gregorianToSerial(date))
    },

    nowruzOf(year) {
      return serialToGregorian(toSerialDay(CalendarDate.of(year, 1, 1)))
    },

    gregorianYearOf(date) {
      return serialToGregorian(toSerialDay(date)).year
    },
  }
}

// ============================================================================
// Default-Config Bindings
// ============================================================================

const defaultConverter = createEpochConverter()

export function toGregorian(date: CalendarDate): GregorianDate {
  return defaultConverter.toGregorian(date)
}

export function fromGregorian(date: GregorianDate): CalendarDate {
  return defaultConverter.fromGregorian(date)
}

export function toSerialDay(date: CalendarDate): number {
  return defaultConverter.toSerialDay(date)
}

export function fromSerialDay(serial: number): CalendarDate {
  return defaultConverter.fromSerialDay(serial)
}

export function nowruzOf(year: number): GregorianDate {
  return defaultConverter.nowruzOf(year)
}

export function gregorianYearOf(date: CalendarDate): number {
  return defaultConverter.gregorianYearOf(date)
}
