/**
 * Reference Tables
 *
 * Rows produced by iterating the date engine, plus CSV/JSON serialization.
 * Tables are derived data; they can always be regenerated from the engine.
 */

import { type CalendarDate, type DateTuple, MAX_YEAR, isSupportedYear } from './calendar-date'
import { type CalendarConfig, DEFAULT_CALENDAR_CONFIG } from './config'
import { createEpochConverter } from './epoch-converter'
import { createOffsetConverter } from './offset-converter'
import { type GregorianDate, formatGregorianDate } from './gregorian'
import { cyclePosition, isLeapYear } from './leap-rule'
import { daysInYear } from './month-table'
import { fromOrdinal } from './ordinal'
import { type Weekday, weekdayOfSerial } from './date-arithmetic'
import { InvalidRangeError } from './errors'

export { InvalidRangeError } from './errors'

export type NowruzRow = {
  year: number
  isLeap: boolean
  cyclePosition: number
  daysInYear: number
  nowruz: GregorianDate
  solarHijriYear: number
}

export type DayRow = {
  date: CalendarDate
  ordinal: number
  gregorian: GregorianDate
  solarHijri: DateTuple
  weekday: Weekday
}

const CSV_HEADER = 'year,is_leap,cycle_position,days_in_year,nowruz,solar_hijri_year'

function requireYear(name: string, year: number): void {
  if (!isSupportedYear(year)) {
    throw new InvalidRangeError(`${name} must be a non-zero integer year within +/-${MAX_YEAR}, got ${year}`)
  }
}

// ============================================================================
// Generation
// ============================================================================

/** One row per year in [startYear, endYear]; year 0 is skipped */
export function nowruzTable(
  startYear: number,
  endYear: number,
  config: CalendarConfig = DEFAULT_CALENDAR_CONFIG,
): NowruzRow[] {
  requireYear('startYear', startYear)
  requireYear('endYear', endYear)
  if (startYear > endYear) {
    throw new InvalidRangeError(`startYear ${startYear} is after endYear ${endYear}`)
  }

  const epoch = createEpochConverter(config)
  const rows: NowruzRow[] = []
  for (let year = startYear; year <= endYear; year++) {
    if (year === 0) continue
    rows.push({
      year,
      isLeap: isLeapYear(year),
      cyclePosition: cyclePosition(year),
      daysInYear: daysInYear(year),
      nowruz: epoch.nowruzOf(year),
      solarHijriYear: year - config.solarHijriOffset,
    })
  }
  return rows
}

/** One row per day of the year, in order */
export function yearTable(year: number, config: CalendarConfig = DEFAULT_CALENDAR_CONFIG): DayRow[] {
  requireYear('year', year)

  const epoch = createEpochConverter(config)
  const offset = createOffsetConverter(config)
  const rows: DayRow[] = []
  for (let ordinal = 1; ordinal <= daysInYear(year); ordinal++) {
    const date = fromOrdinal(year, ordinal)
    const serial = epoch.toSerialDay(date)
    rows.push({
      date,
      ordinal,
      gregorian: epoch.toGregorian(date),
      solarHijri: offset.toSolarHijri(date),
      weekday: weekdayOfSerial(serial),
    })
  }
  return rows
}

// ============================================================================
// Serialization
// ============================================================================

export function toCsv(rows: readonly NowruzRow[]): string {
  const lines = rows.map((r) =>
    [
      r.year,
      r.isLeap ? 1 : 0,
      r.cyclePosition,
      r.daysInYear,
      formatGregorianDate(r.nowruz),
      r.solarHijriYear,
    ].join(','),
  )
  return [CSV_HEADER, ...lines].join('\n') + '\n'
}

export function toJson(rows: readonly NowruzRow[]): string {
  return JSON.stringify(
    rows.map((r) => ({ ...r, nowruz: formatGregorianDate(r.nowruz) })),
    null,
    2,
  )
}
