/**
 * Formatting & Parsing
 *
 * Presentation layer over CalendarDate. Month and weekday names live here and
 * nowhere in the date engine.
 */

import { CalendarDate } from './calendar-date'
import { type CalendarConfig, DEFAULT_CALENDAR_CONFIG } from './config'
import { createOffsetConverter } from './offset-converter'
import { type Weekday, WEEKDAYS } from './date-arithmetic'
import { type Result, Ok, Err } from './result'
import { InvalidFormatError, ParseError } from './errors'

export { InvalidFormatError, ParseError } from './errors'

export type FormatStyle = 'persian' | 'latin' | 'numeric' | 'compact' | 'full'
export type Script = 'persian' | 'latin'

const FORMAT_STYLES: readonly FormatStyle[] = ['persian', 'latin', 'numeric', 'compact', 'full']

// ============================================================================
// Names
// ============================================================================

const MONTH_NAMES: Record<Script, readonly string[]> = {
  persian: [
    'فروردین', 'اردیبهشت', 'خرداد',
    'تیر', 'مرداد', 'شهریور',
    'مهر', 'آبان', 'آذر',
    'دی', 'بهمن', 'اسفند',
  ],
  latin: [
    'Farvardin', 'Ordibehesht', 'Khordad',
    'Tir', 'Mordad', 'Shahrivar',
    'Mehr', 'Aban', 'Azar',
    'Dey', 'Bahman', 'Esfand',
  ],
}

const WEEKDAY_NAMES: Record<Script, Record<Weekday, string>> = {
  persian: {
    sat: 'شنبه',
    sun: 'یکشنبه',
    mon: 'دوشنبه',
    tue: 'سه‌شنبه',
    wed: 'چهارشنبه',
    thu: 'پنجشنبه',
    fri: 'جمعه',
  },
  latin: {
    sat: 'Shanbe',
    sun: 'Yekshanbe',
    mon: 'Doshanbe',
    tue: 'Seshanbe',
    wed: 'Chaharshanbe',
    thu: 'Panjshanbe',
    fri: 'Jome',
  },
}

export function monthName(month: number, script: Script = 'persian'): string {
  const name = MONTH_NAMES[script][month - 1]
  if (name === undefined) {
    throw new InvalidFormatError(`No month name for month ${month}`)
  }
  return name
}

export function weekdayName(weekday: Weekday, script: Script = 'persian'): string {
  return WEEKDAY_NAMES[script][weekday]
}

export function weekdayNames(script: Script = 'persian'): string[] {
  return WEEKDAYS.map((w) => WEEKDAY_NAMES[script][w])
}

// ============================================================================
// Formatting
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  const sign = n < 0 ? '-' : ''
  return sign + String(Math.abs(n)).padStart(4, '0')
}

export function parseFormatStyle(text: string): FormatStyle {
  const style = FORMAT_STYLES.find((s) => s === text)
  if (style === undefined) {
    throw new InvalidFormatError(`Unknown format: '${text}'`)
  }
  return style
}

/**
 * Render a date in one of the display styles:
 * - persian: "1 بهمن 5025 IC"
 * - latin:   "1 Bahman 5025 IC"
 * - numeric: "5025-11-01"
 * - compact: "5025/11/01"
 * - full:    "1 بهمن 5025 IC (1404 SH)"
 */
export function formatDate(
  date: CalendarDate,
  style: FormatStyle = 'persian',
  config: CalendarConfig = DEFAULT_CALENDAR_CONFIG,
): string {
  const [year, month, day] = date.asTuple()
  switch (style) {
    case 'persian':
    case 'latin':
      return `${day} ${monthName(month, style)} ${year} ${config.code}`
    case 'numeric':
      return `${pad4(year)}-${pad2(month)}-${pad2(day)}`
    case 'compact':
      return `${pad4(year)}/${pad2(month)}/${pad2(day)}`
    case 'full': {
      const [shYear] = createOffsetConverter(config).toSolarHijri(date)
      return `${day} ${monthName(month, 'persian')} ${year} ${config.code} (${shYear} SH)`
    }
    default:
      throw new InvalidFormatError(`Unknown format: '${String(style)}'`)
  }
}

// ============================================================================
// Parsing
// ============================================================================

/** Accepts YYYY-MM-DD or YYYY/MM/DD, with an optional leading minus */
export function parseDate(str: string): Result<CalendarDate, ParseError> {
  const match = /^(-?\d{1,})([-/])(\d{1,2})\2(\d{1,2})$/.exec(str.trim())
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1]!, 10)
  const month = parseInt(match[3]!, 10)
  const day = parseInt(match[4]!, 10)

  if (!CalendarDate.isValid(year, month, day)) {
    return Err(new ParseError(`Invalid date: '${str}'`))
  }
  return Ok(CalendarDate.of(year, month, day))
}
