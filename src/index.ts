/**
 * solar-epoch-calendar
 *
 * Public API exports
 */

// Error system: base class, codes, all error classes
export {
  CalendarError, CalendarErrorCode,
  InvalidDateError, InvalidMonthError, OrdinalOutOfRangeError,
  InvalidConfigError, ParseError, InvalidFormatError,
  InvalidRangeError, StorageError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Configuration
export type { CalendarConfig, CalendarConfigInput, NowruzAnchor } from './config'
export {
  DEFAULT_CALENDAR_CONFIG, defineCalendarConfig,
  GREGORIAN_OFFSET, SOLAR_HIJRI_OFFSET, MAX_OFFSET, NOWRUZ_MONTH, NOWRUZ_DAY,
} from './config'

// Leap cycle
export type { CycleInfo } from './leap-rule'
export {
  isLeapYear, cyclePosition, cycleNumber, getCycleInfo,
  leapYearsInRange, leapYearsBefore,
  CYCLE_LENGTH, CYCLE_DAYS, LEAP_POSITIONS,
  AVERAGE_YEAR_LENGTH, TROPICAL_YEAR, ERROR_SECONDS_PER_YEAR,
} from './leap-rule'

// Month table
export type { MonthEntry } from './month-table'
export { MONTH_TABLE, MONTHS_PER_YEAR, daysInMonth, daysInYear, isValidMonth } from './month-table'

// Date value
export type { DateTuple } from './calendar-date'
export { CalendarDate, MAX_YEAR, isSupportedYear, compareDates, dateEquals, dateBefore, dateAfter } from './calendar-date'

// Ordinal mapping
export { toOrdinal, fromOrdinal } from './ordinal'

// Gregorian
export type { GregorianDate } from './gregorian'
export {
  isGregorianLeapYear, gregorianDaysInMonth, isValidGregorianDate, makeGregorianDate,
  MAX_GREGORIAN_YEAR, compareGregorianDates, gregorianToSerial, serialToGregorian,
  formatGregorianDate, parseGregorianDate,
} from './gregorian'

// Conversions
export type { EpochConverter } from './epoch-converter'
export {
  createEpochConverter, daysBeforeYear,
  toGregorian, fromGregorian, toSerialDay, fromSerialDay, nowruzOf, gregorianYearOf,
} from './epoch-converter'
export type { OffsetConverter } from './offset-converter'
export { createOffsetConverter, toSolarHijri, fromSolarHijri } from './offset-converter'

// Arithmetic
export type { Weekday } from './date-arithmetic'
export {
  WEEKDAYS, addDays, daysBetween, yearsBetween,
  dayOfWeek, weekdayIndex, weekdayOfSerial, weekdayIndexOfSerial,
} from './date-arithmetic'

// Presentation
export type { FormatStyle, Script } from './format'
export { formatDate, parseDate, parseFormatStyle, monthName, weekdayName, weekdayNames } from './format'

// Reference tables
export type { NowruzRow, DayRow } from './reference-table'
export { nowruzTable, yearTable, toCsv, toJson } from './reference-table'

// SQLite table store
export type { TableStore } from './sqlite-table-store'
export { createTableStore } from './sqlite-table-store'
