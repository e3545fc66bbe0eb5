/**
 * Solar Hijri Conversion
 *
 * Solar Hijri shares the month and leap structure exactly, so conversion only
 * shifts the year by the configured offset.
 */

import { CalendarDate, type DateTuple } from './calendar-date'
import { type CalendarConfig, DEFAULT_CALENDAR_CONFIG } from './config'

export type OffsetConverter = {
  readonly config: CalendarConfig
  toSolarHijri(date: CalendarDate): DateTuple
  /** Throws InvalidDateError when the shifted triple is not a valid date */
  fromSolarHijri(year: number, month: number, day: number): CalendarDate
}

export function createOffsetConverter(config: CalendarConfig = DEFAULT_CALENDAR_CONFIG): OffsetConverter {
  const offset = config.solarHijriOffset
  return {
    config,

    toSolarHijri(date) {
      return [date.year - offset, date.month, date.day]
    },

    fromSolarHijri(year, month, day) {
      return CalendarDate.of(year + offset, month, day)
    },
  }
}

const defaultConverter = createOffsetConverter()

export function toSolarHijri(date: CalendarDate): DateTuple {
  return defaultConverter.toSolarHijri(date)
}

export function fromSolarHijri(year: number, month: number, day: number): CalendarDate {
  return defaultConverter.fromSolarHijri(year, month, day)
}
