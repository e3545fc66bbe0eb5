/**
 * Calendar Configuration
 *
 * Naming and offset constants for the calendar, held in an immutable value.
 * Converters are bound to a config when they are created; nothing reads a
 * mutable global.
 */

import { gregorianDaysInMonth } from './gregorian'
import { InvalidConfigError } from './errors'

export { InvalidConfigError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Gregorian month/day on which year 1 of the calendar begins */
export type NowruzAnchor = {
  readonly month: number
  readonly day: number
}

export type CalendarConfig = {
  /** Full name, e.g. "Iranian Calendar" */
  readonly name: string
  readonly shortName: string
  /** Suffix used in formatted dates, e.g. "IC" */
  readonly code: string
  /** year = Gregorian year + gregorianOffset, from Nowruz onwards */
  readonly gregorianOffset: number
  /** year = Solar Hijri year + solarHijriOffset */
  readonly solarHijriOffset: number
  readonly nowruz: NowruzAnchor
}

export type CalendarConfigInput = Partial<Omit<CalendarConfig, 'nowruz'>> & {
  nowruz?: Partial<NowruzAnchor>
}

// ============================================================================
// Defaults
// ============================================================================

export const GREGORIAN_OFFSET = 3000
export const SOLAR_HIJRI_OFFSET = 3621

/** Offsets beyond this would push converted years out of the supported range */
export const MAX_OFFSET = 1e9

/** Simplified Nowruz: always March 21, not derived from the equinox */
export const NOWRUZ_MONTH = 3
export const NOWRUZ_DAY = 21

export const DEFAULT_CALENDAR_CONFIG: CalendarConfig = Object.freeze({
  name: 'Iranian Calendar',
  shortName: 'Iranian',
  code: 'IC',
  gregorianOffset: GREGORIAN_OFFSET,
  solarHijriOffset: SOLAR_HIJRI_OFFSET,
  nowruz: Object.freeze({ month: NOWRUZ_MONTH, day: NOWRUZ_DAY }),
})

// ============================================================================
// Construction
// ============================================================================

function requireText(field: string, value: string): void {
  if (value.trim() === '') {
    throw new InvalidConfigError(`Config field '${field}' must be a non-empty string`)
  }
}

function requireInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidConfigError(`Config field '${field}' must be an integer, got ${value}`)
  }
}

function requireOffset(field: string, value: number): void {
  requireInteger(field, value)
  if (Math.abs(value) > MAX_OFFSET) {
    throw new InvalidConfigError(`Config field '${field}' must be within +/-${MAX_OFFSET}, got ${value}`)
  }
}

/**
 * Build a frozen config from overrides on top of the defaults.
 *
 * The Nowruz anchor must be a real Gregorian month/day that exists in every
 * year, so February 29 is rejected.
 */
export function defineCalendarConfig(input: CalendarConfigInput = {}): CalendarConfig {
  const nowruz = {
    month: input.nowruz?.month ?? DEFAULT_CALENDAR_CONFIG.nowruz.month,
    day: input.nowruz?.day ?? DEFAULT_CALENDAR_CONFIG.nowruz.day,
  }
  const config = {
    name: input.name ?? DEFAULT_CALENDAR_CONFIG.name,
    shortName: input.shortName ?? DEFAULT_CALENDAR_CONFIG.shortName,
    code: input.code ?? DEFAULT_CALENDAR_CONFIG.code,
    gregorianOffset: input.gregorianOffset ?? DEFAULT_CALENDAR_CONFIG.gregorianOffset,
    solarHijriOffset: input.solarHijriOffset ?? DEFAULT_CALENDAR_CONFIG.solarHijriOffset,
  }

  requireText('name', config.name)
  requireText('shortName', config.shortName)
  requireText('code', config.code)
  requireOffset('gregorianOffset', config.gregorianOffset)
  requireOffset('solarHijriOffset', config.solarHijriOffset)
  requireInteger('nowruz.month', nowruz.month)
  requireInteger('nowruz.day', nowruz.day)

  if (nowruz.month < 1 || nowruz.month > 12) {
    throw new InvalidConfigError(`Invalid Nowruz month: ${nowruz.month}`)
  }
  // Year 2001 is common, so this rejects Feb 29 along with real overflows
  if (nowruz.day < 1 || nowruz.day > gregorianDaysInMonth(2001, nowruz.month)) {
    throw new InvalidConfigError(`Invalid Nowruz day: ${nowruz.month}/${nowruz.day}`)
  }

  return Object.freeze({ ...config, nowruz: Object.freeze(nowruz) })
}
