/**
 * 33-Year Leap Cycle
 *
 * A year's position in the cycle is ((year - 1) mod 33) + 1. The year is leap
 * when that position is one of LEAP_POSITIONS. The positions are the
 * calendar's defining data and are not derived from a formula.
 */

export const CYCLE_LENGTH = 33

export const LEAP_POSITIONS: readonly number[] = Object.freeze([1, 5, 9, 13, 17, 22, 26, 30])

const LEAP_POSITION_SET: ReadonlySet<number> = new Set(LEAP_POSITIONS)

/** Days in one full cycle: 33 * 365 + 8 */
export const CYCLE_DAYS = CYCLE_LENGTH * 365 + LEAP_POSITIONS.length

/** Mean year length quoted for the calendar, in days (the 33-year cycle alone averages CYCLE_DAYS / 33) */
export const AVERAGE_YEAR_LENGTH = 365.24219852
export const TROPICAL_YEAR = 365.24219
export const ERROR_SECONDS_PER_YEAR = Math.abs(AVERAGE_YEAR_LENGTH - TROPICAL_YEAR) * 86400

export type CycleInfo = {
  year: number
  cycleNumber: number
  cyclePosition: number
  isLeap: boolean
  /** 0 when the year itself is leap */
  yearsToNextLeap: number
  cycleLength: number
}

// Floored modulo; JS % keeps the sign of the dividend
function mod(n: number, m: number): number {
  return ((n % m) + m) % m
}

export function cyclePosition(year: number): number {
  return mod(year - 1, CYCLE_LENGTH) + 1
}

export function cycleNumber(year: number): number {
  return Math.floor((year - 1) / CYCLE_LENGTH) + 1
}

export function isLeapYear(year: number): boolean {
  return LEAP_POSITION_SET.has(cyclePosition(year))
}

/**
 * Signed prefix count of leap years: leapYearsBefore(b) - leapYearsBefore(a)
 * is the number of leap years in [a, b), with years counted as plain integers
 * (so a range that spans 0 includes it; callers skip year 0 themselves).
 */
export function leapYearsBefore(year: number): number {
  const offset = year - 1
  const cycles = Math.floor(offset / CYCLE_LENGTH)
  const remainder = offset - cycles * CYCLE_LENGTH
  let partial = 0
  for (const position of LEAP_POSITIONS) {
    if (position <= remainder) partial++
  }
  return cycles * LEAP_POSITIONS.length + partial
}

export function leapYearsInRange(startYear: number, endYear: number): number[] {
  const years: number[] = []
  for (let year = startYear; year <= endYear; year++) {
    if (year !== 0 && isLeapYear(year)) years.push(year)
  }
  return years
}

export function getCycleInfo(year: number): CycleInfo {
  const position = cyclePosition(year)
  const isLeap = LEAP_POSITION_SET.has(position)

  let yearsToNextLeap = 0
  if (!isLeap) {
    const next = LEAP_POSITIONS.find((p) => p > position)
    yearsToNextLeap = next !== undefined ? next - position : CYCLE_LENGTH - position + 1
  }

  return {
    year,
    cycleNumber: cycleNumber(year),
    cyclePosition: position,
    isLeap,
    yearsToNextLeap,
    cycleLength: CYCLE_LENGTH,
  }
}
