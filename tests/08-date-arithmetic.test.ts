/**
 * Segment 08: Date Arithmetic Tests
 */

import { describe, it, expect } from 'vitest'
import {
  addDays,
  daysBetween,
  yearsBetween,
  dayOfWeek,
  weekdayIndex,
  weekdayOfSerial,
} from '../src/date-arithmetic'
import { CalendarDate } from '../src/calendar-date'

const d = (year: number, month: number, day: number) => CalendarDate.of(year, month, day)

describe('Date Arithmetic', () => {
  describe('addDays', () => {
    it('steps through the leap day into the next year', () => {
      expect(addDays(d(5025, 12, 29), 1).asTuple()).toEqual([5025, 12, 30])
      expect(addDays(d(5025, 12, 29), 2).asTuple()).toEqual([5026, 1, 1])
    })

    it('steps backwards across the epoch', () => {
      expect(addDays(d(1, 1, 1), -1).asTuple()).toEqual([-1, 12, 29])
    })

    it('adding zero returns an equal date', () => {
      expect(addDays(d(5025, 6, 31), 0).equals(d(5025, 6, 31))).toBe(true)
    })
  })

  describe('daysBetween', () => {
    it('counts days to the next Nowruz', () => {
      expect(daysBetween(d(5025, 11, 2), d(5026, 1, 1))).toBe(59)
    })

    it('is negative when the second date is earlier', () => {
      expect(daysBetween(d(5026, 1, 1), d(5025, 11, 2))).toBe(-59)
    })
  })

  describe('yearsBetween', () => {
    it('counts complete anniversaries', () => {
      expect(yearsBetween(d(5025, 11, 2), d(5026, 11, 2))).toBe(1)
      expect(yearsBetween(d(5025, 11, 2), d(5026, 11, 1))).toBe(0)
    })

    it('is negative going backwards', () => {
      expect(yearsBetween(d(5026, 11, 2), d(5025, 11, 2))).toBe(-1)
      expect(yearsBetween(d(5026, 11, 1), d(5025, 11, 2))).toBe(0)
    })

    it('does not count year 0 when crossing the epoch', () => {
      expect(yearsBetween(d(-1, 1, 1), d(1, 1, 1))).toBe(1)
    })
  })

  describe('weekdays', () => {
    it('Nowruz 5026 (2026-03-21) is a Saturday', () => {
      expect(dayOfWeek(d(5026, 1, 1))).toBe('sat')
      expect(weekdayIndex(d(5026, 1, 1))).toBe(0)
    })

    it('5025-11-02 (2026-01-21) is a Wednesday', () => {
      expect(dayOfWeek(d(5025, 11, 2))).toBe('wed')
      expect(weekdayIndex(d(5025, 11, 2))).toBe(4)
    })

    it('Julian Day 0 is a Monday', () => {
      expect(weekdayOfSerial(0)).toBe('mon')
      expect(weekdayOfSerial(-1)).toBe('sun')
    })
  })
})
