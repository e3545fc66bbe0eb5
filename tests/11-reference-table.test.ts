/**
 * Segment 11: Reference Table Tests
 *
 * Dependencies: Segment 06 (Epoch Converter), Segment 07 (Offset Converter)
 */

import { describe, it, expect } from 'vitest'
import { nowruzTable, yearTable, toCsv, toJson, InvalidRangeError } from '../src/reference-table'
import { defineCalendarConfig } from '../src/config'
import { MAX_YEAR } from '../src/calendar-date'

describe('Reference Tables', () => {
  describe('nowruzTable', () => {
    it('produces one row per year', () => {
      expect(nowruzTable(5025, 5027)).toEqual([
        {
          year: 5025,
          isLeap: true,
          cyclePosition: 9,
          daysInYear: 366,
          nowruz: { year: 2025, month: 3, day: 20 },
          solarHijriYear: 1404,
        },
        {
          year: 5026,
          isLeap: false,
          cyclePosition: 10,
          daysInYear: 365,
          nowruz: { year: 2026, month: 3, day: 21 },
          solarHijriYear: 1405,
        },
        {
          year: 5027,
          isLeap: false,
          cyclePosition: 11,
          daysInYear: 365,
          nowruz: { year: 2027, month: 3, day: 21 },
          solarHijriYear: 1406,
        },
      ])
    })

    it('skips year 0 across the epoch', () => {
      const rows = nowruzTable(-1, 1)
      expect(rows.map((r) => r.year)).toEqual([-1, 1])
      expect(rows[0]?.nowruz).toEqual({ year: -3000, month: 3, day: 21 })
      expect(rows[1]?.nowruz).toEqual({ year: -2999, month: 3, day: 21 })
    })

    it('uses the configured Solar Hijri offset', () => {
      const rows = nowruzTable(5026, 5026, defineCalendarConfig({ solarHijriOffset: 26 }))
      expect(rows[0]?.solarHijriYear).toBe(5000)
    })

    it('rejects a reversed range', () => {
      expect(() => nowruzTable(5, 1)).toThrow(InvalidRangeError)
    })

    it('rejects year 0 as a bound', () => {
      expect(() => nowruzTable(0, 3)).toThrow(InvalidRangeError)
    })

    it('rejects bounds past the supported year range', () => {
      expect(() => nowruzTable(MAX_YEAR, MAX_YEAR + 1)).toThrow(InvalidRangeError)
      expect(nowruzTable(MAX_YEAR, MAX_YEAR).map((r) => r.year)).toEqual([MAX_YEAR])
    })
  })

  describe('yearTable', () => {
    it('has one row per day', () => {
      expect(yearTable(5025)).toHaveLength(366)
      expect(yearTable(5026)).toHaveLength(365)
    })

    it('starts on Nowruz and ends on the leap day', () => {
      const rows = yearTable(5025)
      const first = rows[0]
      const last = rows[rows.length - 1]
      expect(first?.date.asTuple()).toEqual([5025, 1, 1])
      expect(first?.ordinal).toBe(1)
      expect(first?.gregorian).toEqual({ year: 2025, month: 3, day: 20 })
      expect(first?.solarHijri).toEqual([1404, 1, 1])
      expect(first?.weekday).toBe('thu')
      expect(last?.date.asTuple()).toEqual([5025, 12, 30])
      expect(last?.gregorian).toEqual({ year: 2026, month: 3, day: 20 })
    })
  })

  describe('serialization', () => {
    it('writes CSV with a header', () => {
      expect(toCsv(nowruzTable(5025, 5026))).toBe(
        'year,is_leap,cycle_position,days_in_year,nowruz,solar_hijri_year\n' +
          '5025,1,9,366,2025-03-20,1404\n' +
          '5026,0,10,365,2026-03-21,1405\n',
      )
    })

    it('writes JSON with ISO Nowruz dates', () => {
      const parsed: unknown = JSON.parse(toJson(nowruzTable(-1, -1)))
      expect(parsed).toEqual([
        {
          year: -1,
          isLeap: false,
          cyclePosition: 32,
          daysInYear: 365,
          nowruz: '-3000-03-21',
          solarHijriYear: -3622,
        },
      ])
    })
  })
})
