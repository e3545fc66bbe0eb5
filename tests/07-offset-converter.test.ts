/**
 * Segment 07: Solar Hijri Offset Conversion Tests
 */

import { describe, it, expect } from 'vitest'
import { createOffsetConverter, toSolarHijri, fromSolarHijri } from '../src/offset-converter'
import { CalendarDate, InvalidDateError } from '../src/calendar-date'
import { defineCalendarConfig } from '../src/config'

describe('Solar Hijri Conversion', () => {
  it('subtracts 3621 from the year and keeps month and day', () => {
    expect(toSolarHijri(CalendarDate.of(5025, 11, 1))).toEqual([1404, 11, 1])
    expect(toSolarHijri(CalendarDate.of(5026, 1, 1))).toEqual([1405, 1, 1])
  })

  it('adds 3621 when converting back', () => {
    expect(fromSolarHijri(1404, 11, 1).asTuple()).toEqual([5025, 11, 1])
  })

  it('round-trips', () => {
    const d = CalendarDate.of(5025, 12, 30)
    const [y, m, day] = toSolarHijri(d)
    expect(fromSolarHijri(y, m, day).equals(d)).toBe(true)
  })

  it('validates the shifted date', () => {
    expect(fromSolarHijri(1404, 12, 30).asTuple()).toEqual([5025, 12, 30])
    expect(() => fromSolarHijri(1405, 12, 30)).toThrow(InvalidDateError)
    expect(() => fromSolarHijri(1404, 13, 1)).toThrow(InvalidDateError)
  })

  it('rejects a Solar Hijri year that lands on year 0', () => {
    expect(() => fromSolarHijri(-3621, 1, 1)).toThrow(InvalidDateError)
  })

  it('uses the configured offset', () => {
    const converter = createOffsetConverter(defineCalendarConfig({ solarHijriOffset: 100 }))
    expect(converter.toSolarHijri(CalendarDate.of(5025, 11, 1))).toEqual([4925, 11, 1])
    expect(converter.fromSolarHijri(4925, 11, 1).asTuple()).toEqual([5025, 11, 1])
  })
})
