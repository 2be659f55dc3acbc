import { describe, expect, it } from 'vitest'
import {
  toJulianDay,
  fromJulianDay,
  julianCentury,
  fractionalDay,
  isLeapYear,
  daysInMonth,
  isDroppedReformDay,
  dateToJD,
  jdToDate,
  J2000,
} from '../src/time/index.js'
import { DomainError } from '../src/errors.js'

// Meeus, Astronomical Algorithms, ch. 7 (example 7.a, 7.b and the test table)
const REFERENCE_DATES: ReadonlyArray<readonly [number, number, number, number]> = [
  [1957, 10, 4.81, 2436116.31],
  [2000, 1, 1.5, 2451545.0],
  [1987, 1, 27.0, 2446822.5],
  [1987, 6, 19.5, 2446966.0],
  [1988, 1, 27.0, 2447187.5],
  [1988, 6, 19.5, 2447332.0],
  [1900, 1, 1.0, 2415020.5],
  [1600, 1, 1.0, 2305447.5],
  [1600, 12, 31.0, 2305812.5],
  [837, 4, 10.3, 2026871.8],
  [-123, 12, 31.0, 1676496.5],
  [-122, 1, 1.0, 1676497.5],
  [-1000, 7, 12.5, 1356001.0],
  [-1000, 2, 29.0, 1355866.5],
  [-1001, 8, 17.9, 1355671.4],
  [-4712, 1, 1.5, 0.0],
]

function createRng(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (1664525 * state + 1013904223) >>> 0
    return state / 0x100000000
  }
}

describe('toJulianDay', () => {
  it.each(REFERENCE_DATES)('%i-%i-%f → JD %f', (year, month, day, expected) => {
    expect(Math.abs(toJulianDay(year, month, day) - expected)).toBeLessThan(1e-5)
  })

  it('accepts a CivilDateTime object', () => {
    expect(toJulianDay({ year: 2000, month: 1, day: 1.5 })).toBe(2451545.0)
  })

  it('puts the epoch at noon of -4712-01-01', () => {
    expect(toJulianDay(-4712, 1, 1.5)).toBe(0)
    expect(toJulianDay(-4712, 1, 1)).toBe(-0.5)
  })

  it('switches from the Julian to the Gregorian formula at the 1582 reform', () => {
    expect(toJulianDay(1582, 10, 4)).toBe(2299159.5)
    expect(toJulianDay(1582, 10, 15)).toBe(2299160.5)
    // 4 October (Julian) is followed directly by 15 October (Gregorian)
    expect(toJulianDay(1582, 10, 15) - toJulianDay(1582, 10, 4)).toBe(1)
  })

  it('uses the Julian formula for dates just before the reform', () => {
    expect(toJulianDay(1582, 10, 4.5)).toBe(2299160.0)
    expect(toJulianDay(1582, 9, 30)).toBe(2299155.5)
  })

  it('rejects the days dropped by the reform', () => {
    for (const day of [5, 9.5, 14, 14.999]) {
      expect(() => toJulianDay(1582, 10, day)).toThrow(DomainError)
    }
    expect(() => toJulianDay(1582, 10, 14)).toThrow(
      '1582-10-05 to 1582-10-14 were dropped by the Gregorian reform, got day 14',
    )
    expect(isDroppedReformDay(1582, 10, 4.99)).toBe(false)
    expect(isDroppedReformDay(1582, 10, 15)).toBe(false)
    expect(isDroppedReformDay(1583, 10, 10)).toBe(false)
  })

  it('is strictly increasing across October 1582', () => {
    const days = [1, 2, 3, 4, 4.5, 4.99, 15, 15.5, 16, 31]
    for (let i = 1; i < days.length; i++) {
      const prev = days[i - 1] ?? 0
      const cur = days[i] ?? 0
      expect(toJulianDay(1582, 10, cur)).toBeGreaterThan(toJulianDay(1582, 10, prev))
    }
    expect(toJulianDay(1582, 10, 16)).toBe(2299161.5)
  })

  it('handles year 0 and BCE years continuously', () => {
    expect(toJulianDay(-1, 12, 31)).toBe(1721056.5)
    expect(toJulianDay(0, 1, 1)).toBe(1721057.5)
    expect(toJulianDay(0, 12, 31)).toBe(1721422.5)
    expect(toJulianDay(1, 1, 1)).toBe(1721423.5)
    // year 0 is a Julian leap year
    expect(toJulianDay(0, 3, 1) - toJulianDay(0, 2, 28)).toBe(2)
  })

  it('is strictly increasing in (year, month, day) order', () => {
    const rand = createRng(0x5eeda11)
    const dates = Array.from({ length: 400 }, () => ({
      year: Math.floor(rand() * 8000) - 4700,
      month: 1 + Math.floor(rand() * 12),
      day: 1 + rand() * 27.99,
    })).filter(d => !isDroppedReformDay(d.year, d.month, d.day))
    dates.sort((a, b) => a.year - b.year || a.month - b.month || a.day - b.day)

    for (let i = 1; i < dates.length; i++) {
      const prev = dates[i - 1]
      const cur = dates[i]
      if (!prev || !cur) throw new Error('unreachable')
      if (prev.year === cur.year && prev.month === cur.month && prev.day === cur.day) continue
      expect(toJulianDay(cur)).toBeGreaterThan(toJulianDay(prev))
    }
  })

  it('rejects invalid months', () => {
    expect(() => toJulianDay(2000, 0, 1)).toThrow(DomainError)
    expect(() => toJulianDay(2000, 13, 1)).toThrow(DomainError)
    expect(() => toJulianDay(2000, 1.5, 1)).toThrow(DomainError)
  })

  it('rejects invalid days', () => {
    expect(() => toJulianDay(2000, 1, -0.1)).toThrow(DomainError)
    expect(() => toJulianDay(2000, 4, 31)).toThrow(DomainError)
    expect(() => toJulianDay(2001, 2, 29)).toThrow(DomainError)
    expect(() => toJulianDay(2000, 1, Number.NaN)).toThrow(DomainError)
    expect(() => toJulianDay(2000, 1, Number.POSITIVE_INFINITY)).toThrow(DomainError)
  })

  it('accepts day 0 and the fractional last day of a month', () => {
    expect(toJulianDay(2000, 1, 0)).toBe(toJulianDay(1999, 12, 31))
    expect(toJulianDay(2000, 2, 29.99)).toBeCloseTo(2451604.49, 6)
    expect(toJulianDay(1900, 2, 28.5)).toBe(2415079.0)
  })

  it('rejects a non-integer year', () => {
    expect(() => toJulianDay(2000.5, 1, 1)).toThrow(DomainError)
  })

  it('reports the offending field', () => {
    try {
      toJulianDay(2000, 4, 31)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(DomainError)
      if (err instanceof DomainError) {
        expect(err.field).toBe('day')
        expect(err.value).toBe(31)
        expect(err.message).toBe('Day must be in [0, 31) for 2000-04, got 31')
      }
    }
  })
})

describe('fromJulianDay', () => {
  it.each(REFERENCE_DATES)('round-trips %i-%i-%f', (year, month, day, jd) => {
    const date = fromJulianDay(jd)
    expect(date.year).toBe(year)
    expect(date.month).toBe(month)
    expect(date.day).toBeCloseTo(day, 6)
  })

  it('returns Julian calendar dates before the reform', () => {
    expect(fromJulianDay(2299159.5)).toEqual({ year: 1582, month: 10, day: 4 })
    expect(fromJulianDay(2299160.5)).toEqual({ year: 1582, month: 10, day: 15 })
  })

  it('rejects negative and non-finite Julian Days', () => {
    expect(() => fromJulianDay(-1)).toThrow(DomainError)
    expect(() => fromJulianDay(Number.NaN)).toThrow(DomainError)
  })
})

describe('julianCentury', () => {
  it('is zero at J2000.0 and one a Julian century later', () => {
    expect(julianCentury(J2000)).toBe(0)
    expect(julianCentury(J2000 + 36525)).toBe(1)
  })

  it('matches the 1992-04-12 reference value', () => {
    expect(julianCentury(2448724.5)).toBeCloseTo(-0.077221081451, 12)
  })
})

describe('calendar rules', () => {
  it('uses the Julian leap rule before 1582 and the Gregorian rule after', () => {
    expect(isLeapYear(1500)).toBe(true)
    expect(isLeapYear(1582)).toBe(false)
    expect(isLeapYear(1600)).toBe(true)
    expect(isLeapYear(1700)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
    expect(isLeapYear(0)).toBe(true)
    expect(isLeapYear(-4)).toBe(true)
    expect(isLeapYear(-1)).toBe(false)
  })

  it('counts days per month', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(1500, 2)).toBe(29)
    expect(daysInMonth(2023, 4)).toBe(30)
    expect(daysInMonth(2023, 12)).toBe(31)
    expect(() => daysInMonth(2023, 0)).toThrow(DomainError)
  })
})

describe('fractionalDay', () => {
  it('folds clock fields into the day', () => {
    expect(fractionalDay(12)).toBe(12)
    expect(fractionalDay(12, 6)).toBe(12.25)
    expect(fractionalDay(12, 18, 0, 0)).toBe(12.75)
    expect(fractionalDay(4, 19, 26, 24)).toBeCloseTo(4.81, 12)
  })

  it('rejects out-of-range clock fields', () => {
    expect(() => fractionalDay(1, 24)).toThrow(DomainError)
    expect(() => fractionalDay(1, 0, 60)).toThrow(DomainError)
    expect(() => fractionalDay(1, 0, 0, -1)).toThrow(DomainError)
    expect(() => fractionalDay(1.5, 1)).toThrow(DomainError)
  })
})

describe('Date bridge', () => {
  it('converts JavaScript Dates to Julian Days and back', () => {
    expect(dateToJD(new Date(Date.UTC(2000, 0, 1, 12)))).toBe(J2000)
    expect(dateToJD(new Date(Date.UTC(1970, 0, 1)))).toBe(2440587.5)
    expect(jdToDate(2448724.5).toISOString()).toBe('1992-04-12T00:00:00.000Z')
  })
})
