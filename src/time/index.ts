/**
 * time — Calendar dates, Julian Day arithmetic and Julian centuries.
 *
 * The calendar ↔ Julian Day conversions follow Meeus, Astronomical
 * Algorithms (2nd ed.), ch. 7. Dates before 1582-10-15 are taken in the
 * proleptic Julian calendar, later dates in the Gregorian calendar, so
 * 1582-10-04 (Julian) is immediately followed by 1582-10-15 (Gregorian).
 *
 * Years are astronomical: 0 = 1 BCE, -1 = 2 BCE.
 *
 * The date is used directly as dynamical time; no ΔT is applied.
 */

import type { CivilDateTime, JulianCentury, JulianDay } from '../types.js'
import { DomainError } from '../errors.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00 TT) */
export const J2000 = 2451545.0

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

/** First JD of the Gregorian calendar (1582-10-15 00:00 is JD 2299160.5) */
export const GREGORIAN_START_JD = 2299160.5

/** First Gregorian date, as [year, month, day] */
export const GREGORIAN_START: readonly [number, number, number] = [1582, 10, 15]

/** Day after the last Julian date, 1582-10-04 */
const FIRST_DROPPED_DAY = 5

/** JD of the Unix epoch, 1970-01-01 00:00 UTC */
const UNIX_EPOCH_JD = 2440587.5

const MS_PER_DAY = 86400000

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

// ─── Calendar rules ──────────────────────────────────────────────────────────

/**
 * Leap-year rule of the calendar in force for the given year.
 * Julian (every 4th year) before 1582, Gregorian after.
 * 1582 itself is a common year under both rules.
 */
export function isLeapYear(year: number): boolean {
  if (year < GREGORIAN_START[0]) return year % 4 === 0
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

/** Number of days in the given month (1-12) */
export function daysInMonth(year: number, month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new DomainError('month', month, `Month must be an integer in 1-12, got ${month}`)
  }
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month - 1] ?? 31
}

/** True when the date falls on or after the Gregorian reform */
export function isGregorian(year: number, month: number, day: number): boolean {
  const [gy, gm, gd] = GREGORIAN_START
  if (year !== gy) return year > gy
  if (month !== gm) return month > gm
  return day >= gd
}

/**
 * True for 1582-10-05 up to (not including) 1582-10-15, the days the
 * reform removed. Such dates never existed in either calendar.
 */
export function isDroppedReformDay(year: number, month: number, day: number): boolean {
  const [gy, gm, gd] = GREGORIAN_START
  return year === gy && month === gm && day >= FIRST_DROPPED_DAY && day < gd
}

/**
 * Validate a civil date, throwing DomainError on the first bad field.
 *
 * Day 0 is accepted (it is the last day of the previous month, as in
 * Meeus' "January 0.0"); the day must stay below daysInMonth + 1.
 * 1582-10-05 through 1582-10-14 are rejected.
 */
export function assertCivilDate(date: CivilDateTime): void {
  const { year, month, day } = date
  if (!Number.isInteger(year)) {
    throw new DomainError('year', year, `Year must be an integer, got ${year}`)
  }
  const limit = daysInMonth(year, month) + 1
  if (!Number.isFinite(day) || day < 0 || day >= limit) {
    throw new DomainError(
      'day',
      day,
      `Day must be in [0, ${limit}) for ${year}-${String(month).padStart(2, '0')}, got ${day}`,
    )
  }
  if (isDroppedReformDay(year, month, day)) {
    throw new DomainError(
      'day',
      day,
      `1582-10-05 to 1582-10-14 were dropped by the Gregorian reform, got day ${day}`,
    )
  }
}

// ─── Julian Date ─────────────────────────────────────────────────────────────

/**
 * Convert a civil date to a Julian Day.
 *
 * @example
 * ```ts
 * toJulianDay(1957, 10, 4.81)   // 2436116.31
 * toJulianDay(-4712, 1, 1.5)    // 0
 * ```
 */
export function toJulianDay(date: CivilDateTime): JulianDay
export function toJulianDay(year: number, month: number, day: number): JulianDay
export function toJulianDay(
  dateOrYear: CivilDateTime | number,
  month?: number,
  day?: number,
): JulianDay {
  const date: CivilDateTime = typeof dateOrYear === 'number'
    ? { year: dateOrYear, month: month ?? Number.NaN, day: day ?? Number.NaN }
    : dateOrYear
  assertCivilDate(date)

  let y = date.year
  let m = date.month
  if (m <= 2) {
    y -= 1
    m += 12
  }

  let b = 0
  if (isGregorian(date.year, date.month, date.day)) {
    const a = Math.floor(y / 100)
    b = 2 - a + Math.floor(a / 4)
  }

  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + date.day + b - 1524.5
}

/**
 * Convert a Julian Day back to a civil date (Julian calendar before
 * 1582-10-15, Gregorian from then on). The time of day is folded into
 * the fractional day. Valid for JD >= 0.
 */
export function fromJulianDay(jd: JulianDay): CivilDateTime {
  if (!Number.isFinite(jd) || jd < 0) {
    throw new DomainError('jd', jd, `Julian Day must be a finite number >= 0, got ${jd}`)
  }

  const z = Math.floor(jd + 0.5)
  const f = jd + 0.5 - z

  let a = z
  if (z >= GREGORIAN_START_JD + 0.5) {
    const alpha = Math.floor((z - 1867216.25) / 36524.25)
    a = z + 1 + alpha - Math.floor(alpha / 4)
  }

  const b = a + 1524
  const c = Math.floor((b - 122.1) / 365.25)
  const d = Math.floor(365.25 * c)
  const e = Math.floor((b - d) / 30.6001)

  const day = b - d - Math.floor(30.6001 * e) + f
  const month = e < 14 ? e - 1 : e - 13
  const year = month > 2 ? c - 4716 : c - 4715

  return { year, month, day }
}

/**
 * Julian centuries from J2000.0.
 * The time argument of every polynomial and series in this package.
 */
export function julianCentury(jd: JulianDay): JulianCentury {
  return (jd - J2000) / DAYS_PER_JULIAN_CENTURY
}

// ─── Time of day ─────────────────────────────────────────────────────────────

/**
 * Fold separate clock fields into a fractional day of month.
 *
 * @example
 * ```ts
 * fractionalDay(4, 19, 26, 24)  // 4.81
 * ```
 */
export function fractionalDay(day: number, hour = 0, minute = 0, second = 0): number {
  if (!Number.isInteger(day)) {
    throw new DomainError('day', day, `Day must be an integer when clock fields are given, got ${day}`)
  }
  checkClockField('hour', hour, 24)
  checkClockField('minute', minute, 60)
  checkClockField('second', second, 60)
  return day + (hour + minute / 60 + second / 3600) / 24
}

function checkClockField(field: string, value: number, limit: number): void {
  if (!Number.isFinite(value) || value < 0 || value >= limit) {
    throw new DomainError(field, value, `${field} must be in [0, ${limit}), got ${value}`)
  }
}

// ─── JavaScript Date bridge ──────────────────────────────────────────────────

/**
 * Convert a JavaScript Date (UTC) to a Julian Day.
 */
export function dateToJD(date: Date): JulianDay {
  return date.getTime() / MS_PER_DAY + UNIX_EPOCH_JD
}

/**
 * Convert a Julian Day to a JavaScript Date.
 */
export function jdToDate(jd: JulianDay): Date {
  return new Date((jd - UNIX_EPOCH_JD) * MS_PER_DAY)
}
