/**
 * api — User-facing composed entry points.
 *
 * Each function chains calendar → Julian Day → Julian centuries →
 * {Sun, Moon} → phase. All of them are pure; errors from the lower
 * layers (DomainError, NumericError) propagate unchanged.
 */

import type {
  CivilDateTime,
  DailyPhase,
  JulianCentury,
  JulianDay,
  LunarPosition,
  PhaseResult,
  SolarPosition,
} from '../types.js'
import { DomainError } from '../errors.js'
import {
  dateToJD,
  daysInMonth,
  fractionalDay,
  isDroppedReformDay,
  julianCentury,
  toJulianDay,
} from '../time/index.js'
import { solarPosition } from '../sun/index.js'
import { lunarPosition } from '../moon/index.js'
import { phase } from '../phase/index.js'

/** Sun and Moon positions for one instant */
export interface BodyPositions {
  jd: JulianDay
  T: JulianCentury
  sun: SolarPosition
  moon: LunarPosition
}

/**
 * Compute the Sun and Moon positions at a Julian Day.
 */
export function positionsForJulianDay(jd: JulianDay): BodyPositions {
  const T = julianCentury(jd)
  return { jd, T, sun: solarPosition(T), moon: lunarPosition(T) }
}

/**
 * Compute the Sun and Moon positions for a civil date.
 */
export function positionsForDate(date: CivilDateTime): BodyPositions
export function positionsForDate(year: number, month: number, day: number): BodyPositions
export function positionsForDate(
  dateOrYear: CivilDateTime | number,
  month?: number,
  day?: number,
): BodyPositions {
  const jd = typeof dateOrYear === 'number'
    ? toJulianDay(dateOrYear, month ?? Number.NaN, day ?? Number.NaN)
    : toJulianDay(dateOrYear)
  return positionsForJulianDay(jd)
}

/**
 * Illuminated fraction and bright-limb position angle at a Julian Day.
 */
export function phaseForJulianDay(jd: JulianDay): PhaseResult {
  const { sun, moon } = positionsForJulianDay(jd)
  return phase(sun, moon)
}

/**
 * Illuminated fraction and bright-limb position angle for a civil date.
 *
 * @param year - astronomical year (0 = 1 BCE, negative = earlier)
 * @param month - 1-12
 * @param day - day of month with fraction for the time of day
 *
 * @example
 * ```ts
 * const p = phaseForDate(1992, 4, 12)
 * p.illuminatedFraction  // ≈ 0.679
 * p.positionAngle        // ≈ 285.0
 * ```
 */
export function phaseForDate(date: CivilDateTime): PhaseResult
export function phaseForDate(year: number, month: number, day: number): PhaseResult
export function phaseForDate(
  dateOrYear: CivilDateTime | number,
  month?: number,
  day?: number,
): PhaseResult {
  const jd = typeof dateOrYear === 'number'
    ? toJulianDay(dateOrYear, month ?? Number.NaN, day ?? Number.NaN)
    : toJulianDay(dateOrYear)
  return phaseForJulianDay(jd)
}

/**
 * Phase for a JavaScript Date, read as UTC.
 *
 * @param date - instant to compute for (default: now)
 */
export function moonIllumination(date: Date = new Date()): PhaseResult {
  const jd = dateToJD(date)
  if (Number.isNaN(jd)) {
    throw new DomainError('date', jd, 'Invalid Date')
  }
  return phaseForJulianDay(jd)
}

/**
 * One phase row per calendar day of a month, each at the same clock hour.
 * October 1582 has 21 rows: the ten days dropped by the reform are skipped.
 *
 * @param hour - hour of day (0 <= hour < 24) used for every row
 */
export function phasesForMonth(year: number, month: number, hour = 0): DailyPhase[] {
  const days = daysInMonth(year, month)
  const rows: DailyPhase[] = []

  for (let d = 1; d <= days; d++) {
    if (isDroppedReformDay(year, month, d)) continue
    const date: CivilDateTime = { year, month, day: fractionalDay(d, hour) }
    const jd = toJulianDay(date)
    rows.push({ date, jd, phase: phaseForJulianDay(jd) })
  }

  return rows
}
