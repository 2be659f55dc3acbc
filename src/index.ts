/**
 * lunar-phase — Illuminated fraction and bright-limb position angle of the Moon.
 *
 * Geocentric positions from the low-precision Meeus theories: the Sun from
 * Astronomical Algorithms ch. 25, the Moon from ch. 47 (full 60-term tables),
 * combined with the ch. 48 illumination formulas. Works for any date,
 * including BCE years and dates across the 1582 calendar reform.
 *
 * Quick start:
 *   import { phaseForDate } from 'lunar-phase'
 *
 *   const p = phaseForDate(2019, 11, 17.5)
 *   console.log(p.illuminatedFraction, p.positionAngle)
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  phaseForDate,
  phaseForJulianDay,
  phasesForMonth,
  moonIllumination,
  positionsForDate,
  positionsForJulianDay,
} from './api/index.js'

export type { BodyPositions } from './api/index.js'

// ─── Building blocks ──────────────────────────────────────────────────────────

export {
  toJulianDay,
  fromJulianDay,
  julianCentury,
  fractionalDay,
  isLeapYear,
  daysInMonth,
  isDroppedReformDay,
  assertCivilDate,
  dateToJD,
  jdToDate,
  J2000,
} from './time/index.js'

export { solarPosition, AU_KM } from './sun/index.js'
export { lunarPosition, LONGITUDE_DISTANCE_TERMS, LATITUDE_TERMS } from './moon/index.js'
export type { LongitudeDistanceTerm, LatitudeTerm, PeriodicArgument } from './moon/index.js'
export { phase } from './phase/index.js'
export { meanObliquity, nutation, eclipticToEquatorial } from './frames/index.js'

// ─── Errors ───────────────────────────────────────────────────────────────────

export { DomainError, NumericError } from './errors.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  CivilDateTime,
  JulianDay,
  JulianCentury,
  EquatorialPosition,
  EquatorialPositionWithDistance,
  EclipticPosition,
  Nutation,
  SolarPosition,
  LunarArguments,
  LunarPosition,
  PhaseResult,
  DailyPhase,
} from './types.js'
