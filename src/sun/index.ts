/**
 * sun — Geocentric position of the Sun, low-precision theory.
 *
 * Meeus ch. 25: geometric mean longitude and mean anomaly, a three-term
 * equation of center, and a single-term correction from the true to the
 * apparent longitude (nutation + aberration). Accuracy ~0.01°.
 */

import type { JulianCentury, SolarPosition } from '../types.js'
import { cosDeg, evalPoly, mod360, sinDeg } from '../math/index.js'
import { eclipticToEquatorial, lunarNodeLongitude, meanObliquity } from '../frames/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Astronomical unit in km (IAU 2012) */
export const AU_KM = 149597870.7

const MEAN_LONGITUDE = [280.46646, 36000.76983, 0.0003032] as const
const MEAN_ANOMALY = [357.52911, 35999.05029, -0.0001537] as const
const ECCENTRICITY = [0.016708634, -0.000042037, -0.0000001267] as const

// ─── Components ──────────────────────────────────────────────────────────────

/** Geometric mean longitude L0, degrees [0, 360) */
export function sunMeanLongitude(T: JulianCentury): number {
  return mod360(evalPoly(MEAN_LONGITUDE, T))
}

/** Mean anomaly M, degrees [0, 360) */
export function sunMeanAnomaly(T: JulianCentury): number {
  return mod360(evalPoly(MEAN_ANOMALY, T))
}

/** Eccentricity of the Earth's orbit */
export function earthEccentricity(T: JulianCentury): number {
  return evalPoly(ECCENTRICITY, T)
}

/**
 * Equation of center C in degrees, for mean anomaly M in degrees.
 */
export function equationOfCenter(T: JulianCentury, M: number): number {
  return (1.914602 - 0.004817 * T - 0.000014 * T * T) * sinDeg(M)
    + (0.019993 - 0.000101 * T) * sinDeg(2 * M)
    + 0.000289 * sinDeg(3 * M)
}

/**
 * Earth-Sun distance in AU from the eccentricity and the true anomaly (degrees).
 */
export function sunDistanceAU(e: number, trueAnomaly: number): number {
  return (1.000001018 * (1 - e * e)) / (1 + e * cosDeg(trueAnomaly))
}

// ─── Position ────────────────────────────────────────────────────────────────

/**
 * Apparent geocentric position of the Sun.
 *
 * The apparent longitude is λ = ☉ − 0.00569° − 0.00478° sin Ω, and the
 * equatorial rotation uses ε0 + 0.00256° cos Ω as the obliquity.
 *
 * @example
 * ```ts
 * const sun = solarPosition(julianCentury(toJulianDay(1992, 10, 13)))
 * sun.rightAscension  // ≈ 198.38083
 * sun.declination     // ≈ -7.78507
 * ```
 */
export function solarPosition(T: JulianCentury): SolarPosition {
  const L0 = sunMeanLongitude(T)
  const M = sunMeanAnomaly(T)
  const e = earthEccentricity(T)
  const C = equationOfCenter(T, M)

  const trueLongitude = mod360(L0 + C)
  const trueAnomaly = mod360(M + C)
  const distanceAU = sunDistanceAU(e, trueAnomaly)

  const omega = lunarNodeLongitude(T)
  const apparentLongitude = mod360(trueLongitude - 0.00569 - 0.00478 * sinDeg(omega))
  const obliquity = meanObliquity(T) + 0.00256 * cosDeg(omega)

  const { rightAscension, declination } = eclipticToEquatorial(
    { longitude: apparentLongitude, latitude: 0 },
    obliquity,
  )

  return {
    meanLongitude: L0,
    meanAnomaly: M,
    eccentricity: e,
    equationOfCenter: C,
    trueLongitude,
    trueAnomaly,
    apparentLongitude,
    obliquity,
    rightAscension,
    declination,
    distanceAU,
    distance: distanceAU * AU_KM,
  }
}
