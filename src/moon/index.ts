/**
 * moon — Geocentric position of the Moon.
 *
 * Meeus ch. 47 (after Chapront ELP-2000/82): five fundamental arguments,
 * the 60-term longitude/distance series (Table 47.A), the 60-term latitude
 * series (Table 47.B), and the additive terms for Venus, Jupiter and the
 * flattening of the Earth. Accuracy ~10″ in longitude, ~4″ in latitude.
 *
 * The series tables are read once from terms.json and frozen.
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed., ch. 47.
 */

import type { JulianCentury, LunarArguments, LunarPosition } from '../types.js'
import { evalPoly, mod360, sinDeg, cosDeg } from '../math/index.js'
import { eclipticToEquatorial, nutation, trueObliquity } from '../frames/index.js'
import terms from './terms.json' with { type: 'json' }

// ─── Periodic terms ──────────────────────────────────────────────────────────

/** Integer multiples of D, M, M′, F forming the argument of one term */
export interface PeriodicArgument {
  d: number
  m: number
  mp: number
  f: number
}

/** Row of Table 47.A: l in 1e-6 degree (sine), r in 1e-3 km (cosine) */
export interface LongitudeDistanceTerm extends PeriodicArgument {
  l: number
  r: number
}

/** Row of Table 47.B: b in 1e-6 degree (sine) */
export interface LatitudeTerm extends PeriodicArgument {
  b: number
}

export const LONGITUDE_DISTANCE_TERMS: ReadonlyArray<Readonly<LongitudeDistanceTerm>> =
  Object.freeze(terms.longitudeDistance.map(t => Object.freeze({ ...t })))

export const LATITUDE_TERMS: ReadonlyArray<Readonly<LatitudeTerm>> =
  Object.freeze(terms.latitude.map(t => Object.freeze({ ...t })))

// ─── Fundamental arguments ───────────────────────────────────────────────────

const MEAN_LONGITUDE = [218.3164477, 481267.88123421, -0.0015786, 1 / 538841, -1 / 65194000] as const
const MEAN_ELONGATION = [297.8501921, 445267.1114034, -0.0018819, 1 / 545868, -1 / 113065000] as const
const SUN_MEAN_ANOMALY = [357.5291092, 35999.0502909, -0.0001536, 1 / 24490000] as const
const MEAN_ANOMALY = [134.9633964, 477198.8675055, 0.0087414, 1 / 69699, -1 / 14712000] as const
const ARGUMENT_OF_LATITUDE = [93.2720950, 483202.0175233, -0.0036539, -1 / 3526000, 1 / 863310000] as const

/** Mean distance of the Moon in km, the constant part of the distance series */
export const MEAN_DISTANCE_KM = 385000.56

/**
 * The fundamental arguments L′, D, M, M′, F and the additive arguments
 * A1, A2, A3, all in degrees reduced to [0, 360).
 */
export function lunarArguments(T: JulianCentury): LunarArguments {
  return {
    meanLongitude: mod360(evalPoly(MEAN_LONGITUDE, T)),
    meanElongation: mod360(evalPoly(MEAN_ELONGATION, T)),
    sunMeanAnomaly: mod360(evalPoly(SUN_MEAN_ANOMALY, T)),
    meanAnomaly: mod360(evalPoly(MEAN_ANOMALY, T)),
    argumentOfLatitude: mod360(evalPoly(ARGUMENT_OF_LATITUDE, T)),
    a1: mod360(119.75 + 131.849 * T),
    a2: mod360(53.09 + 479264.290 * T),
    a3: mod360(313.45 + 481266.484 * T),
  }
}

/**
 * E = 1 − 0.002516 T − 0.0000074 T², the correction for the decreasing
 * eccentricity of the Earth's orbit.
 */
export function eccentricityFactor(T: JulianCentury): number {
  return 1 - 0.002516 * T - 0.0000074 * T * T
}

/**
 * Multiplier for a term with the given multiple of M:
 * E for ±1, E² for ±2, 1 otherwise.
 */
export function eccentricityCorrection(m: number, E: number): number {
  switch (Math.abs(m)) {
    case 1: return E
    case 2: return E * E
    default: return 1
  }
}

function termArgument(t: PeriodicArgument, a: LunarArguments): number {
  return t.d * a.meanElongation
    + t.m * a.sunMeanAnomaly
    + t.mp * a.meanAnomaly
    + t.f * a.argumentOfLatitude
}

// ─── Series sums ─────────────────────────────────────────────────────────────

/**
 * Σl and Σr from Table 47.A plus the additive longitude terms.
 *
 * @returns sumLongitude in 1e-6 degree, sumDistance in 1e-3 km
 */
export function sumLongitudeDistance(
  a: LunarArguments,
  E: number,
): { sumLongitude: number; sumDistance: number } {
  let sl = 0
  let sr = 0
  for (const t of LONGITUDE_DISTANCE_TERMS) {
    const arg = termArgument(t, a)
    const corr = eccentricityCorrection(t.m, E)
    sl += t.l * corr * sinDeg(arg)
    sr += t.r * corr * cosDeg(arg)
  }

  // Venus, Jupiter, and the flattening of the Earth
  sl += 3958 * sinDeg(a.a1)
    + 1962 * sinDeg(a.meanLongitude - a.argumentOfLatitude)
    + 318 * sinDeg(a.a2)

  return { sumLongitude: sl, sumDistance: sr }
}

/**
 * Σb from Table 47.B plus the additive latitude terms, in 1e-6 degree.
 */
export function sumLatitude(a: LunarArguments, E: number): number {
  let sb = 0
  for (const t of LATITUDE_TERMS) {
    sb += t.b * eccentricityCorrection(t.m, E) * sinDeg(termArgument(t, a))
  }

  const { meanLongitude: Lp, meanAnomaly: Mp, argumentOfLatitude: F, a1, a3 } = a
  sb += -2235 * sinDeg(Lp)
    + 382 * sinDeg(a3)
    + 175 * sinDeg(a1 - F)
    + 175 * sinDeg(a1 + F)
    + 127 * sinDeg(Lp - Mp)
    - 115 * sinDeg(Lp + Mp)

  return sb
}

// ─── Position ────────────────────────────────────────────────────────────────

/**
 * Geocentric position of the Moon.
 *
 * longitude/latitude/distance are the geometric ecliptic coordinates of
 * Meeus ch. 47. rightAscension/declination are apparent: the longitude is
 * corrected by Δψ and rotated with the true obliquity ε0 + Δε.
 *
 * @example
 * ```ts
 * const moon = lunarPosition(julianCentury(toJulianDay(1992, 4, 12)))
 * moon.longitude  // ≈ 133.162655
 * moon.latitude   // ≈ -3.229126
 * moon.distance   // ≈ 368409.7 km
 * ```
 */
export function lunarPosition(T: JulianCentury): LunarPosition {
  const args = lunarArguments(T)
  const E = eccentricityFactor(T)

  const { sumLongitude, sumDistance } = sumLongitudeDistance(args, E)
  const sumLat = sumLatitude(args, E)

  const longitude = mod360(args.meanLongitude + sumLongitude / 1e6)
  const latitude = sumLat / 1e6
  const distance = MEAN_DISTANCE_KM + sumDistance / 1e3

  const apparentLongitude = mod360(longitude + nutation(T).longitude)
  const obliquity = trueObliquity(T)
  const { rightAscension, declination } = eclipticToEquatorial(
    { longitude: apparentLongitude, latitude },
    obliquity,
  )

  return {
    longitude,
    latitude,
    distance,
    rightAscension,
    declination,
    apparentLongitude,
    obliquity,
    arguments: args,
    eccentricityFactor: E,
    sumLongitude,
    sumLatitude: sumLat,
    sumDistance,
  }
}
