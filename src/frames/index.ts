/**
 * frames — Obliquity of the ecliptic, nutation, and the ecliptic → equatorial
 * rotation.
 *
 * Accuracy is matched to the low-precision Sun and Moon theories: the mean
 * obliquity is the IAU 1980 cubic (Meeus eq. 22.2) and nutation is the
 * four-term approximation of Meeus ch. 22 (~0.5″ in Δψ, ~0.1″ in Δε).
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed., ch. 13 and 22.
 */

import type { EquatorialPosition, JulianCentury, Nutation } from '../types.js'
import { arcsec, asinDeg, atan2Deg, cosDeg, evalPoly, mod360, sinDeg, tanDeg } from '../math/index.js'

// ─── Obliquity ───────────────────────────────────────────────────────────────

/** ε0 = 23°26′21.448″ − 46.8150″T − 0.00059″T² + 0.001813″T³, in arcseconds */
const MEAN_OBLIQUITY_ARCSEC = [84381.448, -46.815, -0.00059, 0.001813] as const

/**
 * Mean obliquity of the ecliptic ε0 in degrees.
 */
export function meanObliquity(T: JulianCentury): number {
  return arcsec(evalPoly(MEAN_OBLIQUITY_ARCSEC, T))
}

/**
 * Longitude of the Moon's mean ascending node Ω, degrees (not reduced).
 * Shared by the nutation terms and the Sun's apparent-place correction.
 */
export function lunarNodeLongitude(T: JulianCentury): number {
  return 125.04 - 1934.136 * T
}

// ─── Nutation ────────────────────────────────────────────────────────────────

/**
 * Nutation in longitude Δψ and in obliquity Δε, degrees.
 *
 *   Δψ = −17.20″ sin Ω − 1.32″ sin 2L − 0.23″ sin 2L′ + 0.21″ sin 2Ω
 *   Δε =  +9.20″ cos Ω + 0.57″ cos 2L + 0.10″ cos 2L′ − 0.09″ cos 2Ω
 *
 * where L and L′ are the mean longitudes of the Sun and Moon.
 */
export function nutation(T: JulianCentury): Nutation {
  const omega = lunarNodeLongitude(T)
  const L = 280.4665 + 36000.7698 * T
  const Lp = 218.3165 + 481267.8813 * T

  const longitude = arcsec(
    -17.20 * sinDeg(omega) - 1.32 * sinDeg(2 * L) - 0.23 * sinDeg(2 * Lp) + 0.21 * sinDeg(2 * omega),
  )
  const obliquity = arcsec(
    9.20 * cosDeg(omega) + 0.57 * cosDeg(2 * L) + 0.10 * cosDeg(2 * Lp) - 0.09 * cosDeg(2 * omega),
  )

  return { longitude, obliquity }
}

/**
 * True obliquity ε = ε0 + Δε, degrees.
 */
export function trueObliquity(T: JulianCentury): number {
  return meanObliquity(T) + nutation(T).obliquity
}

// ─── Ecliptic → equatorial ───────────────────────────────────────────────────

/**
 * Rotate ecliptic longitude/latitude into right ascension/declination
 * (Meeus eq. 13.3, 13.4).
 *
 *   α = atan2(sin λ cos ε − tan β sin ε, cos λ)
 *   δ = asin(sin β cos ε + cos β sin ε sin λ)
 *
 * @param ecliptic - longitude λ and latitude β in degrees
 * @param obliquity - ε in degrees
 * @returns right ascension in [0, 360) and declination, degrees
 */
export function eclipticToEquatorial(
  ecliptic: { longitude: number; latitude: number },
  obliquity: number,
): EquatorialPosition {
  const { longitude: lon, latitude: lat } = ecliptic

  const rightAscension = mod360(
    atan2Deg(sinDeg(lon) * cosDeg(obliquity) - tanDeg(lat) * sinDeg(obliquity), cosDeg(lon)),
  )
  const declination = asinDeg(
    sinDeg(lat) * cosDeg(obliquity) + cosDeg(lat) * sinDeg(obliquity) * sinDeg(lon),
  )

  return { rightAscension, declination }
}
