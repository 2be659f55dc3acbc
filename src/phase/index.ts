/**
 * phase — Illuminated fraction and position angle of the bright limb.
 *
 * Meeus ch. 48, from the geocentric equatorial coordinates and distances
 * of the Sun (α0, δ0, R) and the Moon (α, δ, Δ):
 *
 *   cos ψ = sin δ0 sin δ + cos δ0 cos δ cos(α0 − α)        elongation
 *   tan i = R sin ψ / (Δ − R cos ψ)                         phase angle
 *   k     = (1 + cos i) / 2                                 illuminated fraction
 *   tan χ = cos δ0 sin(α0 − α) /
 *           (sin δ0 cos δ − cos δ0 sin δ cos(α0 − α))       bright limb
 *
 * χ is measured from the north point of the disk towards the east; the
 * cusps lie at χ ± 90°. A waxing Moon has χ near 270°, a waning one near 90°.
 */

import type { EquatorialPositionWithDistance, PhaseResult } from '../types.js'
import { NumericError } from '../errors.js'
import { acosDeg, atan2Deg, clamp, cosDeg, mod360, sinDeg } from '../math/index.js'

/**
 * Compute the phase quantities of the Moon.
 *
 * @param sun - Sun position, distance in km
 * @param moon - Moon position, distance in km
 * @throws NumericError if a distance is not a positive finite number, a
 *   coordinate is not finite, or the geometry yields NaN
 */
export function phase(
  sun: EquatorialPositionWithDistance,
  moon: EquatorialPositionWithDistance,
): PhaseResult {
  assertBody('sun', sun)
  assertBody('moon', moon)

  const { rightAscension: ra0, declination: dec0, distance: R } = sun
  const { rightAscension: ra, declination: dec, distance: delta } = moon
  const dRA = ra0 - ra

  const elongation = acosDeg(
    sinDeg(dec0) * sinDeg(dec) + cosDeg(dec0) * cosDeg(dec) * cosDeg(dRA),
  )

  // atan2 on (positive, any) lands in [0, 180], which resolves the quadrant
  const phaseAngle = atan2Deg(R * sinDeg(elongation), delta - R * cosDeg(elongation))

  // clamp only absorbs round-off at syzygy
  const illuminatedFraction = clamp((1 + cosDeg(phaseAngle)) / 2, 0, 1)

  const positionAngle = mod360(atan2Deg(
    cosDeg(dec0) * sinDeg(dRA),
    sinDeg(dec0) * cosDeg(dec) - cosDeg(dec0) * sinDeg(dec) * cosDeg(dRA),
  ))

  const result = { illuminatedFraction, positionAngle, elongation, phaseAngle }
  for (const [quantity, value] of Object.entries(result)) {
    if (Number.isNaN(value)) {
      throw new NumericError(quantity, `${quantity} evaluated to NaN`)
    }
  }
  return result
}

function assertBody(body: string, p: EquatorialPositionWithDistance): void {
  if (!Number.isFinite(p.distance) || p.distance <= 0) {
    throw new NumericError(
      `${body}.distance`,
      `${body} distance must be a positive finite number, got ${p.distance}`,
    )
  }
  if (!Number.isFinite(p.rightAscension) || !Number.isFinite(p.declination)) {
    throw new NumericError(
      `${body}.position`,
      `${body} coordinates must be finite, got α=${p.rightAscension} δ=${p.declination}`,
    )
  }
}
