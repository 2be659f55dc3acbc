/**
 * math — Angle units, angle reduction and polynomial evaluation.
 *
 * All computation in this module is pure (no I/O, no state).
 *
 * Convention for the whole package: every angle that crosses a function
 * boundary is in degrees. Radians only exist inside the degree-valued
 * trig helpers below, at the point where Math.sin & co. are called.
 */

// ─── Unit conversion ─────────────────────────────────────────────────────────

/** Multiply degrees by this to get radians */
export const DEG2RAD = Math.PI / 180

/** Multiply radians by this to get degrees */
export const RAD2DEG = 180 / Math.PI

/** Arcseconds per degree */
export const ARCSEC_PER_DEG = 3600

export function toRadians(deg: number): number {
  return deg * DEG2RAD
}

export function toDegrees(rad: number): number {
  return rad * RAD2DEG
}

/** Convert an angle given in arcseconds to degrees */
export function arcsec(value: number): number {
  return value / ARCSEC_PER_DEG
}

// ─── Angle reduction ─────────────────────────────────────────────────────────

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  const r = ((deg % 360) + 360) % 360
  // (-1e-17 % 360) + 360 rounds to exactly 360
  return r === 360 ? 0 : r
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

/** Clamp x into [lo, hi] */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x))
}

// ─── Degree-valued trigonometry ──────────────────────────────────────────────

export function sinDeg(deg: number): number {
  return Math.sin(deg * DEG2RAD)
}

export function cosDeg(deg: number): number {
  return Math.cos(deg * DEG2RAD)
}

export function tanDeg(deg: number): number {
  return Math.tan(deg * DEG2RAD)
}

/**
 * Inverse sine in degrees. The argument is clamped to [-1, 1] to absorb
 * round-off; NaN passes through unchanged.
 */
export function asinDeg(x: number): number {
  return Math.asin(clamp(x, -1, 1)) * RAD2DEG
}

/** Inverse cosine in degrees, with the same clamping as asinDeg */
export function acosDeg(x: number): number {
  return Math.acos(clamp(x, -1, 1)) * RAD2DEG
}

/** Two-argument arctangent in degrees, range (-180, 180] */
export function atan2Deg(y: number, x: number): number {
  return Math.atan2(y, x) * RAD2DEG
}

// ─── Polynomials ─────────────────────────────────────────────────────────────

/**
 * Evaluate c0 + c1*t + c2*t^2 + ... with Horner's method.
 * Used for every degree-valued polynomial in T (Julian centuries).
 */
export function evalPoly(coeffs: readonly number[], t: number): number {
  let acc = 0
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = acc * t + (coeffs[i] ?? 0)
  }
  return acc
}
