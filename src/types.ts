// ─── Time ────────────────────────────────────────────────────────────────────

/**
 * A civil calendar date with time-of-day folded into the day.
 *
 * Years use astronomical numbering: year 0 is 1 BCE, -1 is 2 BCE, and so on.
 * Dates before 1582-10-15 are read in the (proleptic) Julian calendar,
 * dates from then on in the Gregorian calendar.
 */
export interface CivilDateTime {
  /** Astronomical year, integer */
  year: number
  /** Month 1-12 */
  month: number
  /**
   * Day of month with fraction, 0 <= day < daysInMonth + 1.
   * 4.25 is the 4th at 06:00. No timezone is applied.
   */
  day: number
}

/** Days (with fraction) since -4712-01-01 12:00, Julian proleptic calendar */
export type JulianDay = number

/** Julian centuries since J2000.0: (JD - 2451545.0) / 36525 */
export type JulianCentury = number

// ─── Coordinates ─────────────────────────────────────────────────────────────

/** Geocentric equatorial coordinates, degrees */
export interface EquatorialPosition {
  /** Right ascension in degrees, [0, 360) */
  rightAscension: number
  /** Declination in degrees, [-90, 90] */
  declination: number
}

/** Geocentric ecliptic coordinates */
export interface EclipticPosition {
  /** Ecliptic longitude in degrees, [0, 360) */
  longitude: number
  /** Ecliptic latitude in degrees */
  latitude: number
  /** Distance from the Earth's center in km */
  distance: number
}

/** An equatorial direction together with its distance in km */
export interface EquatorialPositionWithDistance extends EquatorialPosition {
  /** Distance from the Earth's center in km */
  distance: number
}

/** Nutation in longitude and obliquity, degrees */
export interface Nutation {
  /** Δψ, nutation in longitude */
  longitude: number
  /** Δε, nutation in obliquity */
  obliquity: number
}

// ─── Sun ─────────────────────────────────────────────────────────────────────

/**
 * Geocentric position of the Sun and the intermediate quantities of the
 * low-precision solar theory. All angles in degrees.
 */
export interface SolarPosition extends EquatorialPositionWithDistance {
  /** Geometric mean longitude L0, [0, 360) */
  meanLongitude: number
  /** Mean anomaly M, [0, 360) */
  meanAnomaly: number
  /** Eccentricity of the Earth's orbit */
  eccentricity: number
  /** Equation of center C */
  equationOfCenter: number
  /** True geometric longitude L0 + C, [0, 360) */
  trueLongitude: number
  /** True anomaly M + C, [0, 360) */
  trueAnomaly: number
  /** Apparent longitude λ (nutation and aberration applied), [0, 360) */
  apparentLongitude: number
  /** Obliquity used for the equatorial rotation */
  obliquity: number
  /** Earth-Sun distance in astronomical units */
  distanceAU: number
}

// ─── Moon ────────────────────────────────────────────────────────────────────

/** Fundamental arguments of the lunar theory, degrees in [0, 360) */
export interface LunarArguments {
  /** L′, mean longitude of the Moon */
  meanLongitude: number
  /** D, mean elongation of the Moon from the Sun */
  meanElongation: number
  /** M, mean anomaly of the Sun */
  sunMeanAnomaly: number
  /** M′, mean anomaly of the Moon */
  meanAnomaly: number
  /** F, argument of latitude (distance from the ascending node) */
  argumentOfLatitude: number
  /** A1, perturbation argument from Venus */
  a1: number
  /** A2, perturbation argument from Jupiter */
  a2: number
  /** A3, additive latitude argument */
  a3: number
}

/**
 * Geocentric position of the Moon. The ecliptic part is geometric
 * (no nutation); the equatorial part is apparent.
 */
export interface LunarPosition extends EclipticPosition, EquatorialPosition {
  arguments: LunarArguments
  /** Eccentricity multiplier E for terms in the Sun's mean anomaly */
  eccentricityFactor: number
  /** Σl, longitude sum in 1e-6 degree */
  sumLongitude: number
  /** Σb, latitude sum in 1e-6 degree */
  sumLatitude: number
  /** Σr, distance sum in 1e-3 km */
  sumDistance: number
  /** Apparent longitude λ + Δψ, [0, 360) */
  apparentLongitude: number
  /** True obliquity ε0 + Δε used for the equatorial rotation */
  obliquity: number
}

// ─── Phase ───────────────────────────────────────────────────────────────────

export interface PhaseResult {
  /** Illuminated fraction k of the disk, [0, 1] */
  illuminatedFraction: number
  /**
   * Position angle χ of the midpoint of the bright limb, degrees [0, 360),
   * measured from the north point of the disk towards the east.
   */
  positionAngle: number
  /** Geocentric elongation ψ of the Moon from the Sun, degrees [0, 180] */
  elongation: number
  /** Phase angle i (Sun-Moon-Earth), degrees [0, 180] */
  phaseAngle: number
}

/** One day of a monthly phase table */
export interface DailyPhase {
  date: CivilDateTime
  jd: JulianDay
  phase: PhaseResult
}
