/**
 * Error types thrown by the computation core.
 *
 * Nothing in the core catches these; they propagate to the caller as-is.
 */

/**
 * An input field is outside the domain the algorithms accept:
 * a calendar field out of range, a non-integer year or month,
 * a negative Julian Day for the inverse conversion, etc.
 */
export class DomainError extends RangeError {
  override readonly name = 'DomainError'

  constructor(
    /** Name of the offending input, e.g. 'month' */
    readonly field: string,
    /** The rejected value */
    readonly value: number,
    message?: string,
  ) {
    super(message ?? `Invalid ${field}: ${value}`)
  }
}

/**
 * Degenerate geometry: a zero or negative distance, a non-finite
 * coordinate, or a result that came out NaN.
 */
export class NumericError extends Error {
  override readonly name = 'NumericError'

  constructor(
    /** Name of the quantity that could not be computed */
    readonly quantity: string,
    message: string,
  ) {
    super(message)
  }
}
