/**
 * Numeric helpers shared by field validation and area derivation
 */

/** Upper bound for integer and number tags */
export const MAX_NUMERIC_VALUE = 1_000_000_000;

/**
 * Round half-up on the decimal representation.
 *
 * Shifts the exponent through the string form so that values such as 1.005,
 * stored as 1.00499999..., still round to 1.01. Ties round toward +Infinity,
 * which is half-up for the non-negative values the engine produces.
 */
export function roundHalfUp(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const shifted = Number(`${value}e${decimals}`);
  if (Number.isFinite(shifted)) {
    return Number(`${Math.round(shifted)}e-${decimals}`);
  }

  // Exponent notation input (e.g. 1e-7): fall back to plain scaling
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
