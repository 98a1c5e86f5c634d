/**
 * Numeric precision helpers.
 *
 * Normalized records, statistics and coverage percentages all round
 * through `roundHalfEven`.
 */

/** Decimal places kept for S4C, coordinates and statistics */
export const RECORD_PRECISION = 6;

/**
 * Round to a number of decimal places using round-half-to-even
 * (banker's rounding) on the scaled value.
 *
 * @example
 * roundHalfEven(2.5, 0)       // 2
 * roundHalfEven(3.5, 0)       // 4
 */
export function roundHalfEven(value: number, decimals = RECORD_PRECISION): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const remainder = scaled - floor;

  let rounded: number;
  if (remainder > 0.5) {
    rounded = floor + 1;
  } else if (remainder < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }

  return rounded / factor;
}

/**
 * Round a nullable value, passing null through
 */
export function roundOrNull(
  value: number | null,
  decimals = RECORD_PRECISION,
): number | null {
  return value === null ? null : roundHalfEven(value, decimals);
}

/**
 * Format a ratio (0-1) as a percentage string with two decimals, e.g. "75.00%"
 */
export function formatPercentage(ratio: number): string {
  return `${roundHalfEven(ratio * 100, 2).toFixed(2)}%`;
}
