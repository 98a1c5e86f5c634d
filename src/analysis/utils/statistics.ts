/**
 * Descriptive statistics over a numeric series.
 *
 * `std` is the sample standard deviation (n - 1 denominator) and is null
 * for a single value.
 */
export interface SeriesSummary {
  count: number;
  mean: number;
  std: number | null;
  min: number;
  max: number;
}

/**
 * @returns Summary of the values, or null for an empty series
 */
export function summarize(values: readonly number[]): SeriesSummary | null {
  const count = values.length;
  if (count === 0) {
    return null;
  }

  let sum = 0;
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const mean = sum / count;

  let std: number | null = null;
  if (count > 1) {
    let squares = 0;
    for (const value of values) {
      squares += (value - mean) ** 2;
    }
    std = Math.sqrt(squares / (count - 1));
  }

  return { count, mean, std, min, max };
}
