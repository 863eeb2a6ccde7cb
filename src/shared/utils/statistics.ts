/**
 * Small descriptive statistics over plain number arrays.
 * Empty inputs yield null rather than NaN.
 */

export const sum = (values: number[]): number =>
  values.reduce((total, value) => total + value, 0);

export const mean = (values: number[]): number | null =>
  values.length === 0 ? null : sum(values) / values.length;

/**
 * Linear-interpolated quantile (the same rule spreadsheets call PERCENTILE.INC).
 */
export const quantile = (values: number[], q: number): number | null => {
  if (values.length === 0) {
    return null;
  }

  const sorted = [...values].sort((left, right) => left - right);
  const position = (sorted.length - 1) * Math.min(Math.max(q, 0), 1);
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[upperIndex] ?? lower;

  return lower + (upper - lower) * (position - lowerIndex);
};

export const median = (values: number[]): number | null => quantile(values, 0.5);

/**
 * Rounds for reporting so float noise does not leak into persisted output.
 */
export const round = (value: number, digits = 4): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
