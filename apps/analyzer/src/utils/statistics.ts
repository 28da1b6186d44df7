import { DescriptiveStats } from '../interfaces/descriptive-stats.interface';

/**
 * Sum of values, accumulated in ascending order so the result does not depend
 * on the order the caller collected them in.
 */
export function stableSum(values: readonly number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
}

/**
 * Arithmetic mean, or null for an empty list
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return stableSum(values) / values.length;
}

/**
 * Sample standard deviation (divisor n - 1).
 * Undefined (null) for fewer than two values: one sample carries no variance estimate.
 */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) {
    return null;
  }
  const avg = stableSum(values) / values.length;
  const squaredDiffs = values.map((v) => Math.pow(v - avg, 2));
  return Math.sqrt(stableSum(squaredDiffs) / (values.length - 1));
}

/**
 * Quantile with linear interpolation between closest ranks
 * @param sorted Values sorted ascending
 * @param q Quantile in [0, 1]
 */
export function quantile(sorted: readonly number[], q: number): number | null {
  if (sorted.length === 0) {
    return null;
  }
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * Count, mean, std, min, quartiles and max of a column
 */
export function describeSeries(values: readonly number[]): DescriptiveStats {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    count: sorted.length,
    mean: mean(sorted),
    std: sampleStdDev(sorted),
    min: sorted.length > 0 ? sorted[0] : null,
    p25: quantile(sorted, 0.25),
    p50: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted.length > 0 ? sorted[sorted.length - 1] : null,
  };
}
