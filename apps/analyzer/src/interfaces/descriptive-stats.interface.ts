/**
 * Summary of a numeric column (count, mean, std, min, quartiles, max).
 * Every field except `count` is null when the column has no values;
 * `std` is also null for a single value.
 */
export interface DescriptiveStats {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  max: number | null;
}
