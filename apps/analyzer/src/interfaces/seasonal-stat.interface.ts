/**
 * Typed grouping key for baseline statistics
 */
export interface GroupKey {
  city: string;
  season: string;
}

/**
 * Baseline statistics of the smoothed series for one (city, season) group
 */
export interface SeasonalStat extends GroupKey {
  /** Mean of smoothed temperatures; null when no record in the group has one */
  mean: number | null;

  /** Sample standard deviation (n - 1); null when fewer than 2 samples */
  stddev: number | null;

  /** Number of records that contributed a smoothed value */
  sampleCount: number;

  /** Number of records in the group, including insufficient-history ones */
  recordCount: number;
}
