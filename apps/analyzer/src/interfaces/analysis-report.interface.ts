import { AnomalyRecord, TemperatureRecord } from './temperature-record.interface';
import { DescriptiveStats } from './descriptive-stats.interface';
import { LiveOutcome } from './live-classification.interface';
import { SeasonalStat } from './seasonal-stat.interface';

/**
 * Result of one historical analysis run.
 * This is what the presentation layer renders.
 */
export interface AnalysisReport {
  /** Smoothing window used */
  window: number;

  /** Cities present in the report, in order of first appearance */
  cities: string[];

  /** Descriptive statistics of the smoothed column */
  summary: DescriptiveStats;

  /** Baselines sorted by city, then season */
  seasonalStats: SeasonalStat[];

  /** Flagged records in chronological order */
  anomalies: AnomalyRecord[];

  /** Smoothed records in chronological order */
  records: TemperatureRecord[];

  /** Timestamp when this report was computed */
  computedAt: number;
}

export interface LiveAnalysisReport {
  report: AnalysisReport;
  live: LiveOutcome;
}
