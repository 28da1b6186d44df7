import { Injectable, Logger } from '@nestjs/common';
import { AnomalyRecord, TemperatureRecord } from '../interfaces/temperature-record.interface';
import { SeasonalStat } from '../interfaces/seasonal-stat.interface';
import { ANOMALY_SIGMA } from '../config/analysis.config';
import { MissingSmoothedValueException } from '../exceptions';
import { SeasonalStatsService } from './seasonal-stats.service';
import { SeasonalBaselines } from './seasonal-baselines';

/**
 * Anomaly Detection Service
 *
 * Flags records whose smoothed temperature lies outside
 * mean ± ANOMALY_SIGMA · stddev of their own (city, season) group.
 *
 * - Groups with undefined stddev (fewer than 2 samples) produce no flags.
 * - Insufficient-history records are never flagged.
 * - Output keeps the input order and contains the input records themselves.
 */
@Injectable()
export class AnomalyDetectionService {
  private readonly logger = new Logger(AnomalyDetectionService.name);

  constructor(private readonly seasonalStatsService: SeasonalStatsService) {}

  /**
   * @param records Smoothed records
   * @param baselines Precomputed baselines of the same records; computed when omitted
   * @throws MissingSmoothedValueException if a record was never smoothed
   */
  detect(
    records: readonly TemperatureRecord[],
    baselines: SeasonalBaselines = this.seasonalStatsService.calculate(records),
  ): AnomalyRecord[] {
    const anomalies = records.filter((record) => {
      if (record.temperatureSmoothed === undefined) {
        throw new MissingSmoothedValueException(record);
      }
      if (record.temperatureSmoothed === null) {
        return false;
      }
      const baseline = baselines.get(record);
      return baseline !== undefined && isOutsideBand(record.temperatureSmoothed, baseline);
    });

    this.logger.debug(`Flagged ${anomalies.length}/${records.length} records as anomalous`);
    return anomalies;
  }
}

/**
 * True when value lies strictly outside mean ± sigma · stddev.
 * An undefined baseline never flags.
 */
export function isOutsideBand(
  value: number,
  baseline: Pick<SeasonalStat, 'mean' | 'stddev'>,
  sigma: number = ANOMALY_SIGMA,
): boolean {
  if (baseline.mean === null || baseline.stddev === null) {
    return false;
  }
  return (
    value < baseline.mean - sigma * baseline.stddev ||
    value > baseline.mean + sigma * baseline.stddev
  );
}
