import { Injectable, Logger } from '@nestjs/common';
import { TemperatureRecord } from '../interfaces/temperature-record.interface';
import { SeasonalStat } from '../interfaces/seasonal-stat.interface';
import { MissingSmoothedValueException } from '../exceptions';
import { encodeGroupKey } from '../utils/group-key';
import { mean, sampleStdDev } from '../utils/statistics';
import { SeasonalBaselines } from './seasonal-baselines';

/**
 * Seasonal Stats Service
 *
 * Computes the per-(city, season) baseline of the smoothed series. This is the
 * single source of baselines: anomaly detection and live classification both
 * read from its output.
 */
@Injectable()
export class SeasonalStatsService {
  private readonly logger = new Logger(SeasonalStatsService.name);

  /**
   * Group smoothed records by (city, season) and compute mean and sample stddev.
   *
   * Insufficient-history records (null) count towards `recordCount` only.
   * @throws MissingSmoothedValueException if a record was never smoothed
   */
  calculate(records: readonly TemperatureRecord[]): SeasonalBaselines {
    const groups = new Map<string, { city: string; season: string; values: number[]; recordCount: number }>();

    for (const record of records) {
      if (record.temperatureSmoothed === undefined) {
        throw new MissingSmoothedValueException(record);
      }

      const key = encodeGroupKey(record);
      let group = groups.get(key);
      if (!group) {
        group = { city: record.city, season: record.season, values: [], recordCount: 0 };
        groups.set(key, group);
      }

      group.recordCount++;
      if (record.temperatureSmoothed !== null) {
        group.values.push(record.temperatureSmoothed);
      }
    }

    const stats: SeasonalStat[] = [...groups.values()].map((group) => ({
      city: group.city,
      season: group.season,
      mean: mean(group.values),
      stddev: sampleStdDev(group.values),
      sampleCount: group.values.length,
      recordCount: group.recordCount,
    }));

    const undefinedBaselines = stats.filter((s) => s.stddev === null).length;
    this.logger.debug(
      `Computed ${stats.length} seasonal baselines (${undefinedBaselines} with undefined stddev)`,
    );

    return new SeasonalBaselines(stats);
  }
}
