import { Injectable, Logger } from '@nestjs/common';
import { TemperatureRecord } from '../interfaces/temperature-record.interface';
import { LiveClassification } from '../interfaces/live-classification.interface';
import { ANOMALY_SIGMA } from '../config/analysis.config';
import { findLatestRecord } from '../store/temperature-record.store';
import { SeasonalBaselines } from './seasonal-baselines';

/**
 * Live Classifier Service
 *
 * Classifies a live temperature against the baseline of the city's current
 * season, i.e. the season of its chronologically latest record.
 * Readings without a usable baseline are 'indeterminate', never 'normal'.
 */
@Injectable()
export class LiveClassifierService {
  private readonly logger = new Logger(LiveClassifierService.name);

  /**
   * Season of the city's most recent record, or null if the city has no records
   */
  resolveCurrentSeason(records: readonly TemperatureRecord[], city: string): string | null {
    return findLatestRecord(records, city)?.season ?? null;
  }

  classify(
    city: string,
    temperature: number,
    records: readonly TemperatureRecord[],
    baselines: SeasonalBaselines,
  ): LiveClassification {
    const season = this.resolveCurrentSeason(records, city);
    const baseline = season === null ? undefined : baselines.get({ city, season });

    if (season === null || !baseline || baseline.mean === null) {
      this.logger.warn(
        `No baseline for ${city} in season ${season ?? '<unknown>'}; reading ${temperature} is indeterminate`,
      );
      return {
        city,
        temperature,
        season,
        status: 'indeterminate',
        reason: 'no-baseline-for-season',
        ...(baseline ? { baseline } : {}),
      };
    }

    const deviation = Math.abs(temperature - baseline.mean);

    if (baseline.stddev === null) {
      this.logger.warn(
        `Baseline for ${city}/${season} has ${baseline.sampleCount} sample(s); reading ${temperature} is indeterminate`,
      );
      return {
        city,
        temperature,
        season,
        status: 'indeterminate',
        reason: 'undefined-baseline',
        baseline,
        deviation,
      };
    }

    const isNormal = deviation <= ANOMALY_SIGMA * baseline.stddev;
    this.logger.log(
      `Live reading for ${city}: ${temperature}°C is ${isNormal ? 'normal' : 'anomalous'} for ${season} ` +
        `(mean ${baseline.mean.toFixed(2)}, stddev ${baseline.stddev.toFixed(2)})`,
    );

    return {
      city,
      temperature,
      season,
      status: isNormal ? 'normal' : 'anomalous',
      baseline,
      deviation,
    };
  }
}
