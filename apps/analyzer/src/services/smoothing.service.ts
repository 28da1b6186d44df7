import { Injectable, Logger } from '@nestjs/common';
import { TemperatureRecord } from '../interfaces/temperature-record.interface';
import { Smoother } from '../interfaces/smoother.interface';
import { TrailingMeanSmoother } from '../strategies/smoothers/trailing-mean.smoother';
import { DEFAULT_SMOOTHING_WINDOW } from '../config/analysis.config';
import { InvalidWindowException } from '../exceptions';

/**
 * Smoothing Service
 *
 * Applies a smoothing strategy to each city's series independently. Records
 * are partitioned by city before any windowing, so a window never spans two
 * cities.
 */
@Injectable()
export class SmoothingService {
  private readonly logger = new Logger(SmoothingService.name);

  constructor(private readonly smoother: TrailingMeanSmoother) {}

  /**
   * Attach `temperatureSmoothed` to every record.
   *
   * @param records Records in chronological order (as held by TemperatureRecordStore)
   * @param window Trailing samples per smoothed value
   * @returns New records in the same order; inputs are left untouched
   * @throws InvalidWindowException if window is not a positive integer
   */
  smooth(
    records: readonly TemperatureRecord[],
    window: number = DEFAULT_SMOOTHING_WINDOW,
    smoother: Smoother = this.smoother,
  ): TemperatureRecord[] {
    if (!Number.isInteger(window) || window < 1) {
      throw new InvalidWindowException(window);
    }

    // Positions of each city's records in the input sequence
    const positionsByCity = new Map<string, number[]>();
    records.forEach((record, position) => {
      const positions = positionsByCity.get(record.city) ?? [];
      positions.push(position);
      positionsByCity.set(record.city, positions);
    });

    const smoothed: (number | null)[] = new Array<number | null>(records.length).fill(null);

    for (const [city, positions] of positionsByCity) {
      const ordered = [...positions].sort(
        (a, b) => records[a].epochMs - records[b].epochMs || a - b,
      );
      const values = smoother.smooth(
        ordered.map((p) => records[p].temperatureRaw),
        window,
      );
      ordered.forEach((position, i) => {
        smoothed[position] = values[i];
      });

      this.logger.debug(
        `Smoothed ${ordered.length} records for ${city} (${smoother.name}, window ${window})`,
      );
    }

    return records.map((record, position) => ({
      ...record,
      temperatureSmoothed: smoothed[position],
    }));
  }
}
