import { TemperatureRecord } from '../interfaces/temperature-record.interface';
import { IngestionException } from '../exceptions';

type RowField = 'timestamp' | 'city' | 'temperature' | 'season';

/**
 * Validates raw dataset rows and turns them into TemperatureRecords.
 *
 * Handles loader quirks:
 * - temperatures delivered as numeric strings ("-3.5")
 * - timestamps as date strings or epoch milliseconds
 * - stray whitespace around city and season labels
 */
export class TemperatureRowNormalizer {
  readonly name = 'TemperatureRowNormalizer';

  /**
   * Normalize a single raw row
   * @throws IngestionException if a required field is missing or malformed
   */
  normalize(row: unknown, index?: number): TemperatureRecord {
    if (typeof row !== 'object' || row === null) {
      throw new IngestionException('Row must be an object', row, index);
    }

    const city = this.normalizeLabel(row, 'city', index);
    const season = this.normalizeLabel(row, 'season', index);
    const temperatureRaw = this.normalizeTemperature(row, index);
    const epochMs = this.normalizeTimestamp(row, index);

    return {
      city,
      season,
      temperatureRaw,
      epochMs,
      timestamp: new Date(epochMs).toISOString(),
    };
  }

  protected normalizeLabel(row: object, field: 'city' | 'season', index?: number): string {
    const value = readField(row, field);
    if (typeof value !== 'string' || value.trim() === '') {
      throw new IngestionException(
        `Column '${field}' is required and must be a non-empty string`,
        row,
        index,
      );
    }
    return value.trim();
  }

  protected normalizeTemperature(row: object, index?: number): number {
    const value = readField(row, 'temperature');
    const parsed =
      typeof value === 'number'
        ? value
        : typeof value === 'string' && value.trim() !== ''
          ? Number(value)
          : NaN;

    if (!Number.isFinite(parsed)) {
      throw new IngestionException(
        `Column 'temperature' must be a finite number, got ${JSON.stringify(value) ?? 'nothing'}`,
        row,
        index,
      );
    }
    return parsed;
  }

  protected normalizeTimestamp(row: object, index?: number): number {
    const value = readField(row, 'timestamp');
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new IngestionException(
        `Column 'timestamp' is required and must be a date string or epoch milliseconds`,
        row,
        index,
      );
    }

    const epochMs = new Date(value).getTime();
    if (isNaN(epochMs)) {
      throw new IngestionException(`Invalid timestamp: ${value}`, row, index);
    }
    return epochMs;
  }
}

function readField(row: object, field: RowField): unknown {
  return Reflect.get(row, field);
}
