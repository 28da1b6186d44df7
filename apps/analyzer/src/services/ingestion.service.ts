import { Injectable, Logger } from '@nestjs/common';
import { TemperatureRecord } from '../interfaces/temperature-record.interface';
import { TemperatureRowNormalizer } from '../normalizers';
import { IngestionException } from '../exceptions';
import { TemperatureRecordStore } from '../store/temperature-record.store';

/**
 * Row that failed ingestion
 */
export interface IngestionFailure {
  rowIndex: number;
  row: unknown;
  error: string;
}

export interface IngestionResult {
  successful: TemperatureRecord[];
  failed: IngestionFailure[];
}

/**
 * Turns raw dataset rows (RawTemperatureRow-shaped, not yet trusted) into a
 * TemperatureRecordStore.
 * A single malformed row aborts the run.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly normalizer = new TemperatureRowNormalizer();

  /**
   * @throws IngestionException if the dataset is empty or any row is malformed
   */
  ingest(rows: readonly unknown[]): TemperatureRecordStore {
    if (rows.length === 0) {
      throw new IngestionException('Dataset contains no records');
    }

    const records = rows.map((row, index) => this.normalizer.normalize(row, index));
    const store = new TemperatureRecordStore(records);

    this.logger.log(
      `Ingested ${store.size} records for ${store.cities().length} cities using ${this.normalizer.name}`,
    );
    return store;
  }

  /**
   * Normalize every row and report failures instead of throwing
   */
  ingestWithErrors(rows: readonly unknown[]): IngestionResult {
    const successful: TemperatureRecord[] = [];
    const failed: IngestionFailure[] = [];

    rows.forEach((row, rowIndex) => {
      try {
        successful.push(this.normalizer.normalize(row, rowIndex));
      } catch (error) {
        failed.push({
          rowIndex,
          row,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    this.logger.log(
      `Ingestion check complete: ${successful.length} valid, ${failed.length} invalid`,
    );

    return { successful, failed };
  }
}
