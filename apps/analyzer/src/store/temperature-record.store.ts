import { TemperatureRecord } from '../interfaces/temperature-record.interface';

/**
 * Immutable, chronologically ordered sequence of ingested records for one
 * analysis run. Records with equal timestamps keep their input order.
 */
export class TemperatureRecordStore {
  private readonly records: readonly TemperatureRecord[];

  constructor(records: readonly TemperatureRecord[]) {
    this.records = Object.freeze(
      records
        .map((record, index) => ({ record, index }))
        .sort((a, b) => a.record.epochMs - b.record.epochMs || a.index - b.index)
        .map(({ record }) => Object.freeze({ ...record })),
    );
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly TemperatureRecord[] {
    return this.records;
  }

  /**
   * Cities in order of first appearance
   */
  cities(): string[] {
    return [...new Set(this.records.map((r) => r.city))];
  }
}

/**
 * Latest record of a city in any record list (ties resolve to the later entry)
 */
export function findLatestRecord(
  records: readonly TemperatureRecord[],
  city: string,
): TemperatureRecord | undefined {
  let latest: TemperatureRecord | undefined;
  for (const record of records) {
    if (record.city === city && (!latest || record.epochMs >= latest.epochMs)) {
      latest = record;
    }
  }
  return latest;
}
