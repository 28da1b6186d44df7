import { RawTemperatureRow } from '@thermo-baseline/shared';
import { TemperatureRecord } from '../interfaces/temperature-record.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

/** 2024-01-01T00:00:00.000Z */
export const START_EPOCH_MS = Date.UTC(2024, 0, 1);

/**
 * Consecutive daily raw rows for one city, starting 2024-01-01
 */
export function dailyRows(
  city: string,
  temperatures: number[],
  season: string | ((day: number) => string) = 'winter',
  startEpochMs: number = START_EPOCH_MS,
): RawTemperatureRow[] {
  return temperatures.map((temperature, day) => ({
    city,
    temperature,
    season: typeof season === 'string' ? season : season(day),
    timestamp: new Date(startEpochMs + day * DAY_MS).toISOString(),
  }));
}

/**
 * Consecutive daily records, already ingested, for one city
 */
export function dailyRecords(
  city: string,
  temperatures: number[],
  season = 'winter',
  startEpochMs: number = START_EPOCH_MS,
): TemperatureRecord[] {
  return temperatures.map((temperatureRaw, day) => {
    const epochMs = startEpochMs + day * DAY_MS;
    return {
      city,
      season,
      temperatureRaw,
      epochMs,
      timestamp: new Date(epochMs).toISOString(),
    };
  });
}

/**
 * Records with smoothed values set directly, for stages after smoothing
 */
export function smoothedRecords(
  city: string,
  season: string,
  smoothed: (number | null)[],
): TemperatureRecord[] {
  return dailyRecords(city, smoothed.map((v) => v ?? 0), season).map((record, i) => ({
    ...record,
    temperatureSmoothed: smoothed[i],
  }));
}

/**
 * 35 consecutive winter days for city "A": 0.0 everywhere, 50.0 on day 20
 * (index 19).
 */
export const SPIKE_DAY_INDEX = 19;
export const spikeRows: RawTemperatureRow[] = dailyRows(
  'A',
  Array.from({ length: 35 }, (_, i) => (i === SPIKE_DAY_INDEX ? 50 : 0)),
);

export const malformedRows: Record<string, unknown> = {
  missingCity: { timestamp: '2024-01-01', temperature: 1, season: 'winter' },
  blankSeason: { timestamp: '2024-01-01', city: 'Oslo', temperature: 1, season: '   ' },
  textTemperature: { timestamp: '2024-01-01', city: 'Oslo', temperature: 'warm', season: 'winter' },
  infiniteTemperature: { timestamp: '2024-01-01', city: 'Oslo', temperature: Infinity, season: 'winter' },
  badTimestamp: { timestamp: 'not-a-date', city: 'Oslo', temperature: 1, season: 'winter' },
  missingTimestamp: { city: 'Oslo', temperature: 1, season: 'winter' },
};
