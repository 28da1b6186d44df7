/**
 * A validated temperature observation for one city at one instant.
 *
 * `temperatureSmoothed` is:
 * - `undefined` until the smoothing stage has run,
 * - `null` when fewer than `window` same-city records precede it (insufficient history),
 * - the trailing mean otherwise.
 */
export interface TemperatureRecord {
  /** Trimmed city name */
  city: string;

  /** ISO 8601 UTC timestamp string (e.g. '2024-01-15T00:00:00.000Z') */
  timestamp: string;

  /** Unix timestamp in milliseconds, used for ordering */
  epochMs: number;

  /** Trimmed season label */
  season: string;

  /** Temperature as ingested, in °C */
  temperatureRaw: number;

  /** Trailing moving average of `temperatureRaw` */
  temperatureSmoothed?: number | null;
}

/**
 * A record flagged as statistically extreme for its (city, season) group.
 * Always one of the smoothed store records, unchanged.
 */
export type AnomalyRecord = TemperatureRecord;
