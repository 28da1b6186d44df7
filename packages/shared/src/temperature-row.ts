/**
 * A single row of the historical temperature dataset, as handed over by the
 * loader. Values are not yet validated.
 */
export interface RawTemperatureRow {
  /** ISO 8601 date/time string or Unix timestamp in milliseconds */
  timestamp: string | number;

  /** City name, e.g. 'Moscow' */
  city: string;

  /** Temperature in °C; numeric strings are accepted */
  temperature: number | string;

  /** Categorical season label, e.g. 'winter' */
  season: string;
}
