/**
 * Analysis configuration
 *
 * Static defaults for the pipeline. Runtime overrides come from the
 * environment through ConfigService (see AnalysisService and WeatherClientService).
 */

/** Trailing samples per smoothed value */
export const DEFAULT_SMOOTHING_WINDOW = 30;

/** Anomaly band half-width, in standard deviations */
export const ANOMALY_SIGMA = 2;

/** Default endpoint of the current-weather provider (OpenWeatherMap compatible) */
export const DEFAULT_WEATHER_API_URL = 'https://api.openweathermap.org/data/2.5/weather';

/** Timeout of a live-reading request */
export const DEFAULT_WEATHER_TIMEOUT_MS = 10000;

/**
 * Parse a window from configuration, falling back to the default
 */
export function resolveWindow(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_SMOOTHING_WINDOW;
}
