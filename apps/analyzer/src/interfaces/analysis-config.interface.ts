/**
 * Options for one analysis run
 */
export interface AnalysisOptions {
  /** Smoothing window (default: SMOOTHING_WINDOW or 30) */
  window?: number;

  /** Restrict the report tables to this city; statistics are still computed on the full dataset */
  city?: string;
}

/**
 * Options for the live-reading flow
 */
export interface LiveAnalysisOptions extends AnalysisOptions {
  city: string;

  /** Provider API key; falls back to WEATHER_API_KEY */
  apiKey?: string;

  /** Aborts the live fetch without affecting the historical results */
  signal?: AbortSignal;
}
