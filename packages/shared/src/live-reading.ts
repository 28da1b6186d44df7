export type LiveReadingStatus = 'normal' | 'anomalous' | 'indeterminate';

/**
 * Structured failure of the live-reading fetch. Returned, never thrown.
 */
export interface LiveFetchError {
  kind: 'live-fetch-error';

  /** Provider message (verbatim) or transport error message */
  message: string;

  /** HTTP status, when the provider answered */
  status?: number;
}

export type LiveReadingResult =
  | { ok: true; city: string; temperature: number }
  | { ok: false; error: LiveFetchError };
