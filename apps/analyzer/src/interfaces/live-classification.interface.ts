import { LiveFetchError, LiveReadingStatus } from '@thermo-baseline/shared';
import { SeasonalStat } from './seasonal-stat.interface';

/**
 * Why a live reading could not be classified
 */
export type IndeterminateReason = 'no-baseline-for-season' | 'undefined-baseline';

/**
 * Classification of a live reading against its city's current-season baseline
 */
export interface LiveClassification {
  city: string;

  /** Live temperature in °C */
  temperature: number;

  /** Season of the city's most recent record; null when the city is unknown */
  season: string | null;

  status: LiveReadingStatus;

  /** Set only when status is 'indeterminate' */
  reason?: IndeterminateReason;

  /** Baseline used for the comparison, when one exists */
  baseline?: SeasonalStat;

  /** |temperature - mean|, when a mean exists */
  deviation?: number;
}

/**
 * Outcome of the live flow when the fetch itself failed
 */
export interface LiveFetchFailure {
  city: string;
  status: 'indeterminate';
  error: LiveFetchError;
}

export type LiveOutcome = LiveClassification | LiveFetchFailure;
