/**
 * Interface for smoothing strategy implementations.
 * A strategy works on the values of a single, time-ordered series.
 */
export interface Smoother {
  /**
   * Smooth a series
   * @param values Raw values in chronological order
   * @param window Number of trailing samples per output value
   * @returns One entry per input value; null where the window is not yet filled
   */
  smooth(values: readonly number[], window: number): (number | null)[];

  /**
   * Name of the smoothing method
   */
  readonly name: string;
}
