import { Injectable } from '@nestjs/common';
import { Smoother } from '../../interfaces/smoother.interface';

/**
 * Trailing Mean Smoother
 *
 * Each output value is the arithmetic mean of the current raw value and the
 * `window - 1` values before it. Positions where fewer than `window` values
 * are available produce null instead of a partial mean.
 *
 * Every window is summed from scratch rather than with a running total, so
 * output i is exactly the mean of values[i - window + 1 .. i].
 */
@Injectable()
export class TrailingMeanSmoother implements Smoother {
  readonly name = 'trailing-mean';

  smooth(values: readonly number[], window: number): (number | null)[] {
    return values.map((_, i) => {
      if (i < window - 1) {
        return null;
      }
      let sum = 0;
      for (let j = i - window + 1; j <= i; j++) {
        sum += values[j];
      }
      return sum / window;
    });
  }
}
