import { describeSeries, mean, quantile, sampleStdDev, stableSum } from './statistics';

describe('statistics', () => {
  describe('stableSum', () => {
    it('should not depend on input order', () => {
      const values = [0.1, 1e16, 0.2, -1e16, 0.3];
      const reversed = [...values].reverse();
      expect(stableSum(values)).toBe(stableSum(reversed));
    });

    it('should return 0 for an empty list', () => {
      expect(stableSum([])).toBe(0);
    });
  });

  describe('mean', () => {
    it('should return the arithmetic mean', () => {
      expect(mean([2, 4, 6])).toBe(4);
    });

    it('should return null for an empty list', () => {
      expect(mean([])).toBeNull();
    });
  });

  describe('sampleStdDev', () => {
    it('should divide by n - 1', () => {
      // mean 5, squared diffs 9 + 1 + 1 + 9 = 20, 20 / 3
      expect(sampleStdDev([2, 4, 6, 8])).toBeCloseTo(Math.sqrt(20 / 3), 12);
    });

    it('should be null for a single value', () => {
      expect(sampleStdDev([42])).toBeNull();
    });

    it('should be null for an empty list', () => {
      expect(sampleStdDev([])).toBeNull();
    });

    it('should be 0 for identical values', () => {
      expect(sampleStdDev([3, 3, 3])).toBe(0);
    });
  });

  describe('quantile', () => {
    it('should interpolate linearly between ranks', () => {
      const sorted = [1, 2, 3, 4];
      expect(quantile(sorted, 0.25)).toBe(1.75);
      expect(quantile(sorted, 0.5)).toBe(2.5);
      expect(quantile(sorted, 0.75)).toBe(3.25);
    });

    it('should return exact ranks at the ends', () => {
      expect(quantile([5, 7, 9], 0)).toBe(5);
      expect(quantile([5, 7, 9], 1)).toBe(9);
    });

    it('should return null for an empty list', () => {
      expect(quantile([], 0.5)).toBeNull();
    });
  });

  describe('describeSeries', () => {
    it('should summarize an unsorted column', () => {
      expect(describeSeries([4, 1, 3, 2])).toEqual({
        count: 4,
        mean: 2.5,
        std: Math.sqrt(5 / 3),
        min: 1,
        p25: 1.75,
        p50: 2.5,
        p75: 3.25,
        max: 4,
      });
    });

    it('should report nulls for an empty column', () => {
      expect(describeSeries([])).toEqual({
        count: 0,
        mean: null,
        std: null,
        min: null,
        p25: null,
        p50: null,
        p75: null,
        max: null,
      });
    });
  });
});
