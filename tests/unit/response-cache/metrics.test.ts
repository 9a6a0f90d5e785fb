/**
 * Unit tests for metric aggregation helpers
 */

import { max, mean, median, min, sum } from '../../../src/cache/metrics';

describe('metrics helpers', () => {
  it('returns 0 for empty input', () => {
    expect(max([])).toBe(0);
    expect(min([])).toBe(0);
    expect(mean([])).toBe(0);
    expect(median([])).toBe(0);
    expect(sum([])).toBe(0);
  });

  it('finds extremes including negatives', () => {
    expect(max([-3, -1, -2])).toBe(-1);
    expect(min([4, 2, 9])).toBe(2);
  });

  it('handles lists larger than the argument limit', () => {
    const values = Array.from({ length: 500_000 }, (_, i) => (i * 7919) % 500_000);
    expect(max(values)).toBe(499_999);
    expect(min(values)).toBe(0);
  });

  it('averages the middle pair for an even-length median', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });
});
