import { describe, expect, it } from 'vitest';
import {
  clamp,
  formatCurrency,
  formatPercent,
  mean,
  round,
  sampleStdDev,
  sum,
} from '../../src/utils/helpers.js';

describe('helpers', () => {
  it('formatCurrency', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(100000)).toBe('$100,000.00');
  });

  it('formatPercent', () => {
    expect(formatPercent(0.1234)).toBe('12.34%');
    expect(formatPercent(-0.1)).toBe('-10.00%');
  });

  it('clamp', () => {
    expect(clamp(150, 0, 100)).toBe(100);
    expect(clamp(-5, 0, 100)).toBe(0);
    expect(clamp(42, 0, 100)).toBe(42);
  });

  it('round', () => {
    expect(round(3.14159)).toBe(3.14);
    expect(round(3.14159, 3)).toBe(3.142);
  });

  it('sum and mean', () => {
    expect(sum([1, 2, 3])).toBe(6);
    expect(mean([1, 2, 3])).toBe(2);
    expect(mean([])).toBe(0);
  });

  describe('sampleStdDev', () => {
    it('uses the n - 1 denominator', () => {
      expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12);
    });

    it('is 0 for fewer than two values', () => {
      expect(sampleStdDev([])).toBe(0);
      expect(sampleStdDev([5])).toBe(0);
    });
  });
});
