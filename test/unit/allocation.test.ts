import { describe, expect, it } from 'vitest';
import { normalizeAllocation } from '../../src/execution/allocation.js';

describe('normalizeAllocation', () => {
  it('passes a valid allocation through untouched', () => {
    expect(normalizeAllocation({ A: 60, B: 40 })).toEqual({
      ok: true,
      allocation: { A: 60, B: 40 },
      adjusted: false,
    });
  });

  it('clamps each weight into [0, 100]', () => {
    expect(normalizeAllocation({ A: -5, B: 50 })).toEqual({
      ok: true,
      allocation: { A: 0, B: 50 },
      adjusted: true,
    });
    expect(normalizeAllocation({ A: 150 })).toEqual({
      ok: true,
      allocation: { A: 100 },
      adjusted: true,
    });
  });

  it('scales an over-allocated target down to exactly 100', () => {
    const result = normalizeAllocation({ A: 80, B: 80 });
    expect(result).toEqual({ ok: true, allocation: { A: 50, B: 50 }, adjusted: true });
  });

  it('tolerates a small excess', () => {
    expect(normalizeAllocation({ A: 60, B: 40.005 })).toEqual({
      ok: true,
      allocation: { A: 60, B: 40.005 },
      adjusted: false,
    });
  });

  it('drops an explicit cash entry', () => {
    expect(normalizeAllocation({ CASH: 20, A: 80 })).toEqual({
      ok: true,
      allocation: { A: 80 },
      adjusted: false,
    });
  });

  it('accepts an empty mapping', () => {
    expect(normalizeAllocation({})).toEqual({ ok: true, allocation: {}, adjusted: false });
  });

  it('rejects results that are not a symbol mapping', () => {
    for (const raw of [null, undefined, 'A', 42, [50, 50]]) {
      expect(normalizeAllocation(raw)).toEqual({
        ok: false,
        error: 'allocation must be a symbol -> percent mapping',
      });
    }
  });

  it('rejects non-finite and non-numeric weights', () => {
    expect(normalizeAllocation({ A: Number.NaN })).toEqual({
      ok: false,
      error: 'weight for A is not a finite number',
    });
    expect(normalizeAllocation({ B: Number.POSITIVE_INFINITY })).toEqual({
      ok: false,
      error: 'weight for B is not a finite number',
    });
    expect(normalizeAllocation({ C: '50' })).toEqual({
      ok: false,
      error: 'weight for C is not a finite number',
    });
  });
});
