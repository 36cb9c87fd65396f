import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../../src/backtest/errors.js';
import type { PriceMap } from '../../src/backtest/types.js';
import { PriceSeries } from '../../src/data/price-series.js';
import { PortfolioLedger } from '../../src/portfolio/ledger.js';
import { WeightedEnsemblePolicy } from '../../src/strategies/ensemble.js';
import { BuyAndHoldPolicy, FixedAllocationPolicy } from '../../src/strategies/fixed-allocation.js';
import {
  annualizedVolatility,
  getLookback,
  movingAverage,
  periodReturns,
} from '../../src/strategies/helpers.js';
import type { AllocationContext, AllocationPolicy } from '../../src/strategies/policy.js';
import { bar, bars } from '../helpers/fixtures.js';

const DATES = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04'];

function context(ledger: PortfolioLedger, prices: PriceMap, date = '2024-01-02'): AllocationContext {
  return {
    date,
    series: new Map(),
    portfolio: ledger.snapshot(date, prices),
    prices,
  };
}

describe('strategy helpers', () => {
  const series = PriceSeries.from('A', bars(DATES, [1, 2, 3, 4]));

  it('getLookback cuts the series at the date', () => {
    expect(getLookback(series, '2024-01-03', 2).map((b) => b.date)).toEqual([
      '2024-01-02',
      '2024-01-03',
    ]);
    expect(getLookback(series, '2024-01-02', 10)).toHaveLength(2);
  });

  it('movingAverage averages the trailing window or returns null', () => {
    expect(movingAverage(series.toArray(), 2)).toBe(3.5);
    expect(movingAverage(series.toArray(), 4)).toBe(2.5);
    expect(movingAverage(series.toArray(), 5)).toBeNull();
    expect(movingAverage([bar('2024-01-01', 5)], 0)).toBeNull();
  });

  it('periodReturns', () => {
    const returns = periodReturns(bars(DATES.slice(0, 3), [100, 110, 99]));
    expect(returns).toHaveLength(2);
    expect(returns[0]).toBeCloseTo(0.1, 12);
    expect(returns[1]).toBeCloseTo(-0.1, 12);
    expect(periodReturns(bars(DATES.slice(0, 3), [100, 110, 120]), 2)).toEqual([0.2]);
  });

  it('annualizedVolatility scales the sample deviation', () => {
    expect(annualizedVolatility([0.01, -0.01])).toBeCloseTo(
      Math.sqrt(0.0002) * Math.sqrt(252),
      12,
    );
    expect(annualizedVolatility([0.01])).toBe(0);
  });
});

describe('FixedAllocationPolicy', () => {
  it('asks for the same weights every time', () => {
    const policy = new FixedAllocationPolicy({ weights: { A: 60, B: 40 } });
    const ctx = context(new PortfolioLedger({ initialCash: 1000 }), { A: 10, B: 10 });

    expect(policy.name).toBe('fixed(A:60,B:40)');
    expect(policy.emptyAllocation).toBe('cash');

    const first = policy.calculateAllocation(ctx);
    first.A = 0;
    expect(policy.calculateAllocation(ctx)).toEqual({ A: 60, B: 40 });
  });

  it('takes a name and empty-allocation semantic', () => {
    const policy = new FixedAllocationPolicy({ name: 'cash-only', weights: {}, emptyAllocation: 'hold' });
    expect(policy.name).toBe('cash-only');
    expect(policy.emptyAllocation).toBe('hold');
  });
});

describe('BuyAndHoldPolicy', () => {
  it('buys its seed weights, then asks for whatever it holds', () => {
    const policy = new BuyAndHoldPolicy({ A: 100 });
    const ledger = new PortfolioLedger({ initialCash: 1000 });

    expect(policy.calculateAllocation(context(ledger, { A: 10 }))).toEqual({ A: 100 });

    ledger.applyTrade('A', 50, 10, 0);
    expect(policy.calculateAllocation(context(ledger, { A: 30 }))).toEqual({ A: 75 });
    expect(policy.emptyAllocation).toBe('hold');
  });
});

describe('WeightedEnsemblePolicy', () => {
  const ledger = new PortfolioLedger({ initialCash: 1000 });

  it('blends member allocations by weight', () => {
    const ensemble = new WeightedEnsemblePolicy([
      { policy: new FixedAllocationPolicy({ weights: { A: 100 } }), weight: 1 },
      { policy: new FixedAllocationPolicy({ weights: { B: 100 } }), weight: 3 },
    ]);
    expect(ensemble.name).toBe('ensemble(fixed(A:100)*1,fixed(B:100)*3)');
    expect(ensemble.calculateAllocation(context(ledger, {}))).toEqual({ A: 25, B: 75 });
  });

  it('lets an empty hold member keep its share in current holdings', () => {
    const holding = new PortfolioLedger({ initialCash: 1000 });
    holding.applyTrade('A', 40, 10, 0);

    const silent: AllocationPolicy = {
      name: 'silent',
      emptyAllocation: 'hold',
      calculateAllocation: () => ({}),
    };
    const ensemble = new WeightedEnsemblePolicy(
      [
        { policy: silent, weight: 1 },
        { policy: new FixedAllocationPolicy({ weights: { B: 100 } }), weight: 1 },
      ],
      'mix',
    );
    expect(ensemble.calculateAllocation(context(holding, { A: 10 }))).toEqual({ A: 20, B: 50 });
  });

  it('treats an empty cash member as cash', () => {
    const ensemble = new WeightedEnsemblePolicy([
      { policy: new FixedAllocationPolicy({ name: 'none', weights: {} }), weight: 1 },
      { policy: new FixedAllocationPolicy({ weights: { B: 100 } }), weight: 1 },
    ]);
    expect(ensemble.calculateAllocation(context(ledger, {}))).toEqual({ B: 50 });
  });

  it('rejects an empty member list and non-positive weights', () => {
    expect(() => new WeightedEnsemblePolicy([])).toThrow(ConfigurationError);
    expect(() => new WeightedEnsemblePolicy([])).toThrow('Ensemble needs at least one member');
    expect(
      () =>
        new WeightedEnsemblePolicy([
          { policy: new FixedAllocationPolicy({ name: 'p', weights: {} }), weight: 0 },
        ]),
    ).toThrow('Ensemble weight for p must be positive');
  });

  it('forwards lifecycle hooks to every member', () => {
    const member: AllocationPolicy = {
      name: 'm',
      emptyAllocation: 'cash',
      calculateAllocation: () => ({}),
      init: vi.fn(),
      onRebalance: vi.fn(),
      finalize: vi.fn(),
    };
    const ensemble = new WeightedEnsemblePolicy([{ policy: member, weight: 1 }]);
    const snapshot = ledger.snapshot('2024-01-05', {});

    ensemble.init({ symbols: ['A'], initialCash: 1000, startDate: '2024-01-01', endDate: '2024-01-05' });
    ensemble.onRebalance('2024-01-02', {}, { A: 100 });
    ensemble.finalize(snapshot);

    expect(member.init).toHaveBeenCalledWith({
      symbols: ['A'],
      initialCash: 1000,
      startDate: '2024-01-01',
      endDate: '2024-01-05',
    });
    expect(member.onRebalance).toHaveBeenCalledWith('2024-01-02', {}, { A: 100 });
    expect(member.finalize).toHaveBeenCalledWith(snapshot);
  });
});
