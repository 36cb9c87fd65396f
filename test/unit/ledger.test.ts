import { describe, expect, it } from 'vitest';
import {
  InsufficientCashError,
  InvalidTradeError,
  MissingPriceError,
} from '../../src/backtest/errors.js';
import { PortfolioLedger } from '../../src/portfolio/ledger.js';

describe('PortfolioLedger', () => {
  it('moves cash by notional plus cost and tracks shares', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    expect(ledger.applyTrade('A', 5, 100, 1)).toBe(499);
    expect(ledger.cash).toBe(499);
    expect(ledger.shares('A')).toBe(5);

    ledger.applyTrade('A', -5, 110, 0);
    expect(ledger.cash).toBe(1049);
    expect(ledger.shares('A')).toBe(0);
    expect(ledger.holdings().size).toBe(0);
  });

  it('refuses to sell more than is held', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    ledger.applyTrade('A', 2, 100, 0);
    expect(() => ledger.applyTrade('A', -3, 100, 0)).toThrow(InvalidTradeError);
    expect(ledger.shares('A')).toBe(2);
  });

  it('refuses a buy that would leave cash below the tolerance', () => {
    const ledger = new PortfolioLedger({ initialCash: 100 });
    expect(() => ledger.applyTrade('A', 2, 100, 0)).toThrow(InsufficientCashError);
    expect(ledger.cash).toBe(100);
    expect(ledger.shares('A')).toBe(0);
  });

  it('allows floating-point residue within the tolerance', () => {
    const ledger = new PortfolioLedger({ initialCash: 100, cashTolerance: 1e-6 });
    ledger.applyTrade('A', 1, 100, 1e-7);
    expect(ledger.cash).toBeCloseTo(-1e-7, 12);
  });

  it('rejects non-positive prices and negative costs', () => {
    const ledger = new PortfolioLedger({ initialCash: 100 });
    expect(() => ledger.applyTrade('A', 1, 0, 0)).toThrow(InvalidTradeError);
    expect(() => ledger.applyTrade('A', Number.NaN, 10, 0)).toThrow(InvalidTradeError);
    expect(() => ledger.applyTrade('A', 1, 10, -1)).toThrow('Negative or non-finite cost -1 for A');
  });

  it('names the symbol when a held position has no price', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    ledger.applyTrade('A', 1, 100, 0);
    expect(() => ledger.totalEquity({})).toThrow(MissingPriceError);
    expect(() => ledger.totalEquity({})).toThrow('No price for held symbol A');
  });

  it('names the date in a missing-price error when one is given', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    ledger.applyTrade('A', 1, 100, 0);
    expect(() => ledger.weights({}, '2024-01-05')).toThrow('No price for held symbol A on 2024-01-05');
    expect(() => ledger.snapshot('2024-01-05', {})).toThrow(MissingPriceError);
  });

  it('computes equity and percentage weights at given prices', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    ledger.applyTrade('A', 5, 100, 0);

    expect(ledger.totalEquity({ A: 100 })).toBe(1000);
    expect(ledger.weights({ A: 100 })).toEqual({ A: 50 });
    expect(ledger.totalEquity({ A: 300 })).toBe(2000);
    expect(ledger.weights({ A: 300 })).toEqual({ A: 75 });
  });

  it('hands out frozen snapshots and copied holdings', () => {
    const ledger = new PortfolioLedger({ initialCash: 1000 });
    ledger.applyTrade('A', 5, 100, 0);

    const snapshot = ledger.snapshot('2024-01-02', { A: 100 });
    expect(snapshot).toEqual({
      date: '2024-01-02',
      cash: 500,
      positions: { A: 5 },
      prices: { A: 100 },
      totalEquity: 1000,
      weights: { A: 50 },
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.positions)).toBe(true);

    ledger.holdings().set('A', 1000);
    expect(ledger.shares('A')).toBe(5);
  });
});
