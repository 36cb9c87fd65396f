import {
  InsufficientCashError,
  InvalidTradeError,
  MissingPriceError,
} from '../backtest/errors.js';
import type { PortfolioSnapshot, PriceMap } from '../backtest/types.js';

const SHARE_EPSILON = 1e-9;

export interface LedgerOptions {
  initialCash: number;
  /** How far below zero cash may dip from floating-point residue before a trade is refused. */
  cashTolerance?: number;
}

/**
 * Cash balance plus long-only share counts. The only mutable state of a run;
 * nothing reads policy output here, it just executes the trades it is handed.
 */
export class PortfolioLedger {
  private cashBalance: number;
  private readonly positions = new Map<string, number>();
  private readonly cashTolerance: number;

  constructor(options: LedgerOptions) {
    this.cashBalance = options.initialCash;
    this.cashTolerance = options.cashTolerance ?? 1e-6;
  }

  get cash(): number {
    return this.cashBalance;
  }

  shares(symbol: string): number {
    return this.positions.get(symbol) ?? 0;
  }

  holdings(): Map<string, number> {
    return new Map(this.positions);
  }

  /**
   * Apply a signed share change at `price`. Cash moves by -(quantity * price) - cost.
   * Returns the cash balance afterwards.
   */
  applyTrade(symbol: string, quantity: number, price: number, cost: number): number {
    if (!Number.isFinite(quantity) || !Number.isFinite(price) || price <= 0) {
      throw new InvalidTradeError(`Invalid trade in ${symbol}: ${quantity} @ ${price}`, {
        symbol,
        quantity,
        price,
      });
    }
    if (!Number.isFinite(cost) || cost < 0) {
      throw new InvalidTradeError(`Negative or non-finite cost ${cost} for ${symbol}`, {
        symbol,
        cost,
      });
    }

    const held = this.shares(symbol);
    const nextShares = held + quantity;
    if (nextShares < -SHARE_EPSILON) {
      throw new InvalidTradeError(
        `Selling ${-quantity} ${symbol} exceeds the ${held} held; short positions are not allowed`,
        { symbol, quantity, held },
      );
    }

    const nextCash = this.cashBalance - quantity * price - cost;
    if (nextCash < -this.cashTolerance) {
      throw new InsufficientCashError(symbol, quantity * price + cost, this.cashBalance);
    }

    this.cashBalance = nextCash;
    if (Math.abs(nextShares) <= SHARE_EPSILON) {
      this.positions.delete(symbol);
    } else {
      this.positions.set(symbol, nextShares);
    }
    return this.cashBalance;
  }

  /** Market value of every position at `prices`. `date` only labels a missing-price error. */
  positionValues(prices: PriceMap, date?: string): Map<string, number> {
    const values = new Map<string, number>();
    for (const [symbol, shares] of this.positions) {
      const price = prices[symbol];
      if (price === undefined) {
        throw new MissingPriceError(symbol, date);
      }
      values.set(symbol, shares * price);
    }
    return values;
  }

  totalEquity(prices: PriceMap, date?: string): number {
    let equity = this.cashBalance;
    for (const value of this.positionValues(prices, date).values()) {
      equity += value;
    }
    return equity;
  }

  /** Symbol -> percent of total equity. Empty when equity is not positive. */
  weights(prices: PriceMap, date?: string): Record<string, number> {
    const values = this.positionValues(prices, date);
    let equity = this.cashBalance;
    for (const value of values.values()) equity += value;

    const weights: Record<string, number> = {};
    if (equity <= 0) return weights;
    for (const [symbol, value] of values) {
      weights[symbol] = (value / equity) * 100;
    }
    return weights;
  }

  snapshot(date: string, prices: PriceMap): PortfolioSnapshot {
    return Object.freeze({
      date,
      cash: this.cashBalance,
      positions: Object.freeze(Object.fromEntries(this.positions)),
      prices: Object.freeze({ ...prices }),
      totalEquity: this.totalEquity(prices, date),
      weights: Object.freeze(this.weights(prices, date)),
    });
  }
}
