import type { CostConfig } from '../backtest/types.js';

const BPS = 10_000;

/**
 * Turns a trade's notional into a cash cost, and answers the inverse question the
 * engine needs when sizing buys: how much notional fits in a cash balance once the
 * cost is paid out of it too.
 */
export interface TransactionCostModel {
  readonly name: string;
  cost(notional: number): number;
  /** Largest notional n with n + cost(n) <= cash, solved in closed form. */
  maxAffordableNotional(cash: number): number;
}

/**
 * Cost of one trade of notional n: fixedFee + rate * n + impactFactor * sqrt(n).
 * The zero-notional trade costs nothing.
 */
export interface CostTerms {
  rate: number;
  fixedFee: number;
  impactFactor: number;
}

export abstract class BaseCostModel implements TransactionCostModel {
  abstract readonly name: string;
  abstract terms(): CostTerms;

  cost(notional: number): number {
    const n = Math.abs(notional);
    if (n === 0) return 0;
    const { rate, fixedFee, impactFactor } = this.terms();
    return fixedFee + rate * n + impactFactor * Math.sqrt(n);
  }

  maxAffordableNotional(cash: number): number {
    const { rate, fixedFee, impactFactor } = this.terms();
    const budget = cash - fixedFee;
    if (budget <= 0) return 0;

    const a = 1 + rate;
    if (impactFactor === 0) return budget / a;

    // a*n + k*sqrt(n) = budget is a quadratic in s = sqrt(n)
    const s = (-impactFactor + Math.sqrt(impactFactor ** 2 + 4 * a * budget)) / (2 * a);
    return s * s;
  }
}

/** Commission as basis points of notional, optionally with square-root market impact. */
export class BasisPointCostModel extends BaseCostModel {
  readonly name = 'bps';

  constructor(
    readonly bps: number,
    readonly marketImpactFactor = 0,
  ) {
    super();
  }

  terms(): CostTerms {
    return { rate: this.bps / BPS, fixedFee: 0, impactFactor: this.marketImpactFactor };
  }
}

export class FixedFeeCostModel extends BaseCostModel {
  readonly name = 'fixed';

  constructor(readonly fee: number) {
    super();
  }

  terms(): CostTerms {
    return { rate: 0, fixedFee: this.fee, impactFactor: 0 };
  }
}

/** Pays half the quoted bid-ask spread on every trade. */
export class SpreadCostModel extends BaseCostModel {
  readonly name = 'spread';

  constructor(readonly spreadBps: number) {
    super();
  }

  terms(): CostTerms {
    return { rate: this.spreadBps / 2 / BPS, fixedFee: 0, impactFactor: 0 };
  }
}

export class CompositeCostModel extends BaseCostModel {
  readonly name: string;

  constructor(readonly models: readonly BaseCostModel[]) {
    super();
    this.name = `composite(${models.map((m) => m.name).join('+')})`;
  }

  terms(): CostTerms {
    const total: CostTerms = { rate: 0, fixedFee: 0, impactFactor: 0 };
    for (const model of this.models) {
      const t = model.terms();
      total.rate += t.rate;
      total.fixedFee += t.fixedFee;
      total.impactFactor += t.impactFactor;
    }
    return total;
  }
}

export function createCostModel(config: CostConfig): BaseCostModel {
  switch (config.model) {
    case 'bps':
      return new BasisPointCostModel(config.commissionBps, config.marketImpactFactor);
    case 'fixed':
      return new FixedFeeCostModel(config.fixedFee);
    case 'spread':
      return new SpreadCostModel(config.spreadBps);
    case 'composite':
      return new CompositeCostModel([
        new BasisPointCostModel(config.commissionBps, config.marketImpactFactor),
        new FixedFeeCostModel(config.fixedFee),
        new SpreadCostModel(config.spreadBps),
      ]);
  }
}
