import type { TargetAllocation } from '../backtest/types.js';
import type { AllocationContext, AllocationPolicy, EmptyAllocationSemantic } from './policy.js';

export interface FixedAllocationOptions {
  name?: string;
  weights: TargetAllocation;
  emptyAllocation?: EmptyAllocationSemantic;
}

/**
 * Constant-mix policy: asks for the same weights at every rebalance, so scheduled
 * rebalances pull drifted holdings back to them (60/40, all-weather and friends).
 */
export class FixedAllocationPolicy implements AllocationPolicy {
  readonly name: string;
  readonly emptyAllocation: EmptyAllocationSemantic;
  private readonly weights: TargetAllocation;

  constructor(options: FixedAllocationOptions) {
    this.weights = { ...options.weights };
    this.name = options.name ?? `fixed(${describeWeights(this.weights)})`;
    this.emptyAllocation = options.emptyAllocation ?? 'cash';
  }

  calculateAllocation(_context: AllocationContext): TargetAllocation {
    return { ...this.weights };
  }
}

/**
 * Buys the given weights once, then only ever asks for the weights it already holds,
 * so later rebalances trade nothing and the basket drifts with the market.
 */
export class BuyAndHoldPolicy implements AllocationPolicy {
  readonly name: string;
  readonly emptyAllocation: EmptyAllocationSemantic = 'hold';
  private readonly weights: TargetAllocation;

  constructor(weights: TargetAllocation, name?: string) {
    this.weights = { ...weights };
    this.name = name ?? `buy-and-hold(${describeWeights(this.weights)})`;
  }

  calculateAllocation(context: AllocationContext): TargetAllocation {
    if (Object.keys(context.portfolio.positions).length === 0) {
      return { ...this.weights };
    }
    return { ...context.portfolio.weights };
  }
}

function describeWeights(weights: TargetAllocation): string {
  return Object.entries(weights)
    .map(([symbol, pct]) => `${symbol}:${pct}`)
    .join(',');
}
