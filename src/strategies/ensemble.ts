import { ConfigurationError } from '../backtest/errors.js';
import type { PortfolioSnapshot, TargetAllocation, Trade } from '../backtest/types.js';
import type {
  AllocationContext,
  AllocationPolicy,
  EmptyAllocationSemantic,
  PolicyInitContext,
} from './policy.js';

export interface EnsembleMember {
  policy: AllocationPolicy;
  weight: number;
}

/**
 * Blends several policies into one: each member's allocation counts in proportion to
 * its weight. A member that answers with an empty `hold` allocation contributes the
 * portfolio's current weights; an empty `cash` allocation contributes cash.
 */
export class WeightedEnsemblePolicy implements AllocationPolicy {
  readonly name: string;
  readonly emptyAllocation: EmptyAllocationSemantic = 'cash';
  private readonly members: readonly EnsembleMember[];
  private readonly totalWeight: number;

  constructor(members: readonly EnsembleMember[], name?: string) {
    if (members.length === 0) {
      throw new ConfigurationError('Ensemble needs at least one member', ['ensemble has no members']);
    }
    for (const m of members) {
      if (!Number.isFinite(m.weight) || m.weight <= 0) {
        throw new ConfigurationError(`Ensemble weight for ${m.policy.name} must be positive`, [
          `weight for ${m.policy.name}: ${m.weight}`,
        ]);
      }
    }
    this.members = [...members];
    this.totalWeight = members.reduce((acc, m) => acc + m.weight, 0);
    this.name =
      name ?? `ensemble(${members.map((m) => `${m.policy.name}*${m.weight}`).join(',')})`;
  }

  calculateAllocation(context: AllocationContext): TargetAllocation {
    const combined: TargetAllocation = {};

    for (const { policy, weight } of this.members) {
      let allocation = policy.calculateAllocation(context);
      if (Object.keys(allocation).length === 0 && policy.emptyAllocation === 'hold') {
        allocation = context.portfolio.weights;
      }
      const share = weight / this.totalWeight;
      for (const [symbol, pct] of Object.entries(allocation)) {
        combined[symbol] = (combined[symbol] ?? 0) + pct * share;
      }
    }

    return combined;
  }

  init(context: PolicyInitContext): void {
    for (const { policy } of this.members) policy.init?.(context);
  }

  onTrade(trade: Trade): void {
    for (const { policy } of this.members) policy.onTrade?.(trade);
  }

  onRebalance(
    date: string,
    oldWeights: Readonly<Record<string, number>>,
    newWeights: Readonly<Record<string, number>>,
  ): void {
    for (const { policy } of this.members) policy.onRebalance?.(date, oldWeights, newWeights);
  }

  finalize(portfolio: PortfolioSnapshot): void {
    for (const { policy } of this.members) policy.finalize?.(portfolio);
  }
}
