import type { PriceSeries } from '../data/price-series.js';
import type {
  PortfolioSnapshot,
  PriceMap,
  TargetAllocation,
  Trade,
} from '../backtest/types.js';

/**
 * What an empty allocation means for a policy. `cash` liquidates every position;
 * `hold` leaves the portfolio untouched. Each policy declares one explicitly.
 */
export type EmptyAllocationSemantic = 'cash' | 'hold';

export interface AllocationContext {
  date: string;
  /** Per-symbol history, already cut off at `date`. */
  series: ReadonlyMap<string, PriceSeries>;
  portfolio: PortfolioSnapshot;
  /** Closes on `date` for symbols that traded that day. */
  prices: PriceMap;
}

export interface PolicyInitContext {
  symbols: readonly string[];
  initialCash: number;
  startDate: string;
  endDate: string;
}

export interface AllocationPolicy {
  readonly name: string;
  readonly emptyAllocation: EmptyAllocationSemantic;
  calculateAllocation(context: AllocationContext): TargetAllocation;

  init?(context: PolicyInitContext): void;
  onTrade?(trade: Trade): void;
  onRebalance?(
    date: string,
    oldWeights: Readonly<Record<string, number>>,
    newWeights: Readonly<Record<string, number>>,
  ): void;
  finalize?(portfolio: PortfolioSnapshot): void;
}
