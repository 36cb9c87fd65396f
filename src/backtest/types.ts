export const REBALANCE_FREQUENCIES = [
  'daily',
  'weekly',
  'monthly',
  'quarterly',
  'annually',
] as const;

export type RebalanceFrequency = (typeof REBALANCE_FREQUENCIES)[number];

export interface Bar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Symbol -> percent of total equity (0-100). Whatever is left over stays in cash. */
export type TargetAllocation = Record<string, number>;

export type PriceMap = Readonly<Record<string, number>>;

export interface PortfolioSnapshot {
  readonly date: string;
  readonly cash: number;
  readonly positions: Readonly<Record<string, number>>;
  readonly prices: PriceMap;
  readonly totalEquity: number;
  /** Symbol -> percent of total equity at `prices`. */
  readonly weights: Readonly<Record<string, number>>;
}

export type RebalanceReason = 'initial' | 'scheduled' | 'drift';

export interface Trade {
  readonly date: string;
  readonly symbol: string;
  readonly side: 'BUY' | 'SELL';
  /** Signed share change: positive buys, negative sells. */
  readonly quantity: number;
  readonly price: number;
  readonly notional: number;
  readonly cost: number;
  readonly cashAfter: number;
  readonly reason: RebalanceReason;
}

export interface EquityPoint {
  readonly date: string;
  readonly equity: number;
  readonly cash: number;
}

export type CostModelKind = 'bps' | 'fixed' | 'spread' | 'composite';

export interface CostConfig {
  model: CostModelKind;
  commissionBps: number;
  fixedFee: number;
  spreadBps: number;
  marketImpactFactor: number;
}

export interface BacktestConfig {
  initialCash: number;
  startDate: string;
  endDate: string;
  rebalanceFrequency: RebalanceFrequency;
  /** Percentage points of weight drift that force an out-of-schedule rebalance. */
  driftThresholdPct: number | null;
  costs: CostConfig;
  riskFreeRate: number;
  fractionalShares: boolean;
  minTradeWeightPct: number;
  allocationTolerancePct: number;
  cashTolerance: number;
  timeoutMs: number | null;
}

export interface PerformanceSummary {
  readonly insufficientData: boolean;
  readonly pointCount: number;
  readonly startEquity: number | null;
  readonly endEquity: number | null;
  readonly totalReturn: number | null;
  readonly annualizedReturn: number | null;
  readonly annualizedVolatility: number | null;
  readonly sharpeRatio: number | null;
  readonly sortinoRatio: number | null;
  readonly calmarRatio: number | null;
  /** Worst peak-to-trough decline as a fraction in [-1, 0]. */
  readonly maxDrawdown: number | null;
  readonly valueAtRisk95: number | null;
  readonly conditionalValueAtRisk95: number | null;
  readonly winRate: number | null;
  readonly tradeCount: number;
  readonly totalCosts: number;
}

export interface BacktestResult {
  readonly policyName: string;
  readonly config: Readonly<BacktestConfig>;
  readonly equityCurve: readonly EquityPoint[];
  readonly trades: readonly Trade[];
  readonly summary: PerformanceSummary;
}
