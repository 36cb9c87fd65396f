import type { ConfigKey } from './schema-validator.js';

export interface ConfigDefault {
  key: ConfigKey;
  /** JSON-encoded value. */
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Backtest
  {
    key: 'backtest.initialCash',
    value: '100000',
    category: 'backtest',
    description: 'Starting cash when a run does not set one',
  },
  {
    key: 'backtest.rebalanceFrequency',
    value: '"monthly"',
    category: 'backtest',
    description: 'daily | weekly | monthly | quarterly | annually',
  },
  {
    key: 'backtest.driftThresholdPct',
    value: 'null',
    category: 'backtest',
    description: 'Weight drift (percentage points) forcing an extra rebalance; null disables',
  },
  {
    key: 'backtest.timeoutMs',
    value: 'null',
    category: 'backtest',
    description: 'Wall-clock budget per run; null disables',
  },

  // Costs
  { key: 'costs.model', value: '"bps"', category: 'costs', description: 'bps | fixed | spread | composite' },
  {
    key: 'costs.commissionBps',
    value: '2',
    category: 'costs',
    description: 'Commission in basis points of trade notional',
  },
  { key: 'costs.fixedFee', value: '0', category: 'costs', description: 'Flat fee per trade' },
  {
    key: 'costs.spreadBps',
    value: '0',
    category: 'costs',
    description: 'Quoted bid-ask spread in basis points; half is paid per trade',
  },
  {
    key: 'costs.marketImpactFactor',
    value: '0',
    category: 'costs',
    description: 'Square-root market impact coefficient',
  },

  // Analysis
  {
    key: 'analysis.riskFreeRate',
    value: '0.02',
    category: 'analysis',
    description: 'Annual risk-free rate used by Sharpe and Sortino',
  },

  // Execution
  {
    key: 'execution.fractionalShares',
    value: 'true',
    category: 'execution',
    description: 'Allow fractional share quantities; false rounds orders down to whole shares',
  },
  {
    key: 'execution.minTradeWeightPct',
    value: '0.01',
    category: 'execution',
    description: 'Skip trades whose weight change is at most this many percentage points',
  },
  {
    key: 'execution.allocationTolerancePct',
    value: '0.01',
    category: 'execution',
    description: 'Allowed overshoot of 100% before target weights are scaled down',
  },
  {
    key: 'ledger.cashTolerance',
    value: '0.000001',
    category: 'execution',
    description: 'Floating-point slack below zero cash before a trade is refused',
  },
];
