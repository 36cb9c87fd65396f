import 'dotenv/config';

export { type PerformanceOptions, analyzePerformance, TRADING_DAYS_PER_YEAR } from './analysis/performance.js';
export { type BacktestConfigInput, resolveRunConfig } from './backtest/config.js';
export {
  Backtester,
  type BacktesterOptions,
  compareStrategies,
  rankBySharpe,
  runBacktest,
} from './backtest/engine.js';
export {
  BacktestError,
  type BacktestErrorCode,
  ConfigurationError,
  DataError,
  InsufficientCashError,
  InvalidTradeError,
  MissingPriceError,
  PolicyError,
  RunTimeoutError,
  serializeError,
} from './backtest/errors.js';
export { generateComparisonTable, generateSummary } from './backtest/reporter.js';
export type {
  BacktestConfig,
  BacktestResult,
  Bar,
  CostConfig,
  CostModelKind,
  EquityPoint,
  PerformanceSummary,
  PortfolioSnapshot,
  PriceMap,
  RebalanceFrequency,
  RebalanceReason,
  TargetAllocation,
  Trade,
} from './backtest/types.js';
export { ConfigManager, configManager } from './config/manager.js';
export { buildSeriesMap, PriceSeries, type PriceSeriesMap } from './data/price-series.js';
export { closeDatabase, initDatabase } from './db/index.js';
export {
  deleteBacktestRun,
  getBacktestRun,
  listBacktestRuns,
  saveBacktestResult,
  type StoredBacktestRun,
} from './db/repositories/backtest-runs.js';
export {
  BasisPointCostModel,
  CompositeCostModel,
  createCostModel,
  FixedFeeCostModel,
  SpreadCostModel,
  type TransactionCostModel,
} from './execution/cost-model.js';
export { RebalanceScheduler } from './execution/rebalance-scheduler.js';
export { PortfolioLedger } from './portfolio/ledger.js';
export { type EnsembleMember, WeightedEnsemblePolicy } from './strategies/ensemble.js';
export { BuyAndHoldPolicy, FixedAllocationPolicy } from './strategies/fixed-allocation.js';
export { annualizedVolatility, getLookback, movingAverage, periodReturns } from './strategies/helpers.js';
export type {
  AllocationContext,
  AllocationPolicy,
  EmptyAllocationSemantic,
  PolicyInitContext,
} from './strategies/policy.js';
export { createLogger } from './utils/logger.js';
