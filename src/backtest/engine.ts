import { analyzePerformance } from '../analysis/performance.js';
import {
  type PriceSeriesMap,
  collectTradingDates,
  viewsAsOf,
} from '../data/price-series.js';
import { normalizeAllocation } from '../execution/allocation.js';
import { type TransactionCostModel, createCostModel } from '../execution/cost-model.js';
import { RebalanceScheduler } from '../execution/rebalance-scheduler.js';
import { PortfolioLedger } from '../portfolio/ledger.js';
import type { AllocationPolicy } from '../strategies/policy.js';
import { createLogger } from '../utils/logger.js';
import { type BacktestConfigInput, resolveRunConfig } from './config.js';
import {
  BacktestError,
  ConfigurationError,
  DataError,
  MissingPriceError,
  PolicyError,
  RunTimeoutError,
} from './errors.js';
import type {
  BacktestConfig,
  BacktestResult,
  EquityPoint,
  PriceMap,
  RebalanceReason,
  TargetAllocation,
  Trade,
} from './types.js';

const log = createLogger('backtest-engine');

/** Trades smaller than this notional are dust and are not sent to the ledger. */
const MIN_NOTIONAL = 1e-9;

export interface BacktesterOptions {
  config: BacktestConfig;
  /** Defaults to the model described by `config.costs`. */
  costModel?: TransactionCostModel;
  /** Millisecond clock used for the run's time budget. */
  now?: () => number;
}

/** Mutable state of one run. Never shared between runs. */
interface RunState {
  policy: AllocationPolicy;
  series: PriceSeriesMap;
  ledger: PortfolioLedger;
  trades: Trade[];
  lastTarget: TargetAllocation | null;
}

interface RebalanceStep {
  date: string;
  reason: RebalanceReason;
  currentPrices: PriceMap;
  markPrices: PriceMap;
}

/**
 * Walks the trading calendar one bar at a time, consulting the allocation policy on
 * rebalance dates and turning its target weights into trades against a fresh ledger.
 * Each call to {@link Backtester.run} is an independent simulation.
 */
export class Backtester {
  private readonly config: BacktestConfig;
  private readonly costModel: TransactionCostModel;
  private readonly now: () => number;

  constructor(options: BacktesterOptions) {
    this.config = options.config;
    this.costModel = options.costModel ?? createCostModel(options.config.costs);
    this.now = options.now ?? Date.now;
  }

  run(policy: AllocationPolicy, series: PriceSeriesMap): BacktestResult {
    const { config } = this;
    const dates = collectTradingDates(series, config.startDate, config.endDate);
    if (dates.length === 0) {
      throw new DataError(`No bars between ${config.startDate} and ${config.endDate}`, {
        startDate: config.startDate,
        endDate: config.endDate,
      });
    }

    log.info(
      {
        policy: policy.name,
        symbols: series.size,
        startDate: config.startDate,
        endDate: config.endDate,
        tradingDays: dates.length,
        initialCash: config.initialCash,
        frequency: config.rebalanceFrequency,
        costModel: this.costModel.name,
      },
      'Starting backtest',
    );

    const state: RunState = {
      policy,
      series,
      ledger: new PortfolioLedger({
        initialCash: config.initialCash,
        cashTolerance: config.cashTolerance,
      }),
      trades: [],
      lastTarget: null,
    };
    const scheduler = new RebalanceScheduler({
      frequency: config.rebalanceFrequency,
      driftThresholdPct: config.driftThresholdPct,
    });
    const lastKnownPrices = new Map<string, number>();
    const equityCurve: EquityPoint[] = [];

    this.invokePolicy(policy, config.startDate, () =>
      policy.init?.({
        symbols: [...series.keys()],
        initialCash: config.initialCash,
        startDate: config.startDate,
        endDate: config.endDate,
      }),
    );

    const startedAt = this.now();
    let markPrices: PriceMap = {};

    for (const date of dates) {
      if (config.timeoutMs !== null && this.now() - startedAt > config.timeoutMs) {
        log.error({ policy: policy.name, date, timeoutMs: config.timeoutMs }, 'Backtest timed out');
        throw new RunTimeoutError(config.timeoutMs, date);
      }

      // 1. Today's closes form the opportunity set; held symbols without a bar carry forward
      const currentPrices: Record<string, number> = {};
      for (const [symbol, s] of series) {
        const bar = s.barOn(date);
        if (bar) {
          currentPrices[symbol] = bar.close;
          lastKnownPrices.set(symbol, bar.close);
        }
      }
      markPrices = this.markPrices(state.ledger, currentPrices, lastKnownPrices, date);

      // 2-3. Current weights against the last target decide whether to rebalance
      const decision = scheduler.evaluate(date, state.ledger.weights(markPrices), state.lastTarget);

      // 4. Consult the policy and trade toward its target
      if (decision.rebalance && decision.reason) {
        this.rebalance(state, { date, reason: decision.reason, currentPrices, markPrices });
      }

      // 5. Equity after today's trades and costs
      equityCurve.push(
        Object.freeze({
          date,
          equity: state.ledger.totalEquity(markPrices),
          cash: state.ledger.cash,
        }),
      );
    }

    const lastDate = dates[dates.length - 1];
    const finalSnapshot = state.ledger.snapshot(lastDate, markPrices);
    this.invokePolicy(policy, lastDate, () => policy.finalize?.(finalSnapshot));

    const summary = analyzePerformance(equityCurve, state.trades, {
      riskFreeRate: config.riskFreeRate,
    });

    log.info(
      {
        policy: policy.name,
        trades: state.trades.length,
        finalEquity: summary.endEquity,
        totalReturn: summary.totalReturn,
        sharpeRatio: summary.sharpeRatio,
      },
      'Backtest complete',
    );

    return Object.freeze({
      policyName: policy.name,
      config,
      equityCurve: Object.freeze(equityCurve),
      trades: Object.freeze(state.trades),
      summary,
    });
  }

  /**
   * Prices used to value the ledger on `date`: today's closes plus the last known close
   * of every held symbol that did not trade today.
   */
  private markPrices(
    ledger: PortfolioLedger,
    currentPrices: Record<string, number>,
    lastKnownPrices: ReadonlyMap<string, number>,
    date: string,
  ): PriceMap {
    const prices: Record<string, number> = { ...currentPrices };
    for (const symbol of ledger.holdings().keys()) {
      if (prices[symbol] !== undefined) continue;
      const carried = lastKnownPrices.get(symbol);
      if (carried === undefined) {
        log.error({ symbol, date }, 'Held symbol has no price to mark against');
        throw new MissingPriceError(symbol, date);
      }
      prices[symbol] = carried;
    }
    return prices;
  }

  private rebalance(state: RunState, step: RebalanceStep): void {
    const { policy, ledger } = state;
    const { date, reason, currentPrices, markPrices } = step;
    const snapshot = ledger.snapshot(date, markPrices);

    const raw = this.invokePolicy(policy, date, () =>
      policy.calculateAllocation({
        date,
        series: viewsAsOf(state.series, date),
        portfolio: snapshot,
        prices: Object.freeze({ ...currentPrices }),
      }),
    );

    const normalized = normalizeAllocation(raw, this.config.allocationTolerancePct);
    if (!normalized.ok) {
      throw new PolicyError(`malformed allocation: ${normalized.error}`, policy.name, date);
    }
    if (normalized.adjusted) {
      log.debug({ policy: policy.name, date, raw }, 'Target allocation clamped');
    }

    const target = normalized.allocation;
    if (Object.keys(target).length === 0 && policy.emptyAllocation === 'hold') {
      log.debug({ policy: policy.name, date }, 'Empty allocation, holding current positions');
      return;
    }

    // Drift is measured against the full target; only symbols with a bar today are traded
    const tradable: TargetAllocation = {};
    for (const [symbol, weight] of Object.entries(target)) {
      if (currentPrices[symbol] === undefined) {
        log.warn({ policy: policy.name, date, symbol }, 'No bar today, ignoring target weight');
        continue;
      }
      tradable[symbol] = weight;
    }

    const equity = snapshot.totalEquity;
    const sells: Array<{ symbol: string; quantity: number; price: number }> = [];
    const buys: Array<{ symbol: string; notional: number; price: number }> = [];
    const symbols = [...new Set([...Object.keys(tradable), ...ledger.holdings().keys()])].sort();

    for (const symbol of symbols) {
      const price = currentPrices[symbol];
      if (price === undefined) continue;

      const targetPct = tradable[symbol] ?? 0;
      const currentPct = snapshot.weights[symbol] ?? 0;
      const held = ledger.shares(symbol);

      if (targetPct === 0 && held > 0) {
        sells.push({ symbol, quantity: -held, price });
        continue;
      }
      if (Math.abs(targetPct - currentPct) <= this.config.minTradeWeightPct) continue;

      const delta = (equity * targetPct) / 100 - held * price;
      if (delta < 0) {
        const sellShares = Math.min(held, this.roundShares(-delta / price));
        if (sellShares > 0) sells.push({ symbol, quantity: -sellShares, price });
      } else if (delta > 0) {
        buys.push({ symbol, notional: delta, price });
      }
    }

    // Sells free cash before any buy is sized against it
    for (const { symbol, quantity, price } of sells) {
      const notional = -quantity * price;
      const cost = this.costModel.cost(notional);
      if (cost > ledger.cash + notional) {
        log.warn({ symbol, date, notional, cost }, 'Sell proceeds do not cover its cost, skipping');
        continue;
      }
      this.executeTrade(state, { date, symbol, quantity, price, cost, reason });
    }

    for (const { symbol, notional: desired, price } of buys) {
      const affordable = this.costModel.maxAffordableNotional(ledger.cash);
      let quantity = this.roundShares(Math.min(desired, affordable) / price);
      if (!this.config.fractionalShares) {
        // Whole shares round up within epsilon; step back until the outlay fits
        while (quantity > 0 && this.buyOutlay(quantity * price) > ledger.cash) quantity -= 1;
      }
      const notional = quantity * price;
      if (notional <= MIN_NOTIONAL) continue;
      const cost = this.costModel.cost(notional);
      this.executeTrade(state, { date, symbol, quantity, price, cost, reason });
    }

    state.lastTarget = target;
    const newWeights = ledger.weights(markPrices);
    this.invokePolicy(policy, date, () => policy.onRebalance?.(date, snapshot.weights, newWeights));

    log.debug(
      {
        policy: policy.name,
        date,
        reason,
        target,
        sells: sells.length,
        buys: buys.length,
        cash: ledger.cash,
      },
      'Rebalanced',
    );
  }

  private executeTrade(
    state: RunState,
    order: {
      date: string;
      symbol: string;
      quantity: number;
      price: number;
      cost: number;
      reason: RebalanceReason;
    },
  ): void {
    const { date, symbol, quantity, price, cost, reason } = order;
    const cashAfter = state.ledger.applyTrade(symbol, quantity, price, cost);

    const trade: Trade = {
      date,
      symbol,
      side: quantity > 0 ? 'BUY' : 'SELL',
      quantity,
      price,
      notional: Math.abs(quantity) * price,
      cost,
      cashAfter,
      reason,
    };
    Object.freeze(trade);
    state.trades.push(trade);

    log.debug({ symbol, date, side: trade.side, quantity, price, cost }, 'Trade executed');
    this.invokePolicy(state.policy, date, () => state.policy.onTrade?.(trade));
  }

  private buyOutlay(notional: number): number {
    return notional + this.costModel.cost(notional);
  }

  private roundShares(shares: number): number {
    return this.config.fractionalShares ? shares : Math.floor(shares + 1e-9);
  }

  /** Run policy code; anything it throws ends the run as a {@link PolicyError}. */
  private invokePolicy<T>(policy: AllocationPolicy, date: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof BacktestError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      log.error({ policy: policy.name, date, err }, 'Allocation policy failed');
      throw new PolicyError(message, policy.name, date, err);
    }
  }
}

/**
 * Resolve `input` against configured defaults and run one backtest.
 */
export function runBacktest(
  policy: AllocationPolicy,
  series: PriceSeriesMap,
  input: BacktestConfigInput,
  options: Omit<BacktesterOptions, 'config'> = {},
): BacktestResult {
  const config = resolveRunConfig(input);
  return new Backtester({ ...options, config }).run(policy, series);
}

/**
 * Run every policy as its own independent backtest over the same data.
 * Results are keyed by policy name, in input order.
 */
export function compareStrategies(
  policies: readonly AllocationPolicy[],
  series: PriceSeriesMap,
  input: BacktestConfigInput,
  options: Omit<BacktesterOptions, 'config'> = {},
): Map<string, BacktestResult> {
  const names = policies.map((p) => p.name);
  const duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate !== undefined) {
    throw new ConfigurationError(`Policy names must be unique; "${duplicate}" appears twice`, [
      `duplicate policy name: ${duplicate}`,
    ]);
  }

  const config = resolveRunConfig(input);
  const results = new Map<string, BacktestResult>();
  for (const policy of policies) {
    results.set(policy.name, new Backtester({ ...options, config }).run(policy, series));
  }
  return results;
}

/** Results ordered by Sharpe ratio, best first; runs without one sort last. */
export function rankBySharpe(results: Iterable<BacktestResult>): BacktestResult[] {
  return [...results].sort((a, b) => {
    const sa = a.summary.sharpeRatio;
    const sb = b.summary.sharpeRatio;
    if (sa === null && sb === null) return 0;
    if (sa === null) return 1;
    if (sb === null) return -1;
    return sb - sa;
  });
}
