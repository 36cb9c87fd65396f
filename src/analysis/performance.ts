import type { EquityPoint, PerformanceSummary, Trade } from '../backtest/types.js';
import { mean, sampleStdDev, sum } from '../utils/helpers.js';

export const TRADING_DAYS_PER_YEAR = 252;

export interface PerformanceOptions {
  /** Annual risk-free rate subtracted from the annualized return (0.02 = 2%). */
  riskFreeRate?: number;
  periodsPerYear?: number;
  /** Confidence level for historical VaR / CVaR. */
  confidence?: number;
}

// ── Exported pure computation functions ────────────────────────────────────

/** Relative change between consecutive values; pairs starting at a non-positive value are skipped. */
export function computeDailyReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    if (prev > 0) {
      returns.push(values[i] / prev - 1);
    }
  }
  return returns;
}

/**
 * Worst decline from a running peak, as a fraction in [-1, 0]. One forward pass.
 */
export function computeMaxDrawdown(values: readonly number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;

  for (const value of values) {
    if (value > peak) peak = value;
    if (peak > 0) {
      const drawdown = value / peak - 1;
      if (drawdown < maxDrawdown) maxDrawdown = drawdown;
    }
  }

  return Math.max(maxDrawdown, -1);
}

export function annualizeReturn(totalReturn: number, points: number, periodsPerYear = TRADING_DAYS_PER_YEAR): number {
  const growth = 1 + totalReturn;
  if (growth <= 0) return -1;
  return growth ** (periodsPerYear / points) - 1;
}

/** Excess annualized return per unit of volatility; 0 when volatility is 0. */
export function computeSharpe(
  annualizedReturn: number,
  annualizedVolatility: number,
  riskFreeRate = 0,
): number {
  if (annualizedVolatility === 0) return 0;
  return (annualizedReturn - riskFreeRate) / annualizedVolatility;
}

/**
 * Like Sharpe, but divides by the annualized downside deviation (root mean square of
 * negative daily returns). Null when there is no downside to measure.
 */
export function computeSortino(
  dailyReturns: readonly number[],
  annualizedReturn: number,
  riskFreeRate = 0,
  periodsPerYear = TRADING_DAYS_PER_YEAR,
): number | null {
  if (dailyReturns.length < 2) return null;
  const downsideSquares = dailyReturns.filter((r) => r < 0).map((r) => r * r);
  if (downsideSquares.length === 0) return null;

  const downsideDeviation =
    Math.sqrt(sum(downsideSquares) / dailyReturns.length) * Math.sqrt(periodsPerYear);
  if (downsideDeviation === 0) return null;
  return (annualizedReturn - riskFreeRate) / downsideDeviation;
}

/** Annualized return over the size of the worst drawdown. Null without a drawdown. */
export function computeCalmar(annualizedReturn: number, maxDrawdown: number): number | null {
  if (maxDrawdown >= 0) return null;
  return annualizedReturn / Math.abs(maxDrawdown);
}

/**
 * Historical VaR and CVaR of daily returns, reported as positive loss fractions.
 * The tail includes the VaR observation itself.
 */
export function computeValueAtRisk(
  dailyReturns: readonly number[],
  confidence = 0.95,
): { valueAtRisk: number; conditionalValueAtRisk: number } | null {
  if (dailyReturns.length === 0) return null;
  const sorted = [...dailyReturns].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.floor((1 - confidence) * sorted.length));
  const tail = sorted.slice(0, index + 1);
  return {
    valueAtRisk: -sorted[index],
    conditionalValueAtRisk: -mean(tail),
  };
}

// ── Summary ────────────────────────────────────────────────────────────────

/**
 * Derive the performance summary of a finished run. Pure: neither input is touched.
 * Fewer than two curve points yields `insufficientData` with null metrics.
 */
export function analyzePerformance(
  equityCurve: readonly EquityPoint[],
  trades: readonly Trade[] = [],
  options: PerformanceOptions = {},
): PerformanceSummary {
  const riskFreeRate = options.riskFreeRate ?? 0;
  const periodsPerYear = options.periodsPerYear ?? TRADING_DAYS_PER_YEAR;
  const values = equityCurve.map((p) => p.equity);
  const n = values.length;
  const tradeCount = trades.length;
  const totalCosts = sum(trades.map((t) => t.cost));

  if (n < 2 || values[0] <= 0) {
    return Object.freeze({
      insufficientData: true,
      pointCount: n,
      startEquity: n > 0 ? values[0] : null,
      endEquity: n > 0 ? values[n - 1] : null,
      totalReturn: null,
      annualizedReturn: null,
      annualizedVolatility: null,
      sharpeRatio: null,
      sortinoRatio: null,
      calmarRatio: null,
      maxDrawdown: null,
      valueAtRisk95: null,
      conditionalValueAtRisk95: null,
      winRate: null,
      tradeCount,
      totalCosts,
    });
  }

  const totalReturn = values[n - 1] / values[0] - 1;
  const annualizedReturn = annualizeReturn(totalReturn, n, periodsPerYear);
  const dailyReturns = computeDailyReturns(values);
  const annualizedVolatility = sampleStdDev(dailyReturns) * Math.sqrt(periodsPerYear);
  const maxDrawdown = computeMaxDrawdown(values);
  const risk = computeValueAtRisk(dailyReturns, options.confidence ?? 0.95);

  return Object.freeze({
    insufficientData: false,
    pointCount: n,
    startEquity: values[0],
    endEquity: values[n - 1],
    totalReturn,
    annualizedReturn,
    annualizedVolatility,
    sharpeRatio: computeSharpe(annualizedReturn, annualizedVolatility, riskFreeRate),
    sortinoRatio: computeSortino(dailyReturns, annualizedReturn, riskFreeRate, periodsPerYear),
    calmarRatio: computeCalmar(annualizedReturn, maxDrawdown),
    maxDrawdown,
    valueAtRisk95: risk ? risk.valueAtRisk : null,
    conditionalValueAtRisk95: risk ? risk.conditionalValueAtRisk : null,
    winRate:
      dailyReturns.length > 0
        ? dailyReturns.filter((r) => r > 0).length / dailyReturns.length
        : null,
    tradeCount,
    totalCosts,
  });
}
