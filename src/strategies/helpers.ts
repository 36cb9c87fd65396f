import type { Bar } from '../backtest/types.js';
import type { PriceSeries } from '../data/price-series.js';
import { sampleStdDev } from '../utils/helpers.js';

export type PriceField = 'open' | 'high' | 'low' | 'close';

const TRADING_DAYS_PER_YEAR = 252;

/**
 * The trailing `count` bars dated on or before `date`. Cuts the series itself, so it
 * stays point-in-time even when handed an unrestricted series.
 */
export function getLookback(series: PriceSeries, date: string, count: number): readonly Bar[] {
  return series.until(date).tail(count);
}

/** Simple moving average of the last `period` bars, or null with too little history. */
export function movingAverage(
  bars: readonly Bar[],
  period: number,
  field: PriceField = 'close',
): number | null {
  if (period <= 0 || bars.length < period) return null;
  const window = bars.slice(bars.length - period);
  return window.reduce((acc, b) => acc + b[field], 0) / period;
}

/** Relative change over `period` bars for each bar that has one. */
export function periodReturns(
  bars: readonly Bar[],
  period = 1,
  field: PriceField = 'close',
): number[] {
  const returns: number[] = [];
  for (let i = period; i < bars.length; i++) {
    const previous = bars[i - period][field];
    if (previous > 0) {
      returns.push((bars[i][field] - previous) / previous);
    }
  }
  return returns;
}

export function annualizedVolatility(
  returns: readonly number[],
  periodsPerYear = TRADING_DAYS_PER_YEAR,
): number {
  return sampleStdDev(returns) * Math.sqrt(periodsPerYear);
}
