import type { Bar } from '../../src/backtest/types.js';
import { PriceSeries } from '../../src/data/price-series.js';

export function bar(date: string, close: number): Bar {
  return { date, open: close, high: close, low: close, close, volume: 1_000 };
}

/** One bar per date, closes taken in order. */
export function bars(dates: readonly string[], closes: readonly number[]): Bar[] {
  return dates.map((date, i) => bar(date, closes[i]));
}

export function seriesMap(data: Record<string, Array<[string, number]>>): Map<string, PriceSeries> {
  const map = new Map<string, PriceSeries>();
  for (const [symbol, points] of Object.entries(data)) {
    map.set(
      symbol,
      PriceSeries.from(
        symbol,
        points.map(([date, close]) => bar(date, close)),
      ),
    );
  }
  return map;
}

export const JAN = ['2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05'];
