import { DataError } from '../backtest/errors.js';
import type { Bar } from '../backtest/types.js';
import { isIsoDate } from '../utils/dates.js';

/**
 * Read-only, date-ordered bars for one symbol.
 *
 * A series can be narrowed with {@link PriceSeries.until}; the narrowed view shares
 * the underlying bars but can never reach a bar dated after its horizon, which is
 * what the engine hands to allocation policies.
 */
export class PriceSeries {
  private readonly bars: readonly Bar[];
  private readonly end: number;

  private constructor(
    readonly symbol: string,
    bars: readonly Bar[],
    end: number,
  ) {
    this.bars = bars;
    this.end = end;
  }

  /**
   * Build a series from raw bars. Bars must be strictly ascending by date with
   * positive closes; anything else is a data error.
   */
  static from(symbol: string, bars: readonly Bar[]): PriceSeries {
    const frozen: Bar[] = [];
    let previous: string | null = null;

    for (const bar of bars) {
      if (!isIsoDate(bar.date)) {
        throw new DataError(`Invalid bar date "${bar.date}" for ${symbol}`, { symbol });
      }
      if (previous !== null && bar.date <= previous) {
        throw new DataError(`Bars for ${symbol} are not strictly ascending at ${bar.date}`, {
          symbol,
          date: bar.date,
        });
      }
      if (!Number.isFinite(bar.close) || bar.close <= 0) {
        throw new DataError(`Non-positive close for ${symbol} on ${bar.date}`, {
          symbol,
          date: bar.date,
        });
      }
      frozen.push(Object.freeze({ ...bar }));
      previous = bar.date;
    }

    return new PriceSeries(symbol, Object.freeze(frozen), frozen.length);
  }

  get length(): number {
    return this.end;
  }

  /** Date of the newest visible bar, or null for an empty view. */
  get lastDate(): string | null {
    return this.end > 0 ? this.bars[this.end - 1].date : null;
  }

  /** View of every bar dated on or before `date`. */
  until(date: string): PriceSeries {
    return new PriceSeries(this.symbol, this.bars, this.upperBound(date));
  }

  /** Visible bars, oldest first. */
  toArray(): readonly Bar[] {
    return this.end === this.bars.length ? this.bars : this.bars.slice(0, this.end);
  }

  /** The trailing `count` visible bars (fewer when history is short). */
  tail(count: number): readonly Bar[] {
    if (count <= 0) return [];
    return this.bars.slice(Math.max(0, this.end - count), this.end);
  }

  /** Visible bar dated exactly `date`, if any. */
  barOn(date: string): Bar | undefined {
    const idx = this.upperBound(date) - 1;
    return idx >= 0 && this.bars[idx].date === date ? this.bars[idx] : undefined;
  }

  /** Close of the newest visible bar on or before `date`. */
  lastCloseOnOrBefore(date: string): number | undefined {
    const idx = this.upperBound(date) - 1;
    return idx >= 0 ? this.bars[idx].close : undefined;
  }

  dates(): string[] {
    return this.toArray().map((b) => b.date);
  }

  /** Index one past the last visible bar dated <= `date`. */
  private upperBound(date: string): number {
    let lo = 0;
    let hi = this.end;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.bars[mid].date <= date) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}

export type PriceSeriesMap = ReadonlyMap<string, PriceSeries>;

export function buildSeriesMap(data: Record<string, readonly Bar[]>): Map<string, PriceSeries> {
  const map = new Map<string, PriceSeries>();
  for (const [symbol, bars] of Object.entries(data)) {
    map.set(symbol, PriceSeries.from(symbol, bars));
  }
  return map;
}

/**
 * Sorted union of every series' dates within [startDate, endDate].
 */
export function collectTradingDates(
  series: PriceSeriesMap,
  startDate: string,
  endDate: string,
): string[] {
  const dates = new Set<string>();
  for (const s of series.values()) {
    for (const bar of s.toArray()) {
      if (bar.date >= startDate && bar.date <= endDate) {
        dates.add(bar.date);
      }
    }
  }
  return [...dates].sort();
}

/** Every series narrowed to bars dated on or before `date`. */
export function viewsAsOf(series: PriceSeriesMap, date: string): Map<string, PriceSeries> {
  const views = new Map<string, PriceSeries>();
  for (const [symbol, s] of series) {
    views.set(symbol, s.until(date));
  }
  return views;
}
