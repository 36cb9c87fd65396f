import type { RebalanceFrequency, RebalanceReason } from '../backtest/types.js';
import { periodKey } from '../utils/dates.js';

export interface RebalanceDecision {
  rebalance: boolean;
  reason: RebalanceReason | null;
  /** Largest |actual - target| weight gap seen, in percentage points. */
  maxDrift: number;
}

export interface SchedulerOptions {
  frequency: RebalanceFrequency;
  driftThresholdPct?: number | null;
}

/**
 * Decides, date by date, whether the engine consults the policy.
 *
 * Scheduled triggers fire on the first evaluated date and then on the first date of
 * each new calendar period (ISO week, month, quarter, year). With a drift threshold,
 * any symbol whose weight strays from its last target by more than the threshold
 * fires an extra trigger in between. Drift triggers do not move the calendar anchor.
 */
export class RebalanceScheduler {
  private readonly frequency: RebalanceFrequency;
  private readonly driftThresholdPct: number | null;
  private lastPeriod: string | null = null;

  constructor(options: SchedulerOptions) {
    this.frequency = options.frequency;
    this.driftThresholdPct = options.driftThresholdPct ?? null;
  }

  evaluate(
    date: string,
    currentWeights: Readonly<Record<string, number>>,
    lastTarget: Readonly<Record<string, number>> | null,
  ): RebalanceDecision {
    const maxDrift = lastTarget ? measureDrift(currentWeights, lastTarget) : 0;
    const period = periodKey(date, this.frequency);

    if (this.lastPeriod === null) {
      this.lastPeriod = period;
      return { rebalance: true, reason: 'initial', maxDrift };
    }

    if (period !== this.lastPeriod) {
      this.lastPeriod = period;
      return { rebalance: true, reason: 'scheduled', maxDrift };
    }

    if (this.driftThresholdPct !== null && lastTarget && maxDrift > this.driftThresholdPct) {
      return { rebalance: true, reason: 'drift', maxDrift };
    }

    return { rebalance: false, reason: null, maxDrift };
  }

  /** Scheduled trigger dates for an ascending date list, ignoring drift. */
  triggerDates(dates: readonly string[]): string[] {
    const triggers: string[] = [];
    let last: string | null = null;
    for (const date of dates) {
      const period = periodKey(date, this.frequency);
      if (period !== last) {
        triggers.push(date);
        last = period;
      }
    }
    return triggers;
  }
}

/**
 * Largest absolute gap between current and target weights over every symbol that is
 * either held or targeted.
 */
export function measureDrift(
  currentWeights: Readonly<Record<string, number>>,
  target: Readonly<Record<string, number>>,
): number {
  const symbols = new Set([...Object.keys(currentWeights), ...Object.keys(target)]);
  let maxDrift = 0;
  for (const symbol of symbols) {
    const drift = Math.abs((currentWeights[symbol] ?? 0) - (target[symbol] ?? 0));
    if (drift > maxDrift) maxDrift = drift;
  }
  return maxDrift;
}
