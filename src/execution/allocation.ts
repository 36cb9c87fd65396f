import type { TargetAllocation } from '../backtest/types.js';
import { clamp } from '../utils/helpers.js';

/** Key some policies use to spell out the cash remainder; it is implied, so it is dropped. */
export const CASH_KEY = 'CASH';

export type NormalizeResult =
  | { ok: true; allocation: TargetAllocation; adjusted: boolean }
  | { ok: false; error: string };

/**
 * Validate and repair a policy's target allocation.
 *
 * Weights outside [0, 100] are clamped and a total above 100 + `tolerancePct` is
 * scaled down proportionally to exactly 100. Only a result that is not a
 * symbol -> number mapping, or that carries a non-finite weight, is rejected.
 */
export function normalizeAllocation(raw: unknown, tolerancePct = 0.01): NormalizeResult {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    return { ok: false, error: 'allocation must be a symbol -> percent mapping' };
  }

  const allocation: TargetAllocation = {};
  let adjusted = false;

  for (const [symbol, value] of Object.entries(raw)) {
    if (symbol === CASH_KEY) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return { ok: false, error: `weight for ${symbol} is not a finite number` };
    }
    const bounded = clamp(value, 0, 100);
    if (bounded !== value) adjusted = true;
    allocation[symbol] = bounded;
  }

  const total = Object.values(allocation).reduce((a, b) => a + b, 0);
  if (total > 100 + tolerancePct) {
    const scale = 100 / total;
    for (const symbol of Object.keys(allocation)) {
      allocation[symbol] *= scale;
    }
    adjusted = true;
  }

  return { ok: true, allocation, adjusted };
}
