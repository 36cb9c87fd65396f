import type { RebalanceFrequency } from '../backtest/types.js';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const parsed = toUtcDate(value);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function toUtcDate(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

/**
 * ISO-8601 week key, e.g. "2024-W01". Weeks start on Monday and belong to the
 * year that contains their Thursday, so 2024-12-30 is "2025-W01".
 */
export function isoWeekKey(date: string): string {
  const d = toUtcDate(date);
  const dayNum = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
  return `${d.getUTCFullYear()}-W${String(week).padStart(2, '0')}`;
}

/**
 * Calendar bucket a date falls in for the given rebalance frequency. Two dates
 * share a period exactly when their keys are equal.
 */
export function periodKey(date: string, frequency: RebalanceFrequency): string {
  const year = date.slice(0, 4);
  const month = Number(date.slice(5, 7));

  switch (frequency) {
    case 'daily':
      return date;
    case 'weekly':
      return isoWeekKey(date);
    case 'monthly':
      return date.slice(0, 7);
    case 'quarterly':
      return `${year}-Q${Math.ceil(month / 3)}`;
    case 'annually':
      return year;
  }
}
