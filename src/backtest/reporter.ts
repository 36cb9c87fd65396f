import { formatCurrency, formatPercent, round } from '../utils/helpers.js';
import type { BacktestResult } from './types.js';

function pct(n: number | null): string {
  return n != null ? formatPercent(n) : 'N/A';
}

function ratio(n: number | null): string {
  return n != null ? String(round(n, 2)) : 'N/A';
}

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(result: BacktestResult): string {
  const { summary, config } = result;
  const lines: string[] = [];

  lines.push(`=== Backtest Results: ${result.policyName} ===`);
  lines.push(`Period: ${config.startDate} to ${config.endDate}`);
  lines.push(`Rebalance: ${config.rebalanceFrequency}`);
  lines.push(`Initial Cash: ${formatCurrency(config.initialCash)}`);
  lines.push('');

  if (summary.insufficientData) {
    lines.push(`Insufficient data: ${summary.pointCount} equity point(s)`);
    return lines.join('\n');
  }

  lines.push('--- Performance ---');
  lines.push(`Final Equity: ${summary.endEquity != null ? formatCurrency(summary.endEquity) : 'N/A'}`);
  lines.push(`Total Return: ${pct(summary.totalReturn)}`);
  lines.push(`Annualized Return: ${pct(summary.annualizedReturn)}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  lines.push(`Volatility: ${pct(summary.annualizedVolatility)}`);
  lines.push(`Max Drawdown: ${pct(summary.maxDrawdown)}`);
  lines.push(`Sharpe Ratio: ${ratio(summary.sharpeRatio)}`);
  lines.push(`Sortino Ratio: ${ratio(summary.sortinoRatio)}`);
  lines.push(`Calmar Ratio: ${ratio(summary.calmarRatio)}`);
  lines.push(`VaR (95%): ${pct(summary.valueAtRisk95)}`);
  lines.push('');

  lines.push('--- Trading ---');
  lines.push(`Trades: ${summary.tradeCount}`);
  lines.push(`Total Costs: ${formatCurrency(summary.totalCosts)}`);

  return lines.join('\n');
}

/**
 * One row per run, in the order given, for side-by-side strategy comparison.
 */
export function generateComparisonTable(results: Iterable<BacktestResult>): string {
  const rows = [...results];
  if (rows.length === 0) return 'No results to compare.';

  const header = ['Policy', 'Return', 'CAGR', 'Vol', 'Sharpe', 'MaxDD', 'Trades'];
  const body = rows.map((r) => [
    r.policyName,
    pct(r.summary.totalReturn),
    pct(r.summary.annualizedReturn),
    pct(r.summary.annualizedVolatility),
    ratio(r.summary.sharpeRatio),
    pct(r.summary.maxDrawdown),
    String(r.summary.tradeCount),
  ]);

  const widths = header.map((h, i) => Math.max(h.length, ...body.map((row) => row[i].length)));
  const format = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join(' | ');

  return [format(header), widths.map((w) => '-'.repeat(w)).join('-|-'), ...body.map(format)].join(
    '\n',
  );
}
