import { asc, desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { BacktestConfig, BacktestResult, EquityPoint, PerformanceSummary, Trade } from '../../backtest/types.js';
import { runConfigSchema } from '../../config/schema-validator.js';
import { createLogger } from '../../utils/logger.js';
import { getDb } from '../index.js';
import { backtestRuns, backtestTrades, equityPoints } from '../schema.js';

const log = createLogger('backtest-runs');

// Rows per INSERT; SQLite caps bound parameters per statement.
const INSERT_CHUNK = 500;

const metric = z.number().nullable();

const summarySchema = z.object({
  insufficientData: z.boolean(),
  pointCount: z.number().int().min(0),
  startEquity: metric,
  endEquity: metric,
  totalReturn: metric,
  annualizedReturn: metric,
  annualizedVolatility: metric,
  sharpeRatio: metric,
  sortinoRatio: metric,
  calmarRatio: metric,
  maxDrawdown: metric,
  valueAtRisk95: metric,
  conditionalValueAtRisk95: metric,
  winRate: metric,
  tradeCount: z.number().int().min(0),
  totalCosts: z.number(),
});

export type BacktestRunRow = typeof backtestRuns.$inferSelect;

export interface StoredBacktestRun {
  id: number;
  createdAt: string;
  policyName: string;
  config: BacktestConfig;
  summary: PerformanceSummary;
  equityCurve: EquityPoint[];
  trades: Trade[];
}

export interface ListRunsOptions {
  policyName?: string;
  limit?: number;
  offset?: number;
}

function chunks<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/** Persist a finished run with its full equity curve and trade log. Returns the new run id. */
export function saveBacktestResult(result: BacktestResult, createdAt = new Date().toISOString()): number {
  const db = getDb();
  const { summary, config } = result;

  const runId = db.transaction((tx) => {
    const run = tx
      .insert(backtestRuns)
      .values({
        policyName: result.policyName,
        startDate: config.startDate,
        endDate: config.endDate,
        initialCash: config.initialCash,
        rebalanceFrequency: config.rebalanceFrequency,
        config: JSON.stringify(config),
        summary: JSON.stringify(summary),
        finalEquity: summary.endEquity,
        totalReturn: summary.totalReturn,
        sharpeRatio: summary.sharpeRatio,
        maxDrawdown: summary.maxDrawdown,
        tradeCount: summary.tradeCount,
        createdAt,
      })
      .returning({ id: backtestRuns.id })
      .get();

    for (const batch of chunks(result.equityCurve, INSERT_CHUNK)) {
      tx.insert(equityPoints)
        .values(batch.map((p) => ({ runId: run.id, date: p.date, equity: p.equity, cash: p.cash })))
        .run();
    }

    let seq = 0;
    for (const batch of chunks(result.trades, INSERT_CHUNK)) {
      tx.insert(backtestTrades)
        .values(batch.map((t) => ({ runId: run.id, seq: seq++, ...t })))
        .run();
    }

    return run.id;
  });

  log.info(
    { runId, policy: result.policyName, points: result.equityCurve.length, trades: result.trades.length },
    'Backtest run saved',
  );
  return runId;
}

export function getBacktestRun(id: number): StoredBacktestRun | undefined {
  const db = getDb();
  const run = db.select().from(backtestRuns).where(eq(backtestRuns.id, id)).get();
  if (!run) return undefined;

  const equityCurve = db
    .select({ date: equityPoints.date, equity: equityPoints.equity, cash: equityPoints.cash })
    .from(equityPoints)
    .where(eq(equityPoints.runId, id))
    .orderBy(asc(equityPoints.date))
    .all();

  const trades = db
    .select({
      date: backtestTrades.date,
      symbol: backtestTrades.symbol,
      side: backtestTrades.side,
      quantity: backtestTrades.quantity,
      price: backtestTrades.price,
      notional: backtestTrades.notional,
      cost: backtestTrades.cost,
      cashAfter: backtestTrades.cashAfter,
      reason: backtestTrades.reason,
    })
    .from(backtestTrades)
    .where(eq(backtestTrades.runId, id))
    .orderBy(asc(backtestTrades.seq))
    .all();

  return {
    id: run.id,
    createdAt: run.createdAt,
    policyName: run.policyName,
    config: runConfigSchema.parse(JSON.parse(run.config)),
    summary: summarySchema.parse(JSON.parse(run.summary)),
    equityCurve,
    trades,
  };
}

/** Run headers, newest first. Curves and trades are not loaded. */
export function listBacktestRuns(options: ListRunsOptions = {}): BacktestRunRow[] {
  const db = getDb();
  return db
    .select()
    .from(backtestRuns)
    .where(options.policyName ? eq(backtestRuns.policyName, options.policyName) : undefined)
    .orderBy(desc(backtestRuns.createdAt), desc(backtestRuns.id))
    .limit(options.limit ?? 50)
    .offset(options.offset ?? 0)
    .all();
}

/** Deletes the run; its equity points and trades go with it. */
export function deleteBacktestRun(id: number): boolean {
  const db = getDb();
  const deleted = db.delete(backtestRuns).where(eq(backtestRuns.id, id)).returning({ id: backtestRuns.id }).all();
  if (deleted.length > 0) {
    log.info({ runId: id }, 'Backtest run deleted');
  }
  return deleted.length > 0;
}
