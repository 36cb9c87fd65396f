import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const backtestRuns = sqliteTable(
  'backtest_runs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    policyName: text('policyName').notNull(),
    startDate: text('startDate').notNull(),
    endDate: text('endDate').notNull(),
    initialCash: real('initialCash').notNull(),
    rebalanceFrequency: text('rebalanceFrequency').notNull(),
    config: text('config').notNull(), // JSON BacktestConfig
    summary: text('summary').notNull(), // JSON PerformanceSummary
    finalEquity: real('finalEquity'),
    totalReturn: real('totalReturn'),
    sharpeRatio: real('sharpeRatio'),
    maxDrawdown: real('maxDrawdown'),
    tradeCount: integer('tradeCount').notNull(),
    createdAt: text('createdAt').notNull(),
  },
  (table) => [index('idx_runs_policy').on(table.policyName, table.createdAt)],
);

export const equityPoints = sqliteTable(
  'equity_points',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: integer('runId')
      .notNull()
      .references(() => backtestRuns.id, { onDelete: 'cascade' }),
    date: text('date').notNull(),
    equity: real('equity').notNull(),
    cash: real('cash').notNull(),
  },
  (table) => [index('idx_equity_run').on(table.runId, table.date)],
);

export const backtestTrades = sqliteTable(
  'backtest_trades',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: integer('runId')
      .notNull()
      .references(() => backtestRuns.id, { onDelete: 'cascade' }),
    seq: integer('seq').notNull(),
    date: text('date').notNull(),
    symbol: text('symbol').notNull(),
    side: text('side', { enum: ['BUY', 'SELL'] }).notNull(),
    quantity: real('quantity').notNull(),
    price: real('price').notNull(),
    notional: real('notional').notNull(),
    cost: real('cost').notNull(),
    cashAfter: real('cashAfter').notNull(),
    reason: text('reason', { enum: ['initial', 'scheduled', 'drift'] }).notNull(),
  },
  (table) => [index('idx_trades_run').on(table.runId, table.seq)],
);
