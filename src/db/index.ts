import Database from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const log = createLogger('database');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

let sqlite: Database.Database | undefined;
let db: AppDatabase | undefined;

export function getDb(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function initDatabase(dbPath?: string): AppDatabase {
  const resolvedPath = dbPath || process.env.DB_PATH || './data/backtests.db';
  log.info({ path: resolvedPath }, 'Initializing database');

  closeDatabase();
  sqlite = new Database(resolvedPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('foreign_keys = ON');

  db = drizzle(sqlite, { schema });

  createTables(sqlite);

  log.info('Database initialized with WAL mode');
  return db;
}

export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = undefined;
    db = undefined;
  }
}

function createTables(conn: Database.Database): void {
  conn.exec(`
    CREATE TABLE IF NOT EXISTS backtest_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      policyName TEXT NOT NULL,
      startDate TEXT NOT NULL,
      endDate TEXT NOT NULL,
      initialCash REAL NOT NULL,
      rebalanceFrequency TEXT NOT NULL,
      config TEXT NOT NULL,
      summary TEXT NOT NULL,
      finalEquity REAL,
      totalReturn REAL,
      sharpeRatio REAL,
      maxDrawdown REAL,
      tradeCount INTEGER NOT NULL,
      createdAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_runs_policy ON backtest_runs(policyName, createdAt);

    CREATE TABLE IF NOT EXISTS equity_points (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      runId INTEGER NOT NULL REFERENCES backtest_runs(id) ON DELETE CASCADE,
      date TEXT NOT NULL,
      equity REAL NOT NULL,
      cash REAL NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_equity_run ON equity_points(runId, date);

    CREATE TABLE IF NOT EXISTS backtest_trades (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      runId INTEGER NOT NULL REFERENCES backtest_runs(id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      date TEXT NOT NULL,
      symbol TEXT NOT NULL,
      side TEXT NOT NULL CHECK(side IN ('BUY','SELL')),
      quantity REAL NOT NULL,
      price REAL NOT NULL,
      notional REAL NOT NULL,
      cost REAL NOT NULL,
      cashAfter REAL NOT NULL,
      reason TEXT NOT NULL CHECK(reason IN ('initial','scheduled','drift'))
    );
    CREATE INDEX IF NOT EXISTS idx_trades_run ON backtest_trades(runId, seq);
  `);

  log.debug('All tables created/verified');
}
