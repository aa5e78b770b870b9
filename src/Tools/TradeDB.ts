/**
 * TradeDB.ts — SQLite index for trade records and daily snapshots
 *
 * The YAML files under strategies/ and archive/ stay the source of truth;
 * this database mirrors every saved trade and keeps the per-day position
 * snapshots so closed-trade ledgers and mark history can be queried by date.
 *
 * The database runs in memory (sql.js) and is written back to its file on
 * close().
 *
 * Usage:
 *   import { TradeDB } from "./TradeDB";
 *   const db = await TradeDB.open("data/trades.db");
 *   db.upsertTrade(trade);
 *   db.close();
 */

import initSqlJs, { type Database, type SqlValue } from "sql.js";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { TradeT } from "./Schema";
import { round2 } from "./TradeMath";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface DBSnapshot {
  trade_id: string;
  date: string;
  underlying_price: number | null;
  delta: number;
  beta_delta: number;
  theta: number;
  iv_rank: number | null;
  pop: number | null;
  pnl: number;
  pct_max_profit: number | null;
}

export interface ClosedTradeRow {
  id: string;
  ticker: string;
  strategy: string;
  opened: string;
  closed: string;
  realized_pnl: number;
  roll_count: number;
  tags: string[];
}

export interface StrategyStats {
  strategy: string;
  trades: number;
  total_pnl: number;
  avg_pnl: number;
  winners: number;
  losers: number;
  win_rate: number;
}

type Row = Record<string, SqlValue>;

// ─── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS trades (
  id TEXT PRIMARY KEY,
  ticker TEXT NOT NULL,
  strategy TEXT NOT NULL,
  status TEXT NOT NULL,
  opened TEXT NOT NULL,
  closed TEXT,
  expiration TEXT NOT NULL,
  cost_basis REAL NOT NULL,
  exit_price REAL,
  realized_pnl REAL,
  unrealized_pnl REAL,
  roll_count INTEGER DEFAULT 0,
  tags TEXT NOT NULL,
  record TEXT NOT NULL,
  updated_at TEXT DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_trades_status ON trades(status);
CREATE INDEX IF NOT EXISTS idx_trades_closed ON trades(closed);
CREATE INDEX IF NOT EXISTS idx_trades_strategy ON trades(strategy);

CREATE TABLE IF NOT EXISTS snapshots (
  trade_id TEXT NOT NULL,
  date TEXT NOT NULL,
  underlying_price REAL,
  delta REAL NOT NULL,
  beta_delta REAL NOT NULL,
  theta REAL NOT NULL,
  iv_rank REAL,
  pop REAL,
  pnl REAL NOT NULL,
  pct_max_profit REAL,
  created_at TEXT DEFAULT (datetime('now')),
  PRIMARY KEY (trade_id, date)
);
`;

// ─── Implementation ──────────────────────────────────────────────────────────

export class TradeDB {
  private constructor(
    private readonly db: Database,
    private readonly dbPath: string,
  ) {
    this.init();
  }

  /** `:memory:` keeps everything in process and never touches disk. */
  static async open(dbPath: string): Promise<TradeDB> {
    const SQL = await initSqlJs();
    if (dbPath === ":memory:") {
      return new TradeDB(new SQL.Database(), dbPath);
    }
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const db = existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database();
    return new TradeDB(db, dbPath);
  }

  init(): void {
    this.db.exec(SCHEMA_SQL);
  }

  close(): void {
    if (this.dbPath !== ":memory:") {
      writeFileSync(this.dbPath, this.db.export());
    }
    this.db.close();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  upsertTrade(trade: TradeT): void {
    this.db.run(`
      INSERT OR REPLACE INTO trades
        (id, ticker, strategy, status, opened, closed, expiration, cost_basis,
         exit_price, realized_pnl, unrealized_pnl, roll_count, tags, record, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
    `, [
      trade.id, trade.ticker, trade.strategy, trade.status, trade.opened,
      trade.closed ?? null, trade.expiration, trade.cost_basis,
      trade.exit_price ?? null, trade.realized_pnl ?? null, trade.unrealized_pnl ?? null,
      trade.roll_count, JSON.stringify(trade.tags), JSON.stringify(trade),
    ]);
  }

  upsertTrades(trades: TradeT[]): void {
    this.db.exec("BEGIN");
    try {
      for (const t of trades) this.upsertTrade(t);
      this.db.exec("COMMIT");
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  upsertSnapshot(s: DBSnapshot): void {
    this.db.run(`
      INSERT OR REPLACE INTO snapshots
        (trade_id, date, underlying_price, delta, beta_delta, theta, iv_rank, pop, pnl, pct_max_profit)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `, [
      s.trade_id, s.date, s.underlying_price, s.delta, s.beta_delta, s.theta,
      s.iv_rank, s.pop, s.pnl, s.pct_max_profit,
    ]);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getSnapshots(tradeId: string): DBSnapshot[] {
    return this.all(`
      SELECT trade_id, date, underlying_price, delta, beta_delta, theta, iv_rank, pop, pnl, pct_max_profit
      FROM snapshots WHERE trade_id = ? ORDER BY date
    `, [tradeId]).map(rowToSnapshot);
  }

  getClosedTrades(from?: string, to?: string): ClosedTradeRow[] {
    let sql = `
      SELECT id, ticker, strategy, opened, closed, realized_pnl, roll_count, tags
      FROM trades WHERE status = 'closed'
    `;
    const params: string[] = [];
    if (from && to) {
      sql += " AND closed BETWEEN ? AND ?";
      params.push(from, to);
    }
    sql += " ORDER BY closed, id";

    return this.all(sql, params).map(rowToClosedTrade);
  }

  getStatsByStrategy(from?: string, to?: string): StrategyStats[] {
    let sql = `
      SELECT
        strategy,
        COUNT(*) as trades,
        SUM(realized_pnl) as total_pnl,
        AVG(realized_pnl) as avg_pnl,
        SUM(CASE WHEN realized_pnl > 0 THEN 1 ELSE 0 END) as winners,
        SUM(CASE WHEN realized_pnl < 0 THEN 1 ELSE 0 END) as losers
      FROM trades WHERE status = 'closed'
    `;
    const params: string[] = [];
    if (from && to) {
      sql += " AND closed BETWEEN ? AND ?";
      params.push(from, to);
    }
    sql += " GROUP BY strategy ORDER BY total_pnl DESC";

    return this.all(sql, params).map(r => {
      const trades = num(r.trades);
      const winners = num(r.winners);
      return {
        strategy: text(r.strategy),
        trades,
        total_pnl: round2(num(r.total_pnl)),
        avg_pnl: round2(num(r.avg_pnl)),
        winners,
        losers: num(r.losers),
        win_rate: trades > 0 ? round2((winners / trades) * 100) : 0,
      };
    });
  }

  /** Row counts for diagnostics */
  getCounts(): { trades: number; open: number; closed: number; snapshots: number } {
    const count = (sql: string): number => num(this.all(sql)[0]?.n);
    return {
      trades: count("SELECT COUNT(*) as n FROM trades"),
      open: count("SELECT COUNT(*) as n FROM trades WHERE status = 'open'"),
      closed: count("SELECT COUNT(*) as n FROM trades WHERE status = 'closed'"),
      snapshots: count("SELECT COUNT(*) as n FROM snapshots"),
    };
  }

  private all(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }
}

// ─── Row Converters ──────────────────────────────────────────────────────────

function rowToClosedTrade(row: Row): ClosedTradeRow {
  return {
    id: text(row.id),
    ticker: text(row.ticker),
    strategy: text(row.strategy),
    opened: text(row.opened),
    closed: text(row.closed),
    realized_pnl: num(row.realized_pnl),
    roll_count: num(row.roll_count),
    tags: parseTags(text(row.tags)),
  };
}

function rowToSnapshot(row: Row): DBSnapshot {
  return {
    trade_id: text(row.trade_id),
    date: text(row.date),
    underlying_price: numOrNull(row.underlying_price),
    delta: num(row.delta),
    beta_delta: num(row.beta_delta),
    theta: num(row.theta),
    iv_rank: numOrNull(row.iv_rank),
    pop: numOrNull(row.pop),
    pnl: num(row.pnl),
    pct_max_profit: numOrNull(row.pct_max_profit),
  };
}

function text(v: SqlValue | undefined): string {
  return typeof v === "string" ? v : typeof v === "number" ? String(v) : "";
}

function num(v: SqlValue | undefined): number {
  return typeof v === "number" ? v : 0;
}

function numOrNull(v: SqlValue | undefined): number | null {
  return typeof v === "number" ? v : null;
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
  } catch {
    return [];
  }
}
