/**
 * PositionSnapshot.ts — Daily marks for open trades from a positions export
 *
 * Each open trade is matched leg by leg against the broker's positions CSV;
 * the matched rows are summed into one snapshot (greeks, P&L, % of max
 * profit) that goes to the Trade DB and onto the trade as its unrealized P&L.
 */

import { readFile } from "fs/promises";
import { parse as csvParse } from "csv-parse/sync";
import type { TradeT } from "./Schema";
import type { DBSnapshot, TradeDB } from "./TradeDB";
import type { TradeStore } from "./TradeStore";
import { normalizeTicker, parseDate, parseNumber } from "./TransactionParser";
import { openLegs, round2 } from "./TradeMath";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PositionRow {
  underlying: string;
  type: "put" | "call";
  strike: number;
  /** YYYY-MM-DD when the export carries a year */
  expiry: string | null;
  /** MM-DD, always present */
  monthDay: string;
  delta: number;
  betaDelta: number;
  theta: number;
  ivRank: number | null;
  pop: number | null;
  underlyingPrice: number | null;
  pnl: number;
}

export interface MarkResult {
  snapshots: DBSnapshot[];
  unmatched: string[];
}

const REQUIRED_COLUMNS = ["Symbol", "Call/Put", "Strike Price", "Exp Date"];
const PNL_COLUMNS = ["P/L Open", "Ext"];
const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

// ─── CSV Parsing ─────────────────────────────────────────────────────────────

export function parsePositionsCsv(content: string, source: string = "positions"): PositionRow[] {
  let header: string[] = [];
  const records: unknown = csvParse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names.map(n => n.trim());
      return header;
    },
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });

  if (!Array.isArray(records) || header.length === 0) return [];
  const missing = REQUIRED_COLUMNS.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`${source}: missing required column(s): ${missing.join(", ")}`);
  }
  const pnlColumn = PNL_COLUMNS.find(c => header.includes(c));

  const rows: PositionRow[] = [];
  records.forEach((record: unknown, index: number) => {
    if (!isRow(record)) return;
    const get = (key: string) => (record[key] ?? "").trim();

    const callPut = get("Call/Put").toUpperCase();
    if (callPut !== "PUT" && callPut !== "CALL") return;

    const strike = parseNumber(get("Strike Price"));
    const exp = parseExpDate(get("Exp Date"));
    if (strike === null || !exp) {
      throw new Error(`${source} row ${index + 1}: invalid strike or expiration`);
    }

    rows.push({
      underlying: normalizeTicker(get("Symbol")),
      type: callPut === "PUT" ? "put" : "call",
      strike,
      expiry: exp.expiry,
      monthDay: exp.monthDay,
      delta: metric(get("Delta")) ?? 0,
      betaDelta: metric(get("β Delta")) ?? 0,
      theta: metric(get("Theta")) ?? 0,
      ivRank: metric(get("IV Rank")),
      pop: metric(get("PoP")),
      underlyingPrice: metric(get("Underlying")),
      pnl: (pnlColumn ? metric(get(pnlColumn)) : null) ?? 0,
    });
  });

  return rows;
}

export async function loadPositionsFile(filePath: string): Promise<PositionRow[]> {
  return parsePositionsCsv(await readFile(filePath, "utf8"), filePath);
}

function parseExpDate(text: string): { expiry: string | null; monthDay: string } | null {
  const full = parseDate(text);
  if (full) return { expiry: full, monthDay: full.slice(5) };

  // "Mar 28" style, no year
  const short = /^([A-Za-z]{3})\s+(\d{1,2})$/.exec(text.trim());
  if (!short) return null;
  const month = MONTHS.indexOf(short[1].toUpperCase()) + 1;
  if (month === 0) return null;
  return { expiry: null, monthDay: `${String(month).padStart(2, "0")}-${short[2].padStart(2, "0")}` };
}

function metric(text: string): number | null {
  if (text === "" || text === "--") return null;
  return parseNumber(text.replace(/%$/, ""));
}

function isRow(record: unknown): record is Record<string, string> {
  return typeof record === "object" && record !== null && !Array.isArray(record);
}

// ─── Matching ────────────────────────────────────────────────────────────────

export function matchLegs(trade: TradeT, positions: PositionRow[]): PositionRow[] {
  const matched: PositionRow[] = [];
  for (const leg of openLegs(trade)) {
    const row = positions.find(p =>
      p.underlying === trade.ticker &&
      p.type === leg.type &&
      p.strike === leg.strike &&
      (p.expiry ? p.expiry === leg.expiry : p.monthDay === leg.expiry.slice(5)) &&
      !matched.includes(p),
    );
    if (row) matched.push(row);
  }
  return matched;
}

export function buildSnapshot(trade: TradeT, matched: PositionRow[], date: string): DBSnapshot {
  const first = matched[0];
  const pnl = round2(matched.reduce((s, r) => s + r.pnl, 0));

  return {
    trade_id: trade.id,
    date,
    underlying_price: first?.underlyingPrice ?? null,
    delta: round2(matched.reduce((s, r) => s + r.delta, 0)),
    beta_delta: round2(matched.reduce((s, r) => s + r.betaDelta, 0)),
    theta: round2(matched.reduce((s, r) => s + r.theta, 0)),
    iv_rank: first?.ivRank ?? null,
    pop: first?.pop ?? null,
    pnl,
    pct_max_profit: trade.cost_basis > 0 ? round2((pnl / trade.cost_basis) * 100) : null,
  };
}

/** Snapshot every open trade, store the marks and save the trades. */
export async function markOpenTrades(
  store: TradeStore,
  db: TradeDB | null,
  positions: PositionRow[],
  date: string,
): Promise<MarkResult> {
  const result: MarkResult = { snapshots: [], unmatched: [] };

  for (const trade of await store.list("open")) {
    const matched = matchLegs(trade, positions);
    if (matched.length === 0) {
      result.unmatched.push(trade.id);
      continue;
    }

    const snapshot = buildSnapshot(trade, matched, date);
    db?.upsertSnapshot(snapshot);
    trade.unrealized_pnl = snapshot.pnl;
    trade.last_marked = date;
    await store.save(trade);
    result.snapshots.push(snapshot);
  }

  return result;
}
