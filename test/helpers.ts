import { mkdtempSync, mkdirSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { LegT, TradeT } from "../src/Tools/Schema";
import { TradeStore } from "../src/Tools/TradeStore";

export const TX_HEADER = [
  "Date", "Type", "Sub Type", "Action", "Symbol", "Instrument Type", "Description", "Value", "Quantity",
  "Average Price", "Commissions", "Fees", "Multiplier", "Root Symbol", "Underlying Symbol",
  "Expiration Date", "Strike Price", "Call or Put", "Order #",
].join(",");

export interface Fill {
  date: string;
  /** HH:MM:SS, Eastern daylight time */
  time?: string;
  action: string;
  exp: string;
  strike: number;
  cp: "PUT" | "CALL";
  /** signed per-contract price as the broker prints it: 150 = $1.50 credit */
  avg: number;
  underlying?: string;
  qty?: number;
  order?: number | null;
  commissions?: number;
  fees?: number;
  /** null leaves the column blank */
  multiplier?: number | null;
}

export function occSymbol(underlying: string, exp: string, cp: "PUT" | "CALL", strike: number): string {
  const [y, m, d] = exp.split("-");
  return `${underlying.padEnd(6)}${y.slice(2)}${m}${d}${cp[0]}${String(strike * 1000).padStart(8, "0")}`;
}

/** 2025-03-28 → 3/28/25 */
export function usDate(iso: string): string {
  const [y, m, d] = iso.split("-");
  return `${Number(m)}/${Number(d)}/${y.slice(2)}`;
}

export function fillRow(f: Fill): string {
  const underlying = f.underlying ?? "SPY";
  const qty = f.qty ?? 1;
  return [
    `${f.date}T${f.time ?? "10:15:00"}-0400`,
    "Trade",
    f.action,
    f.action,
    occSymbol(underlying, f.exp, f.cp, f.strike),
    "Equity Option",
    `${f.action} ${qty} ${underlying} ${f.strike} ${f.cp}`,
    (f.avg * qty).toFixed(2),
    String(qty),
    f.avg.toFixed(2),
    (-(f.commissions ?? 0)).toFixed(2),
    (-(f.fees ?? 0)).toFixed(2),
    f.multiplier === null ? "" : String(f.multiplier ?? 100),
    underlying,
    underlying,
    usDate(f.exp),
    String(f.strike),
    f.cp,
    f.order === null ? "" : String(f.order ?? 1001),
  ].join(",");
}

export function expirationRow(e: { date: string; exp: string; strike: number; cp: "PUT" | "CALL"; underlying?: string; qty?: number }): string {
  const underlying = e.underlying ?? "SPY";
  return [
    `${e.date}T22:00:00-0400`,
    "Receive Deliver",
    "Expiration",
    "",
    occSymbol(underlying, e.exp, e.cp, e.strike),
    "Equity Option",
    "Removal of option due to expiration",
    "0.00",
    String(e.qty ?? 1),
    "",
    "",
    "",
    "100",
    underlying,
    underlying,
    usDate(e.exp),
    String(e.strike),
    e.cp,
    "",
  ].join(",");
}

export function csv(rows: string[]): string {
  return [TX_HEADER, ...rows].join("\n") + "\n";
}

/** Four-leg SPY iron condor, $1.45 credit, $1.10 fees per leg */
export function ironCondorRows(date = "2025-03-14", order = 1001): string[] {
  const common = { date, exp: "2025-03-28", order, commissions: 1, fees: 0.1 };
  return [
    fillRow({ ...common, action: "Sell to Open", strike: 480, cp: "PUT", avg: 150 }),
    fillRow({ ...common, action: "Buy to Open", strike: 470, cp: "PUT", avg: -80 }),
    fillRow({ ...common, action: "Sell to Open", strike: 540, cp: "CALL", avg: 120 }),
    fillRow({ ...common, action: "Buy to Open", strike: 550, cp: "CALL", avg: -45 }),
  ];
}

// ─── Workspace ───────────────────────────────────────────────────────────────

export function tempHome(): string {
  return mkdtempSync(join(tmpdir(), "options-tracker-"));
}

export function storeIn(home: string): TradeStore {
  return new TradeStore({ strategiesDir: join(home, "strategies"), archiveDir: join(home, "archive") });
}

export function writeTransactions(home: string, name: string, rows: string[]): string {
  const dir = join(home, "transactions");
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  writeFileSync(path, csv(rows));
  return path;
}

// ─── Records ─────────────────────────────────────────────────────────────────

export function makeLeg(overrides: Partial<LegT> = {}): LegT {
  return {
    tx_id: "tx-1",
    date: "2025-03-14",
    action: "SELL_TO_OPEN",
    effect: "open",
    side: "short",
    type: "put",
    ticker: "SPY",
    strike: 480,
    expiry: "2025-03-28",
    contracts: 1,
    price: 1.5,
    value: 150,
    fees: 0,
    multiplier: 100,
    remaining: 1,
    ...overrides,
  };
}

export function makeTrade(overrides: Partial<TradeT> = {}): TradeT {
  return {
    id: "spy_sp_2025-03-28",
    ticker: "SPY",
    strategy: "Short Put",
    status: "open",
    opened: "2025-03-14",
    expiration: "2025-03-28",
    cost_basis: 150,
    roll_count: 0,
    order_ids: [],
    tags: [],
    notes: "",
    legs: [makeLeg()],
    ...overrides,
  };
}
