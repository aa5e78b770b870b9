/**
 * TransactionParser.ts — Broker transaction CSV → Transaction records
 *
 * Reads tastytrade-style daily transaction exports. Option trades and
 * expiration deliveries become Transactions; everything else (cash movements,
 * stock fills, assignments) is counted and skipped.
 *
 * Usage:
 *   import { loadTransactionFile } from "./TransactionParser";
 *   const { transactions } = await loadTransactionFile("transactions/2025-03-14.csv");
 */

import { existsSync, readdirSync } from "fs";
import { readFile } from "fs/promises";
import { basename, join } from "path";
import { parse as csvParse } from "csv-parse/sync";
import { ACTIONS, type ActionT, type OptionTypeT, type SideT } from "./Schema";
import { round2 } from "./TradeMath";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Transaction {
  id: string;
  kind: "trade" | "expiration";
  timestamp: string;
  /** epoch ms of the fill; orders fills within a day */
  time: number;
  date: string;
  underlying: string;
  root: string;
  symbol: string;
  action: ActionT;
  effect: "open" | "close";
  /** null for expirations: the tracker takes the side of the leg that expired */
  side: SideT | null;
  optionType: OptionTypeT;
  strike: number;
  expiration: string;
  quantity: number;
  /** per-share premium */
  price: number;
  /** signed dollars, credit positive */
  value: number;
  fees: number;
  multiplier: number;
  orderId: number | null;
  source: string;
  row: number;
}

export interface ParseResult {
  transactions: Transaction[];
  ignored: number;
}

type CsvRow = Record<string, string>;

const REQUIRED_COLUMNS = [
  "Date",
  "Type",
  "Action",
  "Symbol",
  "Quantity",
  "Expiration Date",
  "Strike Price",
  "Call or Put",
];

const OPTION_INSTRUMENTS = new Set(["Equity Option", "Future Option"]);
const FUTURES_MONTH = /^([A-Z0-9]+?)[FGHJKMNQUVXZ]\d{1,2}$/;

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseTransactionsCsv(
  content: string,
  source: string = "input",
  defaultMultiplier: number = 100,
): ParseResult {
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

  if (!Array.isArray(records)) {
    throw new Error(`${source}: could not read CSV records`);
  }
  if (header.length === 0) return { transactions: [], ignored: 0 };

  const missing = REQUIRED_COLUMNS.filter(c => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`${source}: missing required column(s): ${missing.join(", ")}`);
  }

  const transactions: Transaction[] = [];
  const seen = new Map<string, number>();
  let ignored = 0;

  records.forEach((record: unknown, index: number) => {
    const rowNo = index + 1;
    if (!isCsvRow(record)) {
      throw new Error(`${source} row ${rowNo}: unreadable row`);
    }

    const kind = classifyRow(record);
    if (!kind) {
      ignored++;
      return;
    }

    const tx = kind === "trade"
      ? parseTradeRow(record, source, rowNo, defaultMultiplier)
      : parseExpirationRow(record, source, rowNo, defaultMultiplier);

    // Identical rows in one export (split fills at the same price) stay distinct
    const base = [tx.timestamp, tx.orderId ?? "", tx.symbol, tx.action, tx.quantity, cell(record, "Average Price")].join("|");
    const n = (seen.get(base) ?? 0) + 1;
    seen.set(base, n);
    transactions.push({ ...tx, id: `${base}|${n}`, source, row: rowNo });
  });

  return { transactions, ignored };
}

function classifyRow(row: CsvRow): Transaction["kind"] | null {
  const type = cell(row, "Type");
  if (type === "Trade") {
    const instrument = cell(row, "Instrument Type");
    return instrument === "" || OPTION_INSTRUMENTS.has(instrument) ? "trade" : null;
  }
  if (type === "Receive Deliver" && cell(row, "Sub Type") === "Expiration") {
    return "expiration";
  }
  return null;
}

function parseTradeRow(row: CsvRow, source: string, rowNo: number, defaultMultiplier: number): ParsedRow {
  const fail = (msg: string) => new Error(`${source} row ${rowNo}: ${msg}`);
  const common = parseContractFields(row, defaultMultiplier, fail);

  const rawAction = cell(row, "Action").toUpperCase().replace(/\s+/g, "_");
  const action = ACTIONS.find(a => a === rawAction && a !== "EXPIRED");
  if (!action) throw fail(`unknown action "${cell(row, "Action")}"`);
  const side: SideT = action.startsWith("SELL") ? "short" : "long";

  const avgPrice = parseNumber(cell(row, "Average Price"));
  if (avgPrice === null) throw fail(`invalid average price "${cell(row, "Average Price")}"`);

  const rawValue = cell(row, "Value");
  let value: number;
  if (rawValue === "") {
    value = round2((side === "short" ? 1 : -1) * Math.abs(avgPrice) * common.quantity);
  } else {
    const parsed = parseNumber(rawValue);
    if (parsed === null) throw fail(`invalid value "${rawValue}"`);
    value = parsed;
  }

  const fees = Math.abs(optionalNumber(row, "Commissions", 0, fail)) + Math.abs(optionalNumber(row, "Fees", 0, fail));

  return {
    ...common,
    kind: "trade",
    action,
    effect: action.endsWith("TO_OPEN") ? "open" : "close",
    side,
    price: Math.round((Math.abs(avgPrice) / 100) * 10000) / 10000,
    value,
    fees: round2(fees),
  };
}

function parseExpirationRow(row: CsvRow, source: string, rowNo: number, defaultMultiplier: number): ParsedRow {
  const fail = (msg: string) => new Error(`${source} row ${rowNo}: ${msg}`);
  return {
    ...parseContractFields(row, defaultMultiplier, fail),
    kind: "expiration",
    action: "EXPIRED",
    effect: "close",
    side: null,
    price: 0,
    value: 0,
    fees: 0,
  };
}

type ParsedRow = Omit<Transaction, "id" | "source" | "row">;
type ContractFields = Omit<ParsedRow, "kind" | "action" | "effect" | "side" | "price" | "value" | "fees">;

function parseContractFields(row: CsvRow, defaultMultiplier: number, fail: (msg: string) => Error): ContractFields {
  const timestamp = cell(row, "Date");
  const date = parseDate(timestamp);
  if (!date) throw fail(`invalid date "${timestamp}"`);

  const expiration = parseDate(cell(row, "Expiration Date"));
  if (!expiration) throw fail(`invalid expiration date "${cell(row, "Expiration Date")}"`);

  const strike = parseNumber(cell(row, "Strike Price"));
  if (strike === null || strike <= 0) throw fail(`invalid strike "${cell(row, "Strike Price")}"`);

  const quantity = parseNumber(cell(row, "Quantity"));
  if (quantity === null || !Number.isInteger(Math.abs(quantity)) || quantity === 0) {
    throw fail(`invalid quantity "${cell(row, "Quantity")}"`);
  }

  const optionType = parseOptionType(cell(row, "Call or Put"));
  if (!optionType) throw fail(`invalid option type "${cell(row, "Call or Put")}"`);

  const multiplier = optionalNumber(row, "Multiplier", defaultMultiplier, fail);
  if (multiplier <= 0) throw fail(`invalid multiplier "${cell(row, "Multiplier")}"`);

  const rawOrder = cell(row, "Order #");
  let orderId: number | null = null;
  if (rawOrder !== "") {
    const parsed = parseNumber(rawOrder);
    if (parsed === null) throw fail(`invalid order number "${rawOrder}"`);
    orderId = parsed;
  }

  const symbol = cell(row, "Symbol");
  const underlying = normalizeTicker(cell(row, "Underlying Symbol") || cell(row, "Root Symbol") || symbol);
  const root = normalizeTicker(cell(row, "Root Symbol") || symbol);

  return {
    timestamp,
    time: parseTime(timestamp, date),
    date,
    underlying,
    root,
    symbol,
    optionType,
    strike,
    expiration,
    quantity: Math.abs(quantity),
    multiplier,
    orderId,
  };
}

// ─── Files ───────────────────────────────────────────────────────────────────

export async function loadTransactionFile(filePath: string, defaultMultiplier: number = 100): Promise<ParseResult> {
  const content = await readFile(filePath, "utf8");
  return parseTransactionsCsv(content, basename(filePath), defaultMultiplier);
}

export function listTransactionFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter(f => f.toLowerCase().endsWith(".csv"))
    .sort()
    .map(f => join(dir, f));
}

// ─── Field Helpers ───────────────────────────────────────────────────────────

export function normalizeTicker(symbol: string): string {
  const upper = symbol.trim().toUpperCase();
  const isFuture = upper.startsWith("/") || upper.startsWith("./");
  const token = upper.replace(/^\.?\/?/, "").split(/\s+/)[0] ?? "";

  if (isFuture) {
    const m = FUTURES_MONTH.exec(token);
    return m ? m[1] : token.replace(/[^A-Z0-9]/g, "");
  }
  const letters = /^[A-Z]+/.exec(token);
  return letters ? letters[0] : token;
}

/** YYYY-MM-DD from ISO timestamps/dates, M/D/YY or M/D/YYYY. */
export function parseDate(text: string): string | null {
  const t = text.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(t);
  if (iso) return toYmd(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(t);
  if (us) {
    const year = us[3].length === 2 ? 2000 + Number(us[3]) : Number(us[3]);
    return toYmd(year, Number(us[1]), Number(us[2]));
  }
  return null;
}

/** Epoch ms of an ISO timestamp (offsets with or without a colon); midnight UTC of `date` otherwise. */
export function parseTime(timestamp: string, date: string): number {
  if (/^\d{4}-\d{2}-\d{2}T/.test(timestamp)) {
    const ms = Date.parse(timestamp.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
    if (!Number.isNaN(ms)) return ms;
  }
  return Date.parse(`${date}T00:00:00Z`);
}

export function parseNumber(text: string): number | null {
  const cleaned = text.replace(/[,$\s]/g, "");
  if (cleaned === "") return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function parseOptionType(text: string): OptionTypeT | null {
  const t = text.trim().toUpperCase();
  if (t === "PUT" || t === "P") return "put";
  if (t === "CALL" || t === "C") return "call";
  return null;
}

function optionalNumber(row: CsvRow, key: string, fallback: number, fail: (msg: string) => Error): number {
  const raw = cell(row, key);
  if (raw === "" || raw === "--") return fallback;
  const n = parseNumber(raw);
  if (n === null) throw fail(`invalid ${key.toLowerCase()} "${raw}"`);
  return n;
}

function toYmd(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function cell(row: CsvRow, key: string): string {
  return (row[key] ?? "").trim();
}

function isCsvRow(record: unknown): record is CsvRow {
  return typeof record === "object" && record !== null && !Array.isArray(record) &&
    Object.values(record).every(v => typeof v === "string");
}
