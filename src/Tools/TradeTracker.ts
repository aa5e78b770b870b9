/**
 * TradeTracker.ts — Apply parsed transactions to trade records
 *
 * Opening orders create (or add to) the trade their strategy, underlying and
 * expiry name; closing fills consume open legs; an order that closes legs of
 * one trade and opens new ones is a roll of that trade. A trade with nothing
 * left open closes itself and moves to the archive.
 *
 * Every leg remembers the transaction it came from, so feeding the same export
 * twice changes nothing.
 */

import type { LegT, SideT, TradeT } from "./Schema";
import {
  detectStrategy,
  strategyCode,
  strategyNameForCode,
  tradeId,
  type StrategyCode,
  type StrategyName,
} from "./StrategyDetector";
import type { TradeStore } from "./TradeStore";
import type { Transaction } from "./TransactionParser";
import { costBasis, openLegs, round2 } from "./TradeMath";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TrackOptions {
  /** Force the strategy code used in new identifiers */
  strategy?: StrategyCode;
  /** Group fills by date + underlying instead of by order number */
  combine?: boolean;
  dryRun?: boolean;
}

export interface TrackResult {
  created: string[];
  updated: string[];
  closed: string[];
  skipped: number;
  warnings: string[];
  /** Final state of every trade the run touched */
  trades: TradeT[];
}

interface LegMatch {
  trade: TradeT;
  legs: LegT[];
  available: number;
}

// ─── Tracking ────────────────────────────────────────────────────────────────

export async function trackTransactions(
  store: TradeStore,
  transactions: Transaction[],
  options: TrackOptions = {},
): Promise<TrackResult> {
  const existing = await store.list();
  const trades = new Map(existing.map(t => [t.id, t]));

  const recorded = new Set(existing.flatMap(t => t.legs.map(l => l.tx_id)));
  const fresh: Transaction[] = [];
  for (const tx of transactions) {
    if (recorded.has(tx.id)) continue;
    recorded.add(tx.id);
    fresh.push(tx);
  }

  const created = new Set<string>();
  const touched = new Set<string>();
  const closed: string[] = [];
  const warnings: string[] = [];

  const finalize = (trade: TradeT, date: string, lastKind: Transaction["kind"]) => {
    trade.cost_basis = costBasis(trade.legs);
    if (closeIfFlat(trade, date, lastKind)) closed.push(trade.id);
  };

  for (const group of groupTransactions(fresh.filter(t => t.kind === "trade"), options.combine ?? false)) {
    const date = group[0].date;
    const groupTouched = new Set<TradeT>();
    let closedSinceOpen = new Set<TradeT>();
    let pending: Transaction[] = [];

    const flushOpens = () => {
      if (pending.length === 0) return;
      const rollTarget = closedSinceOpen.size === 1 ? [...closedSinceOpen][0] : null;

      if (rollTarget) {
        applyRoll(rollTarget, pending, date);
      } else {
        if (closedSinceOpen.size > 1) {
          warnings.push(`Order on ${date} closes legs of ${closedSinceOpen.size} trades; opening legs tracked as a new trade`);
        }
        for (const legsByUnderlying of splitByUnderlying(pending)) {
          const trade = applyOpen(trades, legsByUnderlying, options.strategy);
          if (!trades.has(trade.id)) created.add(trade.id);
          trades.set(trade.id, trade);
          groupTouched.add(trade);
        }
      }
      pending = [];
      closedSinceOpen = new Set();
    };

    // Fills apply in time order; opens wait so an order's closes can mark it as a roll
    for (const tx of group) {
      if (tx.effect === "open") {
        pending.push(tx);
        continue;
      }
      if (pending.length > 0 && availableFor(trades, tx) < tx.quantity) flushOpens();
      for (const trade of applyClose(trades, tx)) {
        groupTouched.add(trade);
        closedSinceOpen.add(trade);
      }
    }
    flushOpens();

    for (const trade of groupTouched) {
      finalize(trade, date, "trade");
      touched.add(trade.id);
    }
  }

  const expirations = fresh
    .filter(t => t.kind === "expiration")
    .sort((a, b) => a.time - b.time);

  for (const tx of expirations) {
    const matches = findOpenLegs(trades, tx);
    if (totalAvailable(matches) < tx.quantity) {
      warnings.push(`Expiration of ${describe(tx)} matches no open leg`);
      continue;
    }
    for (const trade of consume(matches, tx)) {
      finalize(trade, tx.date, "expiration");
      touched.add(trade.id);
    }
  }

  const result: TrackResult = {
    created: [...created].sort(),
    updated: [...touched].filter(id => !created.has(id)).sort(),
    closed,
    skipped: transactions.length - fresh.length,
    warnings,
    trades: [...touched].sort().flatMap(id => trades.get(id) ?? []),
  };

  if (!options.dryRun) {
    for (const trade of result.trades) {
      await store.save(trade);
    }
  }

  return result;
}

// ─── Grouping ────────────────────────────────────────────────────────────────

/**
 * Groups fills by order number (or by day and underlying when combining).
 * Fills in a group are in time order and groups run by their first fill, so
 * exports listed newest-first replay the same as oldest-first ones.
 */
export function groupTransactions(transactions: Transaction[], combine: boolean): Transaction[][] {
  const position = new Map(transactions.map((tx, i) => [tx, i]));
  const byTime = (a: Transaction, b: Transaction) =>
    a.time - b.time || (position.get(a) ?? 0) - (position.get(b) ?? 0);

  const groups = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    const key = !combine && tx.orderId !== null
      ? `order:${tx.orderId}`
      : `${tx.date}|${tx.underlying}`;
    const group = groups.get(key);
    if (group) group.push(tx);
    else groups.set(key, [tx]);
  }

  const sorted = [...groups.values()].map(g => g.sort(byTime));
  return sorted.sort((a, b) => byTime(a[0], b[0]));
}

function splitByUnderlying(transactions: Transaction[]): Transaction[][] {
  const byUnderlying = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    const list = byUnderlying.get(tx.underlying);
    if (list) list.push(tx);
    else byUnderlying.set(tx.underlying, [tx]);
  }
  return [...byUnderlying.values()];
}

// ─── Opening ─────────────────────────────────────────────────────────────────

function applyOpen(trades: Map<string, TradeT>, opens: Transaction[], override?: StrategyCode): TradeT {
  const first = opens[0];
  const legs = opens.map(tx => toLeg(tx, sideOf(tx)));

  const name: StrategyName = override
    ? strategyNameForCode(override)
    : detectStrategy(legs.map(l => ({ type: l.type, side: l.side, strike: l.strike, expiry: l.expiry })));
  const code = override ?? strategyCode(name);
  const expiration = legs.map(l => l.expiry).sort()[0];
  const id = tradeId(first.underlying, code, expiration);

  const existing = trades.get(id);
  if (existing?.status === "closed") {
    throw new Error(`Trade ${id} is already closed`);
  }

  if (existing) {
    existing.legs.push(...legs);
    addOrderIds(existing, opens);
    appendNote(existing, `Added on ${first.date}${orderLabel(opens)}`);
    return existing;
  }

  const trade: TradeT = {
    id,
    ticker: first.underlying,
    strategy: name,
    status: "open",
    opened: first.date,
    expiration,
    cost_basis: 0,
    roll_count: 0,
    order_ids: [],
    tags: [],
    notes: "",
    legs,
  };
  addOrderIds(trade, opens);
  return trade;
}

function applyRoll(trade: TradeT, opens: Transaction[], date: string): void {
  trade.legs.push(...opens.map(tx => toLeg(tx, sideOf(tx))));
  trade.roll_count += 1;
  if (!trade.tags.includes("rolled")) trade.tags.push("rolled");
  addOrderIds(trade, opens);
  appendNote(trade, `Rolled on ${date}${orderLabel(opens)}`);
}

// ─── Closing ─────────────────────────────────────────────────────────────────

/** Draws the fill from open trades oldest first; returns every trade it touched. */
function applyClose(trades: Map<string, TradeT>, tx: Transaction): TradeT[] {
  const matches = findOpenLegs(trades, tx);

  if (matches.length === 0) {
    const closedHolder = [...trades.values()].find(t =>
      t.status === "closed" && t.ticker === tx.underlying && t.legs.some(l => l.effect === "open" && sameContract(l, tx)),
    );
    if (closedHolder) throw new Error(`Trade ${closedHolder.id} is already closed`);
    throw new Error(`No open leg matches ${describe(tx)} (${tx.source} row ${tx.row})`);
  }

  const available = totalAvailable(matches);
  if (available < tx.quantity) {
    const ids = matches.map(m => m.trade.id);
    const holders = ids.length === 1 ? `trade ${ids[0]}` : `trades ${ids.join(", ")}`;
    throw new Error(`Closing ${tx.quantity} of ${describe(tx)} exceeds the ${available} open in ${holders}`);
  }

  const used = consume(matches, tx);
  for (const trade of used) addOrderIds(trade, [tx]);
  return used;
}

/** Open trades of the same underlying holding the contract, by open date. */
function findOpenLegs(trades: Map<string, TradeT>, tx: Transaction): LegMatch[] {
  const matches: LegMatch[] = [];
  const open = [...trades.values()]
    .filter(t => t.status === "open" && t.ticker === tx.underlying)
    .sort((a, b) => a.opened.localeCompare(b.opened) || a.id.localeCompare(b.id));

  for (const trade of open) {
    const legs = openLegs(trade).filter(l => sameContract(l, tx) && (tx.side === null || l.side !== tx.side));
    if (legs.length === 0) continue;
    matches.push({ trade, legs, available: legs.reduce((s, l) => s + (l.remaining ?? 0), 0) });
  }
  return matches;
}

function availableFor(trades: Map<string, TradeT>, tx: Transaction): number {
  return totalAvailable(findOpenLegs(trades, tx));
}

function totalAvailable(matches: LegMatch[]): number {
  return matches.reduce((s, m) => s + m.available, 0);
}

/**
 * Takes `tx.quantity` contracts from the matches in order. Each trade drawn on
 * gets its own closing leg; value and fees split by contracts, the last share
 * taking the rounding remainder.
 */
function consume(matches: LegMatch[], tx: Transaction): TradeT[] {
  const used: TradeT[] = [];
  let need = tx.quantity;
  let valueLeft = tx.value;
  let feesLeft = tx.fees;

  for (const match of matches) {
    if (need === 0) break;
    const take = Math.min(need, match.available);
    if (take === 0) continue;

    let left = take;
    for (const leg of match.legs) {
      if (left === 0) break;
      const n = Math.min(left, leg.remaining ?? 0);
      leg.remaining = (leg.remaining ?? 0) - n;
      left -= n;
      if (leg.remaining === 0) leg.status = tx.kind === "expiration" ? "expired" : "closed";
    }
    need -= take;

    const closedSide: SideT = match.legs[0].side;
    const leg = toLeg(tx, tx.side ?? (closedSide === "short" ? "long" : "short"));
    if (take < tx.quantity) {
      const last = need === 0;
      leg.contracts = take;
      leg.value = last ? round2(valueLeft) : round2((tx.value * take) / tx.quantity);
      leg.fees = last ? round2(feesLeft) : round2((tx.fees * take) / tx.quantity);
      valueLeft -= leg.value;
      feesLeft -= leg.fees;
    }
    match.trade.legs.push(leg);
    used.push(match.trade);
  }
  return used;
}

function closeIfFlat(trade: TradeT, date: string, lastKind: Transaction["kind"]): boolean {
  if (trade.status !== "open") return false;
  const opening = trade.legs.filter(l => l.effect === "open");
  if (opening.length === 0 || openLegs(trade).length > 0) return false;

  const closingValue = trade.legs
    .filter(l => l.effect === "close")
    .reduce((s, l) => s + l.value, 0);
  const exit = round2(Math.abs(closingValue));
  const units = Math.min(...opening.map(l => l.contracts));
  const via = lastKind === "expiration" ? "expiration" : "transactions";

  trade.status = "closed";
  trade.closed = date;
  trade.closed_by = via;
  trade.exit_value = exit;
  trade.exit_price = round2(exit / (opening[0].multiplier * units));
  trade.realized_pnl = trade.cost_basis;
  delete trade.unrealized_pnl;
  appendNote(trade, `Closed via ${via} on ${date}`);
  return true;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function toLeg(tx: Transaction, side: SideT): LegT {
  const leg: LegT = {
    tx_id: tx.id,
    date: tx.date,
    action: tx.action,
    effect: tx.effect,
    side,
    type: tx.optionType,
    ticker: tx.root,
    strike: tx.strike,
    expiry: tx.expiration,
    contracts: tx.quantity,
    price: tx.price,
    value: tx.value,
    fees: tx.fees,
    multiplier: tx.multiplier,
  };
  if (tx.effect === "open") leg.remaining = tx.quantity;
  return leg;
}

function sideOf(tx: Transaction): SideT {
  return tx.side ?? (tx.action.startsWith("SELL") ? "short" : "long");
}

function sameContract(leg: LegT, tx: Transaction): boolean {
  return leg.type === tx.optionType && leg.strike === tx.strike && leg.expiry === tx.expiration;
}

function addOrderIds(trade: TradeT, txs: Transaction[]): void {
  for (const tx of txs) {
    if (tx.orderId !== null && !trade.order_ids.includes(tx.orderId)) trade.order_ids.push(tx.orderId);
  }
  trade.order_ids.sort((a, b) => a - b);
}

function appendNote(trade: TradeT, note: string): void {
  trade.notes = trade.notes ? `${trade.notes}\n${note}` : note;
}

function orderLabel(txs: Transaction[]): string {
  const ids = [...new Set(txs.flatMap(t => (t.orderId === null ? [] : [t.orderId])))];
  return ids.length > 0 ? ` (order #${ids.join(", #")})` : "";
}

function describe(tx: Transaction): string {
  return `${tx.underlying} ${tx.expiration} ${tx.strike} ${tx.optionType}`;
}
