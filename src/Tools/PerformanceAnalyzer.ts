/**
 * PerformanceAnalyzer.ts — Summary statistics over trade records
 *
 * Pure: takes the trades already loaded from the store and returns a report.
 * Realized figures come from closed trades only; open trades contribute their
 * count, cost basis and latest unrealized mark.
 */

import type { TradeT } from "./Schema";
import { round2 } from "./TradeMath";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface AnalyzeFilter {
  /** closed-date range, inclusive */
  from?: string;
  to?: string;
  ticker?: string;
  strategy?: string;
  tag?: string;
}

export interface Breakdown {
  key: string;
  trades: number;
  totalPnl: number;
  avgPnl: number;
  winRate: number;
}

export interface TradeRef {
  id: string;
  pnl: number;
}

export interface PerformanceReport {
  total: number;
  open: number;
  closed: number;
  winners: number;
  losers: number;
  breakeven: number;
  /** 0..1 */
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  avgWin: number;
  avgLoss: number;
  /** null when there are no losing trades */
  profitFactor: number | null;
  avgHoldDays: number;
  openCostBasis: number;
  unrealizedPnl: number;
  best: TradeRef | null;
  worst: TradeRef | null;
  byStrategy: Breakdown[];
  byTicker: Breakdown[];
  byTag: Breakdown[];
}

// ─── Analysis ────────────────────────────────────────────────────────────────

export function analyzePerformance(trades: TradeT[], filter: AnalyzeFilter = {}): PerformanceReport {
  const selected = trades.filter(t => matchesFilter(t, filter));
  const open = selected.filter(t => t.status === "open");
  const closed = selected.filter(t => t.status === "closed");

  const pnls = closed.map(pnlOf);
  const winners = pnls.filter(p => p > 0);
  const losers = pnls.filter(p => p < 0);
  const grossWin = winners.reduce((s, p) => s + p, 0);
  const grossLoss = losers.reduce((s, p) => s + p, 0);
  const totalPnl = round2(pnls.reduce((s, p) => s + p, 0));

  const holdDays = closed.map(t => daysBetween(t.opened, t.closed ?? t.opened));

  const ranked = [...closed].sort((a, b) => pnlOf(b) - pnlOf(a) || a.id.localeCompare(b.id));
  const ref = (t: TradeT | undefined): TradeRef | null => (t ? { id: t.id, pnl: pnlOf(t) } : null);

  return {
    total: selected.length,
    open: open.length,
    closed: closed.length,
    winners: winners.length,
    losers: losers.length,
    breakeven: pnls.length - winners.length - losers.length,
    winRate: closed.length > 0 ? winners.length / closed.length : 0,
    totalPnl,
    avgPnl: closed.length > 0 ? round2(totalPnl / closed.length) : 0,
    avgWin: winners.length > 0 ? round2(grossWin / winners.length) : 0,
    avgLoss: losers.length > 0 ? round2(grossLoss / losers.length) : 0,
    profitFactor: losers.length > 0 ? round2(grossWin / Math.abs(grossLoss)) : null,
    avgHoldDays: holdDays.length > 0 ? Math.round((holdDays.reduce((s, d) => s + d, 0) / holdDays.length) * 10) / 10 : 0,
    openCostBasis: round2(open.reduce((s, t) => s + t.cost_basis, 0)),
    unrealizedPnl: round2(open.reduce((s, t) => s + (t.unrealized_pnl ?? 0), 0)),
    best: ref(ranked[0]),
    worst: ref(ranked[ranked.length - 1]),
    byStrategy: breakdown(closed, t => [t.strategy]),
    byTicker: breakdown(closed, t => [t.ticker]),
    byTag: breakdown(closed, t => t.tags),
  };
}

function matchesFilter(trade: TradeT, filter: AnalyzeFilter): boolean {
  if (filter.ticker && trade.ticker !== filter.ticker.toUpperCase()) return false;
  if (filter.strategy && trade.strategy.toLowerCase() !== filter.strategy.toLowerCase()) return false;
  if (filter.tag && !trade.tags.includes(filter.tag)) return false;
  if (filter.from || filter.to) {
    // A date range selects by close date, so open trades fall out
    if (trade.status !== "closed" || !trade.closed) return false;
    if (filter.from && trade.closed < filter.from) return false;
    if (filter.to && trade.closed > filter.to) return false;
  }
  return true;
}

function breakdown(trades: TradeT[], keysOf: (t: TradeT) => string[]): Breakdown[] {
  const groups = new Map<string, number[]>();
  for (const t of trades) {
    for (const key of keysOf(t)) {
      const list = groups.get(key) ?? [];
      list.push(pnlOf(t));
      groups.set(key, list);
    }
  }

  return [...groups.entries()]
    .map(([key, pnls]) => {
      const total = round2(pnls.reduce((s, p) => s + p, 0));
      return {
        key,
        trades: pnls.length,
        totalPnl: total,
        avgPnl: round2(total / pnls.length),
        winRate: pnls.filter(p => p > 0).length / pnls.length,
      };
    })
    .sort((a, b) => b.totalPnl - a.totalPnl || a.key.localeCompare(b.key));
}

function pnlOf(trade: TradeT): number {
  return trade.realized_pnl ?? 0;
}

function daysBetween(from: string, to: string): number {
  const ms = Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`);
  return Number.isFinite(ms) ? Math.max(Math.round(ms / 86_400_000), 0) : 0;
}
