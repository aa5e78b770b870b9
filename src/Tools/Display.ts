import type { TradeT } from "./Schema";
import type { Breakdown, PerformanceReport } from "./PerformanceAnalyzer";
import type { ClosedTradeRow, DBSnapshot, StrategyStats } from "./TradeDB";
import type { TrackResult } from "./TradeTracker";
import type { Transaction } from "./TransactionParser";

// ─── Formatting ──────────────────────────────────────────────────────────────

export function fmtPnl(n: number): string {
  return `${n >= 0 ? "+" : "-"}$${Math.abs(n).toFixed(2)}`;
}

export function fmtPct(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function fmtOpt(n: number | null | undefined, digits = 2): string {
  return n === null || n === undefined ? "-" : n.toFixed(digits);
}

function rule(width: number): void {
  console.log("  " + "-".repeat(width));
}

// ─── Transactions ────────────────────────────────────────────────────────────

export function printTransactions(transactions: Transaction[]): void {
  console.log("  " + [
    "Date".padEnd(12),
    "Order".padEnd(12),
    "Action".padEnd(15),
    "Qty".padEnd(5),
    "Contract".padEnd(28),
    "Price".padEnd(9),
    "Value".padEnd(12),
    "Fees",
  ].join(""));
  rule(100);
  for (const tx of transactions) {
    const contract = `${tx.underlying} ${tx.expiration} ${tx.strike} ${tx.optionType.toUpperCase()}`;
    console.log("  " + [
      tx.date.padEnd(12),
      String(tx.orderId ?? "-").padEnd(12),
      tx.action.padEnd(15),
      String(tx.quantity).padEnd(5),
      contract.padEnd(28),
      tx.price.toFixed(2).padEnd(9),
      fmtPnl(tx.value).padEnd(12),
      tx.fees.toFixed(2),
    ].join(""));
  }
  rule(100);
}

// ─── Trades ──────────────────────────────────────────────────────────────────

export function printTrades(trades: TradeT[]): void {
  console.log("  " + [
    "ID".padEnd(30),
    "Status".padEnd(8),
    "Strategy".padEnd(24),
    "Opened".padEnd(12),
    "Closed".padEnd(12),
    "Basis".padEnd(12),
    "P&L",
  ].join(""));
  rule(110);
  for (const t of trades) {
    const pnl = t.status === "closed"
      ? fmtPnl(t.realized_pnl ?? 0)
      : t.unrealized_pnl !== undefined ? `${fmtPnl(t.unrealized_pnl)} (open)` : "";
    console.log("  " + [
      t.id.padEnd(30),
      t.status.padEnd(8),
      t.strategy.padEnd(24),
      t.opened.padEnd(12),
      (t.closed ?? "").padEnd(12),
      fmtPnl(t.cost_basis).padEnd(12),
      pnl,
    ].join(""));
  }
  rule(110);
}

export function printTradeDetail(t: TradeT): void {
  console.log(`\n=== ${t.id} ===\n`);
  console.log(`  Ticker:        ${t.ticker}`);
  console.log(`  Strategy:      ${t.strategy}`);
  console.log(`  Status:        ${t.status}`);
  console.log(`  Opened:        ${t.opened}`);
  if (t.closed) console.log(`  Closed:        ${t.closed} (${t.closed_by ?? "manual"})`);
  console.log(`  Expiration:    ${t.expiration}`);
  console.log(`  Cost basis:    ${fmtPnl(t.cost_basis)}`);
  if (t.exit_price !== undefined) console.log(`  Exit price:    ${t.exit_price}`);
  if (t.realized_pnl !== undefined) console.log(`  Realized P&L:  ${fmtPnl(t.realized_pnl)}`);
  if (t.unrealized_pnl !== undefined) {
    console.log(`  Unrealized:    ${fmtPnl(t.unrealized_pnl)} (as of ${t.last_marked ?? "?"})`);
  }
  console.log(`  Roll count:    ${t.roll_count}`);
  if (t.tags.length > 0) console.log(`  Tags:          ${t.tags.join(", ")}`);
  if (t.order_ids.length > 0) console.log(`  Orders:        ${t.order_ids.join(", ")}`);

  console.log(`\n  Legs:`);
  rule(96);
  for (const l of t.legs) {
    const state = l.effect === "open" ? (l.status ?? `${l.remaining ?? 0} open`) : "";
    console.log("  " + [
      l.date.padEnd(12),
      l.action.padEnd(15),
      String(l.contracts).padEnd(4),
      l.type.toUpperCase().padEnd(6),
      String(l.strike).padEnd(9),
      l.expiry.padEnd(12),
      l.price.toFixed(2).padEnd(8),
      fmtPnl(l.value).padEnd(12),
      state,
    ].join(""));
  }
  rule(96);

  if (t.notes) {
    console.log(`\n  Notes:`);
    for (const line of t.notes.split("\n")) console.log(`    ${line}`);
  }
}

export function printTrackResult(result: TrackResult, dryRun: boolean): void {
  const verb = dryRun ? "Would create" : "Created";
  for (const id of result.created) console.log(`  ${verb}:  ${id}`);
  for (const id of result.updated) console.log(`  Updated:  ${id}`);
  for (const id of result.closed) console.log(`  Closed:   ${id}`);
  if (result.skipped > 0) console.log(`  Skipped ${result.skipped} already-tracked transaction(s)`);
  for (const w of result.warnings) console.log(`[WARN] ${w}`);
}

// ─── Performance ─────────────────────────────────────────────────────────────

export function printReport(r: PerformanceReport, label: string): void {
  console.log(`\n=== Performance: ${label} ===\n`);
  console.log(`  Trades:         ${r.total} (${r.open} open, ${r.closed} closed)`);
  if (r.closed === 0) {
    console.log(`  No closed trades to analyze.`);
  } else {
    console.log(`  Win rate:       ${fmtPct(r.winRate)} (${r.winners}W / ${r.losers}L / ${r.breakeven}BE)`);
    console.log(`  Total P&L:      ${fmtPnl(r.totalPnl)}`);
    console.log(`  Avg P&L/trade:  ${fmtPnl(r.avgPnl)}`);
    console.log(`  Avg win:        ${fmtPnl(r.avgWin)}`);
    console.log(`  Avg loss:       ${fmtPnl(r.avgLoss)}`);
    console.log(`  Profit factor:  ${r.profitFactor === null ? "N/A (no losers)" : r.profitFactor.toFixed(2)}`);
    console.log(`  Avg hold time:  ${r.avgHoldDays.toFixed(1)} days`);
    if (r.best && r.worst) {
      console.log(`  Best trade:     ${r.best.id} ${fmtPnl(r.best.pnl)}`);
      console.log(`  Worst trade:    ${r.worst.id} ${fmtPnl(r.worst.pnl)}`);
    }
  }
  if (r.open > 0) {
    console.log(`  Open basis:     ${fmtPnl(r.openCostBasis)}`);
    console.log(`  Unrealized:     ${fmtPnl(r.unrealizedPnl)}`);
  }

  printBreakdown("By strategy", r.byStrategy);
  printBreakdown("By ticker", r.byTicker);
  printBreakdown("By tag", r.byTag);
}

function printBreakdown(title: string, rows: Breakdown[]): void {
  if (rows.length === 0) return;
  console.log(`\n  ${title}:`);
  for (const b of rows) {
    console.log(`    ${b.key.padEnd(24)} ${String(b.trades).padStart(3)} trades  ${fmtPnl(b.totalPnl).padEnd(12)} avg ${fmtPnl(b.avgPnl).padEnd(10)} ${fmtPct(b.winRate)} win`);
  }
}

// ─── DB Views ────────────────────────────────────────────────────────────────

export function printSnapshots(snapshots: DBSnapshot[]): void {
  console.log("  " + [
    "Date".padEnd(12),
    "Underlying".padEnd(12),
    "Delta".padEnd(9),
    "β Delta".padEnd(9),
    "Theta".padEnd(9),
    "IVR".padEnd(7),
    "PoP".padEnd(7),
    "P&L".padEnd(12),
    "% Max",
  ].join(""));
  rule(90);
  for (const s of snapshots) {
    console.log("  " + [
      s.date.padEnd(12),
      fmtOpt(s.underlying_price).padEnd(12),
      s.delta.toFixed(2).padEnd(9),
      s.beta_delta.toFixed(2).padEnd(9),
      s.theta.toFixed(2).padEnd(9),
      fmtOpt(s.iv_rank, 1).padEnd(7),
      fmtOpt(s.pop, 0).padEnd(7),
      fmtPnl(s.pnl).padEnd(12),
      s.pct_max_profit === null ? "-" : `${s.pct_max_profit.toFixed(1)}%`,
    ].join(""));
  }
  rule(90);
}

export function printLedger(rows: ClosedTradeRow[]): void {
  rule(100);
  for (const r of rows) {
    console.log("  " + [
      r.closed.padEnd(12),
      r.id.padEnd(30),
      r.strategy.padEnd(24),
      fmtPnl(r.realized_pnl).padEnd(12),
      r.tags.join(","),
    ].join(""));
  }
  rule(100);
  const total = rows.reduce((s, r) => s + r.realized_pnl, 0);
  console.log(`  ${rows.length} closed trade(s), total ${fmtPnl(Math.round(total * 100) / 100)}`);
}

export function printStrategyStats(stats: StrategyStats[]): void {
  console.log("  " + [
    "Strategy".padEnd(24),
    "Trades".padEnd(8),
    "P&L".padEnd(12),
    "Avg P&L".padEnd(12),
    "Win%".padEnd(8),
    "W/L",
  ].join(""));
  rule(72);
  for (const s of stats) {
    console.log("  " + [
      s.strategy.padEnd(24),
      String(s.trades).padEnd(8),
      fmtPnl(s.total_pnl).padEnd(12),
      fmtPnl(s.avg_pnl).padEnd(12),
      `${s.win_rate.toFixed(0)}%`.padEnd(8),
      `${s.winners}/${s.losers}`,
    ].join(""));
  }
  rule(72);
}
