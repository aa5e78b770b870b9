import type { TradeT } from "./Schema";
import type { TradeStore } from "./TradeStore";
import { exitValue, isCredit, openLegs, realizedPnl } from "./TradeMath";

export interface CloseOptions {
  /** YYYY-MM-DD, defaults to today */
  date?: string;
  /** Realized P&L as reported by the broker, instead of the computed one */
  pnl?: number;
  note?: string;
  defaultMultiplier: number;
}

/**
 * Close an open trade at `exitPrice` (per-share price of the whole position)
 * and move it to the archive.
 */
export async function closeTrade(
  store: TradeStore,
  id: string,
  exitPrice: number,
  options: CloseOptions,
): Promise<TradeT> {
  if (!Number.isFinite(exitPrice) || exitPrice < 0) {
    throw new Error(`Invalid exit price: ${exitPrice}`);
  }
  if (options.pnl !== undefined && !Number.isFinite(options.pnl)) {
    throw new Error(`Invalid P&L: ${options.pnl}`);
  }

  const trade = await store.require(id);
  if (trade.status === "closed") {
    throw new Error(`Trade ${id} is already closed`);
  }

  const date = options.date ?? new Date().toISOString().slice(0, 10);
  const exit = exitValue(trade, exitPrice, options.defaultMultiplier);

  trade.exit_price = exitPrice;
  trade.exit_value = exit;
  trade.realized_pnl = options.pnl ?? realizedPnl(trade.cost_basis, exit, isCredit(trade));
  trade.status = "closed";
  trade.closed = date;
  trade.closed_by = "manual";
  delete trade.unrealized_pnl;

  for (const leg of openLegs(trade)) {
    leg.remaining = 0;
    leg.status = "closed";
  }

  const note = `Closed on ${date} at ${exitPrice}` + (options.note ? `: ${options.note}` : "");
  trade.notes = trade.notes ? `${trade.notes}\n${note}` : note;

  await store.save(trade);
  return trade;
}
