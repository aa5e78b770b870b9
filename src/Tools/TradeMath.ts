import type { LegT, TradeT } from "./Schema";

/** Net premium after fees over every leg: positive = credit received. */
export function costBasis(legs: LegT[]): number {
  const value = legs.reduce((s, l) => s + l.value, 0);
  const fees = legs.reduce((s, l) => s + Math.abs(l.fees), 0);
  return round2(value - fees);
}

export function openLegs(trade: TradeT): LegT[] {
  return trade.legs.filter(l => l.effect === "open" && (l.remaining ?? 0) > 0);
}

/** Number of whole strategy units still on: the smallest open leg. */
export function tradeUnits(trade: TradeT): number {
  const open = openLegs(trade);
  if (open.length === 0) return 1;
  return Math.min(...open.map(l => l.remaining ?? 0));
}

export function exitValue(trade: TradeT, exitPrice: number, defaultMultiplier: number): number {
  const open = openLegs(trade);
  const multiplier = open.length > 0 ? open[0].multiplier : defaultMultiplier;
  return round2(exitPrice * multiplier * tradeUnits(trade));
}

/**
 * A credit position pays the exit value to close; a debit position receives it.
 */
export function realizedPnl(basis: number, exit: number, credit: boolean): number {
  return credit ? round2(basis - exit) : round2(basis + exit);
}

/**
 * Whether what is still open was sold for net premium. Closing legs already in
 * the basis do not count; with nothing open the basis decides.
 */
export function isCredit(trade: TradeT): boolean {
  const open = openLegs(trade);
  if (open.length === 0) return trade.cost_basis >= 0;
  const premium = open.reduce(
    (s, l) => s + (l.contracts > 0 ? (l.value / l.contracts) * (l.remaining ?? 0) : 0),
    0,
  );
  return premium >= 0;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
