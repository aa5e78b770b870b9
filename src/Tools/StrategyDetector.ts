import type { OptionTypeT, SideT } from "./Schema";

export interface StrategyLeg {
  type: OptionTypeT;
  side: SideT;
  strike: number;
  expiry: string;
}

export const STRATEGY_CODES = {
  "Iron Condor": "ic",
  "Broken Wing Put Condor": "bwpc",
  "Calendar 1-1-2": "cal112",
  "Ratio Spread (1-1-2)": "r112",
  "Strangle": "strangle",
  "Short Put": "sp",
  "Short Call": "sc",
  "Long Put": "lp",
  "Long Call": "lc",
  "Put Vertical": "pv",
  "Put Spread": "ps",
  "Call Vertical": "cv",
  "Call Spread": "cs",
  "Unnamed": "custom",
} as const;

export type StrategyName = keyof typeof STRATEGY_CODES;
export type StrategyCode = (typeof STRATEGY_CODES)[StrategyName];

export function detectStrategy(legs: StrategyLeg[]): StrategyName {
  const puts = legs.filter(l => l.type === "put");
  const calls = legs.filter(l => l.type === "call");
  const shorts = legs.filter(l => l.side === "short");
  const longs = legs.filter(l => l.side === "long");
  const expiries = new Set(legs.map(l => l.expiry));

  // Calendar 1-1-2: two shorts at one strike in front of a later long put
  if (legs.length === 3 && puts.length === 3 && shorts.length === 2 && longs.length === 1) {
    const shortStrikes = new Set(shorts.map(l => l.strike));
    const longExpiry = longs[0].expiry;
    if (shortStrikes.size === 1 && shorts.every(l => l.expiry <= longExpiry) && shorts.some(l => l.expiry < longExpiry)) {
      return "Calendar 1-1-2";
    }
  }

  if (legs.length === 2 && shorts.length === 2 && puts.length === 1 && calls.length === 1) {
    return "Strangle";
  }

  if (legs.length === 1) {
    const single = legs[0];
    if (single.side === "short") return single.type === "put" ? "Short Put" : "Short Call";
    return single.type === "put" ? "Long Put" : "Long Call";
  }

  if (legs.length === 2 && puts.length === 2) {
    return shorts.length === 1 ? "Put Vertical" : "Put Spread";
  }
  if (legs.length === 2 && calls.length === 2) {
    return shorts.length === 1 ? "Call Vertical" : "Call Spread";
  }

  if (legs.length === 4 && puts.length === 4 && shorts.length === 2 && longs.length === 2 && expiries.size === 1) {
    if (new Set(puts.map(l => l.strike)).size === 4) return "Broken Wing Put Condor";
  }

  if (legs.length === 4 && puts.length > 0 && calls.length > 0) {
    return "Iron Condor";
  }

  if (legs.length === 3 && shorts.length === 2 && longs.length === 1) {
    const shortPuts = shorts.filter(l => l.type === "put");
    if (shortPuts.length === 2 && longs[0].type === "put" && shortPuts.every(l => l.expiry === shortPuts[0].expiry)) {
      return "Ratio Spread (1-1-2)";
    }
  }

  return "Unnamed";
}

export function strategyCode(name: string): StrategyCode {
  return isStrategyName(name) ? STRATEGY_CODES[name] : STRATEGY_CODES.Unnamed;
}

export function isStrategyName(name: string): name is StrategyName {
  return Object.prototype.hasOwnProperty.call(STRATEGY_CODES, name);
}

export function isStrategyCode(code: string): code is StrategyCode {
  return Object.values(STRATEGY_CODES).some(c => c === code);
}

export function strategyNameForCode(code: StrategyCode): StrategyName {
  const entry = Object.entries(STRATEGY_CODES).find(([, c]) => c === code);
  return entry && isStrategyName(entry[0]) ? entry[0] : "Unnamed";
}

/** `spy_ic_2025-03-28` */
export function tradeId(underlying: string, code: StrategyCode, expiration: string): string {
  return `${underlying.toLowerCase()}_${code}_${expiration}`;
}
