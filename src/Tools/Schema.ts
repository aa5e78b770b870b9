/**
 * Schema.ts — zod schemas for everything read back from disk
 *
 * Trade YAML files and config.yaml are hand-editable, so they are validated
 * on load instead of trusted. Field names are snake_case to match the files.
 */

import { z } from "zod";

// ─── Trade Records ───────────────────────────────────────────────────────────

export const ACTIONS = ["SELL_TO_OPEN", "BUY_TO_OPEN", "SELL_TO_CLOSE", "BUY_TO_CLOSE", "EXPIRED"] as const;

export const Action = z.enum(ACTIONS);
export const Side = z.enum(["short", "long"]);
export const OptionType = z.enum(["put", "call"]);
export const TradeStatus = z.enum(["open", "closed"]);

export const Leg = z.object({
  tx_id: z.string(),
  date: z.string(),
  action: Action,
  effect: z.enum(["open", "close"]),
  side: Side,
  type: OptionType,
  ticker: z.string(),
  strike: z.number().finite(),
  expiry: z.string(),
  contracts: z.number().int().positive(),
  price: z.number().finite(),
  value: z.number().finite(),
  fees: z.number().finite(),
  multiplier: z.number().positive(),
  remaining: z.number().int().nonnegative().optional(),
  status: z.enum(["closed", "expired"]).optional(),
});

export const Trade = z.object({
  id: z.string().min(1),
  ticker: z.string(),
  strategy: z.string(),
  status: TradeStatus,
  opened: z.string(),
  closed: z.string().optional(),
  expiration: z.string(),
  cost_basis: z.number().finite(),
  exit_price: z.number().finite().optional(),
  exit_value: z.number().finite().optional(),
  realized_pnl: z.number().finite().optional(),
  unrealized_pnl: z.number().finite().optional(),
  last_marked: z.string().optional(),
  closed_by: z.enum(["manual", "transactions", "expiration"]).optional(),
  roll_count: z.number().int().nonnegative().default(0),
  order_ids: z.array(z.number()).default([]),
  tags: z.array(z.string()).default([]),
  notes: z.string().default(""),
  legs: z.array(Leg),
});

export type LegT = z.infer<typeof Leg>;
export type TradeT = z.infer<typeof Trade>;
export type ActionT = z.infer<typeof Action>;
export type SideT = z.infer<typeof Side>;
export type OptionTypeT = z.infer<typeof OptionType>;
export type TradeStatusT = z.infer<typeof TradeStatus>;

// ─── Config ──────────────────────────────────────────────────────────────────

export const ConfigFile = z.object({
  directories: z.object({
    transactions: z.string().default("transactions"),
    strategies: z.string().default("strategies"),
    archive: z.string().default("archive"),
  }).default({}),
  positions_file: z.string().default("positions.csv"),
  default_multiplier: z.number().positive().default(100),
  combine_orders: z.boolean().default(false),
  database: z.object({
    provider: z.enum(["sqlite", "none"]).default("sqlite"),
    sqlite_path: z.string().default("data/trades.db"),
  }).default({}),
});

export type ConfigFileT = z.infer<typeof ConfigFile>;
