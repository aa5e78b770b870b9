#!/usr/bin/env -S npx tsx
/**
 * OptionsTracker.ts — Options trade journal CLI
 *
 * Parses daily broker transaction exports into per-trade YAML records,
 * closes trades, marks open positions and reports performance.
 *
 * Usage:
 *   tsx src/Tools/OptionsTracker.ts parse transactions/2025-03-14.csv
 *   tsx src/Tools/OptionsTracker.ts track
 *   tsx src/Tools/OptionsTracker.ts close spy_ic_2025-03-28 0.45
 *   tsx src/Tools/OptionsTracker.ts analyze --from 2025-01-01 --to 2025-03-31
 *   tsx src/Tools/OptionsTracker.ts snapshot --file positions.csv
 */

import { parseArgs } from "util";
import { existsSync } from "fs";
import { basename, resolve } from "path";
import { pathToFileURL } from "url";
import { stringify as yamlStringify } from "yaml";
import { loadConfig, type TrackerConfig } from "./Config";
import {
  fmtPnl,
  printLedger,
  printReport,
  printSnapshots,
  printStrategyStats,
  printTrackResult,
  printTradeDetail,
  printTrades,
  printTransactions,
} from "./Display";
import { analyzePerformance } from "./PerformanceAnalyzer";
import { loadPositionsFile, markOpenTrades } from "./PositionSnapshot";
import { TradeStatus } from "./Schema";
import { isStrategyCode, STRATEGY_CODES } from "./StrategyDetector";
import { closeTrade } from "./TradeCloser";
import { TradeDB } from "./TradeDB";
import { TradeStore } from "./TradeStore";
import { trackTransactions } from "./TradeTracker";
import { listTransactionFiles, loadTransactionFile, parseDate, parseNumber, type Transaction } from "./TransactionParser";

// ─── Context ─────────────────────────────────────────────────────────────────

interface Context {
  config: TrackerConfig;
  db: TradeDB | null;
  store: TradeStore;
}

async function withContext<T>(home: string | undefined, fn: (ctx: Context) => Promise<T>): Promise<T> {
  const config = loadConfig(home);
  const db = config.database.provider === "sqlite" ? await TradeDB.open(config.database.sqlitePath) : null;
  const store = new TradeStore({ strategiesDir: config.strategiesDir, archiveDir: config.archiveDir }, db);
  try {
    return await fn({ config, db, store });
  } finally {
    db?.close();
  }
}

function requireDB(db: TradeDB | null): TradeDB {
  if (!db) throw new Error("Database disabled (database.provider is 'none' in config.yaml)");
  return db;
}

function resolveFiles(files: string[], config: TrackerConfig): string[] {
  const paths = files.length > 0 ? files.map(f => resolve(f)) : listTransactionFiles(config.transactionsDir);
  if (paths.length === 0) {
    throw new Error(`No transaction CSV files found in ${config.transactionsDir}`);
  }
  for (const p of paths) {
    if (!existsSync(p)) throw new Error(`Transaction file not found: ${p}`);
  }
  return paths;
}

function requireDate(value: string | undefined, flag: string): string | undefined {
  if (value === undefined) return undefined;
  const date = parseDate(value);
  if (!date) throw new Error(`Invalid ${flag} date "${value}" (expected YYYY-MM-DD)`);
  return date;
}

function requireRange(from: string | undefined, to: string | undefined): { from?: string; to?: string } {
  if ((from === undefined) !== (to === undefined)) {
    throw new Error("--from and --to must be given together");
  }
  return { from: requireDate(from, "--from"), to: requireDate(to, "--to") };
}

// ─── Commands ────────────────────────────────────────────────────────────────

export async function cmdParse(files: string[], home: string | undefined, outputFmt: string): Promise<void> {
  if (!["text", "json", "yaml"].includes(outputFmt)) {
    throw new Error(`Unknown output format "${outputFmt}" (text, json, yaml)`);
  }
  const config = loadConfig(home);

  for (const file of resolveFiles(files, config)) {
    const { transactions, ignored } = await loadTransactionFile(file, config.defaultMultiplier);
    console.log(`\n=== ${basename(file)}: ${transactions.length} transactions (${ignored} other rows ignored) ===\n`);
    if (outputFmt === "json") {
      console.log(JSON.stringify(transactions, null, 2));
    } else if (outputFmt === "yaml") {
      console.log(yamlStringify(transactions));
    } else {
      printTransactions(transactions);
    }
  }
}

export interface TrackCommandOptions {
  files: string[];
  home?: string;
  strategy?: string;
  combine: boolean;
  dryRun: boolean;
}

export async function cmdTrack(opts: TrackCommandOptions): Promise<void> {
  const strategy = opts.strategy;
  if (strategy !== undefined && !isStrategyCode(strategy)) {
    throw new Error(`Unknown strategy code "${strategy}" (one of: ${Object.values(STRATEGY_CODES).join(", ")})`);
  }

  await withContext(opts.home, async ({ config, store }) => {
    // Parse everything first: a malformed file aborts before anything is written
    const files = resolveFiles(opts.files, config);
    const transactions: Transaction[] = [];
    for (const file of files) {
      transactions.push(...(await loadTransactionFile(file, config.defaultMultiplier)).transactions);
    }

    const result = await trackTransactions(store, transactions, {
      strategy,
      combine: opts.combine || config.combineOrders,
      dryRun: opts.dryRun,
    });

    const header = opts.dryRun ? "DRY RUN" : "Tracked";
    console.log(`\n=== ${header}: ${transactions.length} transactions from ${files.length} file(s) ===\n`);
    printTrackResult(result, opts.dryRun);
    if (opts.dryRun) {
      for (const trade of result.trades) printTradeDetail(trade);
    }
  });
}

export interface CloseCommandOptions {
  home?: string;
  pnl?: string;
  date?: string;
  note?: string;
}

export async function cmdClose(id: string, priceText: string, opts: CloseCommandOptions): Promise<void> {
  const exitPrice = parseNumber(priceText);
  if (exitPrice === null) throw new Error(`Invalid exit price "${priceText}"`);

  let pnl: number | undefined;
  if (opts.pnl !== undefined) {
    const parsed = parseNumber(opts.pnl);
    if (parsed === null) throw new Error(`Invalid --pnl "${opts.pnl}"`);
    pnl = parsed;
  }

  await withContext(opts.home, async ({ config, store }) => {
    const trade = await closeTrade(store, id, exitPrice, {
      date: requireDate(opts.date, "--date"),
      pnl,
      note: opts.note,
      defaultMultiplier: config.defaultMultiplier,
    });

    console.log(`\nClosed: ${trade.id} (${trade.ticker} ${trade.strategy})`);
    console.log(`  Exit price:    ${exitPrice}`);
    console.log(`  Exit value:    $${(trade.exit_value ?? 0).toFixed(2)}`);
    console.log(`  Realized P&L:  ${fmtPnl(trade.realized_pnl ?? 0)}`);
  });
}

export interface AnalyzeCommandOptions {
  home?: string;
  from?: string;
  to?: string;
  ticker?: string;
  strategy?: string;
  tag?: string;
}

export async function cmdAnalyze(opts: AnalyzeCommandOptions): Promise<void> {
  const range = requireRange(opts.from, opts.to);

  await withContext(opts.home, async ({ store }) => {
    const trades = await store.list();
    const report = analyzePerformance(trades, {
      ...range,
      ticker: opts.ticker,
      strategy: opts.strategy,
      tag: opts.tag,
    });

    const label = range.from && range.to ? `${range.from} to ${range.to}` : "all trades";
    printReport(report, label);
  });
}

export interface ListCommandOptions {
  home?: string;
  status: string;
  ticker?: string;
  strategy?: string;
}

export async function cmdList(opts: ListCommandOptions): Promise<void> {
  let status: "open" | "closed" | undefined;
  if (opts.status !== "all") {
    const parsed = TradeStatus.safeParse(opts.status);
    if (!parsed.success) throw new Error(`Invalid --status "${opts.status}" (open, closed, all)`);
    status = parsed.data;
  }

  await withContext(opts.home, async ({ store }) => {
    const trades = (await store.list(status)).filter(t =>
      (!opts.ticker || t.ticker === opts.ticker.toUpperCase()) &&
      (!opts.strategy || t.strategy.toLowerCase() === opts.strategy.toLowerCase()),
    );

    console.log(`\n=== Trades (${opts.status}) ===\n`);
    if (trades.length === 0) {
      console.log("  No trades found.");
      return;
    }
    printTrades(trades);
  });
}

export async function cmdShow(id: string, home: string | undefined): Promise<void> {
  await withContext(home, async ({ store }) => {
    printTradeDetail(await store.require(id));
  });
}

export async function cmdSnapshot(home: string | undefined, file: string | undefined, date: string | undefined): Promise<void> {
  const day = requireDate(date, "--date") ?? new Date().toISOString().slice(0, 10);

  await withContext(home, async ({ config, db, store }) => {
    const positionsFile = file ? resolve(file) : config.positionsFile;
    if (!existsSync(positionsFile)) {
      throw new Error(`Positions file not found: ${positionsFile}`);
    }

    const positions = await loadPositionsFile(positionsFile);
    const result = await markOpenTrades(store, db, positions, day);

    console.log(`\n=== Snapshot: ${day} ===\n`);
    for (const s of result.snapshots) {
      const pct = s.pct_max_profit === null ? "" : `  (${s.pct_max_profit.toFixed(1)}% of max)`;
      console.log(`  Logged ${s.trade_id.padEnd(30)} ${fmtPnl(s.pnl)}${pct}`);
    }
    for (const id of result.unmatched) {
      console.log(`[WARN] No match for trade ${id}`);
    }
  });
}

export async function cmdHistory(id: string, home: string | undefined): Promise<void> {
  await withContext(home, async ({ db, store }) => {
    const database = requireDB(db);
    await store.require(id);

    const snapshots = database.getSnapshots(id);
    console.log(`\n=== History: ${id} ===\n`);
    if (snapshots.length === 0) {
      console.log("  No snapshots recorded. Run 'snapshot' with a positions export first.");
      return;
    }
    printSnapshots(snapshots);
  });
}

export async function cmdLedger(home: string | undefined, from: string | undefined, to: string | undefined, byStrategy: boolean): Promise<void> {
  const range = requireRange(from, to);

  await withContext(home, async ({ db }) => {
    const database = requireDB(db);
    const period = range.from && range.to ? `${range.from} to ${range.to}` : "all time";

    if (byStrategy) {
      console.log(`\n=== Closed Trades by Strategy: ${period} ===\n`);
      printStrategyStats(database.getStatsByStrategy(range.from, range.to));
      return;
    }

    console.log(`\n=== Closed Trades: ${period} ===\n`);
    printLedger(database.getClosedTrades(range.from, range.to));
  });
}

export async function cmdMigrate(home: string | undefined): Promise<void> {
  await withContext(home, async ({ config, db, store }) => {
    const database = requireDB(db);
    const trades = await store.list();
    database.upsertTrades(trades);

    const counts = database.getCounts();
    console.log(`\n=== Indexed ${trades.length} trade files ===\n`);
    console.log(`  Open:       ${counts.open}`);
    console.log(`  Closed:     ${counts.closed}`);
    console.log(`  Snapshots:  ${counts.snapshots}`);
    console.log(`  Database:   ${config.database.sqlitePath}`);
  });
}

// ─── CLI Entry Point ─────────────────────────────────────────────────────────

function printUsage() {
  console.log(`
OptionsTracker — Track options trades from broker transaction exports

Usage:
  tsx src/Tools/OptionsTracker.ts <command> [options]

Commands:
  parse      Parse transaction CSVs and print the option transactions
  track      Apply transaction CSVs to the trade records
  close      Close a trade at an exit price
  analyze    Performance summary (win rate, P&L, breakdowns)
  list       List trades
  show       Show one trade with its legs
  snapshot   Mark open trades from a positions export
  history    Daily snapshots of a trade
  ledger     Closed trades from the database
  migrate    Re-index every trade file into the database

Every command accepts --home <dir> (default: $OPTIONS_TRACKER_HOME or the
current directory).

Options for 'parse':
  [files...]                  CSV files (default: every CSV in transactions/)
  -o, --output <fmt>          text (default), json, yaml

Options for 'track':
  [files...]                  CSV files (default: every CSV in transactions/)
  --strategy <code>           Strategy code for new trade ids (ic, pv, sp, ...)
  --combine                   Group fills by date + underlying, not by order
  --dry-run                   Show the result without writing

Options for 'close':
  <trade-id> <exit-price>     Exit price per share for the whole position
  --pnl <amount>              Realized P&L to record instead (use --pnl=-12.5 for losses)
  --date <YYYY-MM-DD>         Close date (defaults to today)
  --note <text>               Appended to the trade notes

Options for 'analyze':
  --from <date> --to <date>   Closed-date range
  --ticker <TICKER>           Only this underlying
  --strategy <name>           Only this strategy ("Iron Condor")
  --tag <tag>                 Only trades with this tag

Options for 'list':
  --status <open|closed|all>  Default: all
  --ticker <TICKER>
  --strategy <name>

Options for 'snapshot':
  --file <path>               Positions CSV (default from config.yaml)
  --date <YYYY-MM-DD>         Snapshot date (defaults to today)

Options for 'ledger':
  --from <date> --to <date>   Closed-date range
  --by-strategy               Aggregate per strategy

Examples:
  tsx src/Tools/OptionsTracker.ts track transactions/2025-03-14.csv --dry-run
  tsx src/Tools/OptionsTracker.ts track --strategy ic transactions/2025-03-14.csv
  tsx src/Tools/OptionsTracker.ts close spy_ic_2025-03-28 1.45
  tsx src/Tools/OptionsTracker.ts analyze --tag rolled
  tsx src/Tools/OptionsTracker.ts history spy_ic_2025-03-28
`);
}

const HOME_OPTION = { home: { type: "string" } } as const;

export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return;
  }

  const restArgs = args.slice(1);

  switch (command) {
    case "parse": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          output: { type: "string", short: "o", default: "text" },
        },
        allowPositionals: true,
      });
      await cmdParse(positionals, values.home, values.output);
      break;
    }

    case "track": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          strategy: { type: "string" },
          combine: { type: "boolean", default: false },
          "dry-run": { type: "boolean", default: false },
        },
        allowPositionals: true,
      });
      await cmdTrack({
        files: positionals,
        home: values.home,
        strategy: values.strategy,
        combine: values.combine,
        dryRun: values["dry-run"],
      });
      break;
    }

    case "close": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          pnl: { type: "string" },
          date: { type: "string" },
          note: { type: "string" },
        },
        allowPositionals: true,
      });
      const [id, price] = positionals;
      if (!id || price === undefined) {
        throw new Error("Usage: close <trade-id> <exit-price>");
      }
      await cmdClose(id, price, values);
      break;
    }

    case "analyze": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          from: { type: "string" },
          to: { type: "string" },
          ticker: { type: "string" },
          strategy: { type: "string" },
          tag: { type: "string" },
        },
        allowPositionals: false,
      });
      await cmdAnalyze(values);
      break;
    }

    case "list": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          status: { type: "string", default: "all" },
          ticker: { type: "string" },
          strategy: { type: "string" },
        },
        allowPositionals: false,
      });
      await cmdList(values);
      break;
    }

    case "show":
    case "history": {
      const { values, positionals } = parseArgs({
        args: restArgs,
        options: { ...HOME_OPTION },
        allowPositionals: true,
      });
      const id = positionals[0];
      if (!id) throw new Error(`Usage: ${command} <trade-id>`);
      if (command === "show") await cmdShow(id, values.home);
      else await cmdHistory(id, values.home);
      break;
    }

    case "snapshot": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          file: { type: "string" },
          date: { type: "string" },
        },
        allowPositionals: false,
      });
      await cmdSnapshot(values.home, values.file, values.date);
      break;
    }

    case "ledger": {
      const { values } = parseArgs({
        args: restArgs,
        options: {
          ...HOME_OPTION,
          from: { type: "string" },
          to: { type: "string" },
          "by-strategy": { type: "boolean", default: false },
        },
        allowPositionals: false,
      });
      await cmdLedger(values.home, values.from, values.to, values["by-strategy"]);
      break;
    }

    case "migrate": {
      const { values } = parseArgs({
        args: restArgs,
        options: { ...HOME_OPTION },
        allowPositionals: false,
      });
      await cmdMigrate(values.home);
      break;
    }

    default:
      throw new Error(`Unknown command: ${command} (run with --help for usage)`);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(resolve(script)).href;
}

if (isEntryPoint()) {
  try {
    await main();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
