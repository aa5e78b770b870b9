import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, rmSync } from "fs";
import { join } from "path";
import { closeTrade } from "../src/Tools/TradeCloser";
import type { TradeStore } from "../src/Tools/TradeStore";
import { trackTransactions } from "../src/Tools/TradeTracker";
import { parseTransactionsCsv } from "../src/Tools/TransactionParser";
import { csv, fillRow, makeLeg, makeTrade, storeIn, tempHome } from "./helpers";

const options = { date: "2025-03-25", defaultMultiplier: 100 };

describe("closeTrade", () => {
  let home = "";
  let store: TradeStore;

  beforeEach(() => {
    home = tempHome();
    store = storeIn(home);
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("closes a tracked trade at the given exit price", async () => {
    const { transactions } = parseTransactionsCsv(csv([
      fillRow({ date: "2025-03-14", action: "Sell to Open", exp: "2025-03-28", strike: 480, cp: "PUT", avg: 150 }),
    ]));
    await trackTransactions(store, transactions, { strategy: "ic" });

    const trade = await closeTrade(store, "spy_ic_2025-03-28", 145.25, options);

    expect(trade).toMatchObject({
      status: "closed",
      closed: "2025-03-25",
      closed_by: "manual",
      exit_price: 145.25,
      exit_value: 14525,
      realized_pnl: -14375,
      notes: "Closed on 2025-03-25 at 145.25",
    });
    expect(trade.legs[0]).toMatchObject({ remaining: 0, status: "closed" });
    expect(await store.list("open")).toEqual([]);
    expect(await store.list("closed")).toEqual([trade]);
    expect(existsSync(join(home, "archive", "spy_ic_2025-03-28.yaml"))).toBe(true);
  });

  it("sets the exit price only once", async () => {
    await store.save(makeTrade());
    await closeTrade(store, "spy_sp_2025-03-28", 0.5, options);

    await expect(closeTrade(store, "spy_sp_2025-03-28", 0.1, options)).rejects.toThrow("Trade spy_sp_2025-03-28 is already closed");
    expect((await store.require("spy_sp_2025-03-28")).exit_price).toBe(0.5);
  });

  it("keeps the credit less the cost to close", async () => {
    await store.save(makeTrade({
      cost_basis: 140.6,
      legs: [
        makeLeg({ contracts: 2, remaining: 2, value: 300 }),
        makeLeg({ action: "BUY_TO_OPEN", side: "long", strike: 470, contracts: 2, remaining: 2, value: -160 }),
      ],
    }));

    const trade = await closeTrade(store, "spy_sp_2025-03-28", 0.3, options);

    expect(trade.exit_value).toBe(60);
    expect(trade.realized_pnl).toBe(80.6);
  });

  it("adds the proceeds to a debit trade", async () => {
    await store.save(makeTrade({
      id: "spy_lc_2025-03-28",
      strategy: "Long Call",
      cost_basis: -250,
      legs: [makeLeg({ action: "BUY_TO_OPEN", side: "long", type: "call", strike: 540, value: -250 })],
    }));

    const trade = await closeTrade(store, "spy_lc_2025-03-28", 4, options);

    expect(trade.exit_value).toBe(400);
    expect(trade.realized_pnl).toBe(150);
  });

  it("charges the exit to a short put after a costly partial buy-back", async () => {
    const { transactions } = parseTransactionsCsv(csv([
      fillRow({ date: "2025-03-14", action: "Sell to Open", exp: "2025-03-28", strike: 480, cp: "PUT", avg: 150, qty: 2, order: 1001 }),
      fillRow({ date: "2025-03-18", action: "Buy to Close", exp: "2025-03-28", strike: 480, cp: "PUT", avg: -400, order: 1002 }),
    ]));
    await trackTransactions(store, transactions);
    expect((await store.require("spy_sp_2025-03-28")).cost_basis).toBe(-100);

    const trade = await closeTrade(store, "spy_sp_2025-03-28", 4, options);

    expect(trade.exit_value).toBe(400);
    expect(trade.realized_pnl).toBe(-500);
  });

  it("closes a rolled trade against the legs the roll opened", async () => {
    const { transactions } = parseTransactionsCsv(csv([
      fillRow({ date: "2025-03-14", action: "Sell to Open", exp: "2025-03-28", strike: 480, cp: "PUT", avg: 150, order: 2001 }),
      fillRow({ date: "2025-03-21", action: "Buy to Close", exp: "2025-03-28", strike: 480, cp: "PUT", avg: -60, order: 2002 }),
      fillRow({ date: "2025-03-21", action: "Sell to Open", exp: "2025-04-04", strike: 475, cp: "PUT", avg: 140, order: 2002 }),
    ]));
    await trackTransactions(store, transactions);

    const trade = await closeTrade(store, "spy_sp_2025-03-28", 0.5, options);

    expect(trade.roll_count).toBe(1);
    expect(trade.exit_value).toBe(50);
    expect(trade.realized_pnl).toBe(180);
  });

  it("records a broker-reported P&L and note when given", async () => {
    await store.save(makeTrade({ notes: "Opened into earnings" }));

    const trade = await closeTrade(store, "spy_sp_2025-03-28", 0.5, { ...options, pnl: 97.35, note: "took profit" });

    expect(trade.realized_pnl).toBe(97.35);
    expect(trade.notes).toBe("Opened into earnings\nClosed on 2025-03-25 at 0.5: took profit");
  });

  it("drops the unrealized mark", async () => {
    await store.save(makeTrade({ unrealized_pnl: 40, last_marked: "2025-03-24" }));

    const trade = await closeTrade(store, "spy_sp_2025-03-28", 0.5, options);

    expect(trade.unrealized_pnl).toBeUndefined();
    expect(trade.last_marked).toBe("2025-03-24");
  });

  it("reports unknown trades and bad prices", async () => {
    await expect(closeTrade(store, "qqq_ic_2025-03-28", 1, options)).rejects.toThrow("Trade qqq_ic_2025-03-28 not found");
    await expect(closeTrade(store, "spy_sp_2025-03-28", -1, options)).rejects.toThrow("Invalid exit price: -1");
    await expect(closeTrade(store, "spy_sp_2025-03-28", Number.NaN, options)).rejects.toThrow("Invalid exit price: NaN");
  });
});
