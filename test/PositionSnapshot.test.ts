import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { rmSync } from "fs";
import { buildSnapshot, markOpenTrades, matchLegs, parsePositionsCsv } from "../src/Tools/PositionSnapshot";
import { TradeDB } from "../src/Tools/TradeDB";
import type { TradeStore } from "../src/Tools/TradeStore";
import { makeLeg, makeTrade, storeIn, tempHome } from "./helpers";

const POSITIONS = [
  "Symbol,Type,Quantity,Exp Date,DTE,Strike Price,Call/Put,Underlying,P/L Open,Delta,β Delta,Theta,IV Rank,PoP",
  "SPY   250328P00480000,OPTION,-1,3/28/25,14,480,PUT,512.34,45.50,0.12,0.10,1.50,22.5%,78%",
  "SPY   250328P00470000,OPTION,1,3/28/25,14,470,PUT,512.34,-20.00,-0.08,-0.07,-0.90,22.5%,78%",
  "SPY,EQUITY,100,,,,,512.34,10.00,100,100,0,,",
].join("\n");

const vertical = makeTrade({
  id: "spy_pv_2025-03-28",
  strategy: "Put Vertical",
  cost_basis: 70,
  legs: [makeLeg(), makeLeg({ action: "BUY_TO_OPEN", side: "long", strike: 470, value: -80 })],
});

describe("parsePositionsCsv", () => {
  it("reads option rows and skips stock", () => {
    const rows = parsePositionsCsv(POSITIONS);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      underlying: "SPY",
      type: "put",
      strike: 480,
      expiry: "2025-03-28",
      monthDay: "03-28",
      delta: 0.12,
      betaDelta: 0.1,
      theta: 1.5,
      ivRank: 22.5,
      pop: 78,
      underlyingPrice: 512.34,
      pnl: 45.5,
    });
  });

  it("accepts expirations without a year", () => {
    const [row] = parsePositionsCsv([
      "Symbol,Exp Date,Strike Price,Call/Put",
      "SPY,Mar 28,480,PUT",
    ].join("\n"));

    expect(row.expiry).toBeNull();
    expect(row.monthDay).toBe("03-28");
    expect(row.pnl).toBe(0);
    expect(row.ivRank).toBeNull();
  });

  it("rejects exports without the contract columns", () => {
    expect(() => parsePositionsCsv("Symbol,Strike Price\n")).toThrow("positions: missing required column(s): Call/Put, Exp Date");
  });

  it("rejects rows it cannot place", () => {
    expect(() => parsePositionsCsv("Symbol,Exp Date,Strike Price,Call/Put\nSPY,someday,480,PUT\n", "positions.csv")).toThrow(
      "positions.csv row 1: invalid strike or expiration",
    );
  });
});

describe("snapshots", () => {
  it("sums the matched legs into one mark", () => {
    const matched = matchLegs(vertical, parsePositionsCsv(POSITIONS));

    expect(matched.map(r => r.strike)).toEqual([480, 470]);
    expect(buildSnapshot(vertical, matched, "2025-03-14")).toEqual({
      trade_id: "spy_pv_2025-03-28",
      date: "2025-03-14",
      underlying_price: 512.34,
      delta: 0.04,
      beta_delta: 0.03,
      theta: 0.6,
      iv_rank: 22.5,
      pop: 78,
      pnl: 25.5,
      pct_max_profit: 36.43,
    });
  });

  it("does not match a different expiry", () => {
    const later = makeTrade({ legs: [makeLeg({ expiry: "2025-04-17" })] });
    expect(matchLegs(later, parsePositionsCsv(POSITIONS))).toEqual([]);
  });

  describe("markOpenTrades", () => {
    let home = "";
    let store: TradeStore;
    let db: TradeDB;

    beforeEach(async () => {
      home = tempHome();
      store = storeIn(home);
      db = await TradeDB.open(":memory:");
    });

    afterEach(() => {
      db.close();
      rmSync(home, { recursive: true, force: true });
    });

    it("stores marks and flags trades missing from the export", async () => {
      await store.save(vertical);
      await store.save(makeTrade({ id: "qqq_sp_2025-03-28", ticker: "QQQ" }));

      const result = await markOpenTrades(store, db, parsePositionsCsv(POSITIONS), "2025-03-14");

      expect(result.snapshots.map(s => s.trade_id)).toEqual(["spy_pv_2025-03-28"]);
      expect(result.unmatched).toEqual(["qqq_sp_2025-03-28"]);
      expect(await store.require("spy_pv_2025-03-28")).toMatchObject({ unrealized_pnl: 25.5, last_marked: "2025-03-14" });
      expect(db.getSnapshots("spy_pv_2025-03-28").map(s => s.pnl)).toEqual([25.5]);
    });
  });
});
