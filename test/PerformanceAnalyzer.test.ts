import { describe, expect, it } from "vitest";
import { analyzePerformance } from "../src/Tools/PerformanceAnalyzer";
import { makeTrade } from "./helpers";

const trades = [
  makeTrade({
    id: "spy_ic_2025-03-21",
    strategy: "Iron Condor",
    status: "closed",
    opened: "2025-03-01",
    closed: "2025-03-11",
    realized_pnl: 100,
    tags: ["rolled"],
  }),
  makeTrade({
    id: "qqq_ic_2025-03-21",
    ticker: "QQQ",
    strategy: "Iron Condor",
    status: "closed",
    opened: "2025-03-05",
    closed: "2025-03-09",
    realized_pnl: -40,
  }),
  makeTrade({
    id: "spy_sp_2025-04-17",
    status: "closed",
    opened: "2025-04-01",
    closed: "2025-04-04",
    realized_pnl: 60,
  }),
  makeTrade({
    id: "spy_strangle_2025-05-16",
    strategy: "Strangle",
    cost_basis: 200,
    unrealized_pnl: 35.5,
  }),
];

describe("analyzePerformance", () => {
  it("summarizes closed trades", () => {
    const r = analyzePerformance(trades);

    expect(r).toMatchObject({
      total: 4,
      open: 1,
      closed: 3,
      winners: 2,
      losers: 1,
      breakeven: 0,
      totalPnl: 120,
      avgPnl: 40,
      avgWin: 80,
      avgLoss: -40,
      profitFactor: 4,
      avgHoldDays: 5.7,
      openCostBasis: 200,
      unrealizedPnl: 35.5,
      best: { id: "spy_ic_2025-03-21", pnl: 100 },
      worst: { id: "qqq_ic_2025-03-21", pnl: -40 },
    });
    expect(r.winRate).toBeCloseTo(2 / 3, 10);
  });

  it("breaks results down by strategy, ticker and tag", () => {
    const r = analyzePerformance(trades);

    expect(r.byStrategy).toEqual([
      { key: "Iron Condor", trades: 2, totalPnl: 60, avgPnl: 30, winRate: 0.5 },
      { key: "Short Put", trades: 1, totalPnl: 60, avgPnl: 60, winRate: 1 },
    ]);
    expect(r.byTicker).toEqual([
      { key: "SPY", trades: 2, totalPnl: 160, avgPnl: 80, winRate: 1 },
      { key: "QQQ", trades: 1, totalPnl: -40, avgPnl: -40, winRate: 0 },
    ]);
    expect(r.byTag).toEqual([{ key: "rolled", trades: 1, totalPnl: 100, avgPnl: 100, winRate: 1 }]);
  });

  it("selects closed trades by close date for a range", () => {
    const r = analyzePerformance(trades, { from: "2025-03-01", to: "2025-03-31" });

    expect(r.total).toBe(2);
    expect(r.open).toBe(0);
    expect(r.totalPnl).toBe(60);
    expect(r.winRate).toBe(0.5);
  });

  it("filters by ticker, strategy and tag", () => {
    expect(analyzePerformance(trades, { ticker: "spy" }).total).toBe(3);
    expect(analyzePerformance(trades, { strategy: "iron condor" }).closed).toBe(2);
    expect(analyzePerformance(trades, { tag: "rolled" }).totalPnl).toBe(100);
  });

  it("totals exactly the sum of the closed trades", () => {
    const r = analyzePerformance(trades);
    const sum = trades.filter(t => t.status === "closed").reduce((s, t) => s + (t.realized_pnl ?? 0), 0);

    expect(r.totalPnl).toBe(sum);
    expect(r.winRate).toBeGreaterThanOrEqual(0);
    expect(r.winRate).toBeLessThanOrEqual(1);
  });

  it("reports an empty book without dividing by zero", () => {
    const r = analyzePerformance([]);

    expect(r).toMatchObject({
      total: 0,
      winRate: 0,
      totalPnl: 0,
      avgPnl: 0,
      profitFactor: null,
      avgHoldDays: 0,
      best: null,
      worst: null,
      byStrategy: [],
    });
  });

  it("leaves the profit factor open when nothing lost", () => {
    expect(analyzePerformance(trades, { ticker: "SPY" }).profitFactor).toBeNull();
  });
});
