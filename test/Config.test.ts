import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { rmSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { HOME_ENV, loadConfig, resolveHome } from "../src/Tools/Config";
import { tempHome } from "./helpers";

describe("loadConfig", () => {
  let home = "";
  const savedEnv = process.env[HOME_ENV];

  beforeEach(() => {
    home = tempHome();
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
    if (savedEnv === undefined) delete process.env[HOME_ENV];
    else process.env[HOME_ENV] = savedEnv;
  });

  it("falls back to the default layout without a config file", () => {
    expect(loadConfig(home)).toEqual({
      home: resolve(home),
      transactionsDir: join(home, "transactions"),
      strategiesDir: join(home, "strategies"),
      archiveDir: join(home, "archive"),
      positionsFile: join(home, "positions.csv"),
      defaultMultiplier: 100,
      combineOrders: false,
      database: { provider: "sqlite", sqlitePath: join(home, "data", "trades.db") },
    });
  });

  it("reads overrides from config.yaml", () => {
    writeFileSync(join(home, "config.yaml"), [
      "directories:",
      "  strategies: open",
      "  archive: /srv/journal/archive",
      "combine_orders: true",
      "database:",
      "  provider: none",
    ].join("\n"));

    const config = loadConfig(home);

    expect(config.strategiesDir).toBe(join(home, "open"));
    expect(config.archiveDir).toBe("/srv/journal/archive");
    expect(config.transactionsDir).toBe(join(home, "transactions"));
    expect(config.combineOrders).toBe(true);
    expect(config.database.provider).toBe("none");
  });

  it("rejects invalid settings with the offending key", () => {
    writeFileSync(join(home, "config.yaml"), "default_multiplier: -5\n");

    expect(() => loadConfig(home)).toThrow("Invalid config.yaml: default_multiplier: Number must be greater than 0");
  });

  it("takes the home directory from the environment", () => {
    process.env[HOME_ENV] = home;

    expect(resolveHome()).toBe(resolve(home));
    expect(resolveHome("elsewhere")).toBe(resolve("elsewhere"));
  });
});
