import { existsSync, readFileSync } from "fs";
import { isAbsolute, join, resolve } from "path";
import { parse as yamlParse } from "yaml";
import { ConfigFile } from "./Schema";

export interface TrackerConfig {
  home: string;
  transactionsDir: string;
  strategiesDir: string;
  archiveDir: string;
  positionsFile: string;
  defaultMultiplier: number;
  combineOrders: boolean;
  database: { provider: "sqlite" | "none"; sqlitePath: string };
}

export const CONFIG_FILE = "config.yaml";
export const HOME_ENV = "OPTIONS_TRACKER_HOME";

export function resolveHome(override?: string): string {
  return resolve(override || process.env[HOME_ENV] || process.cwd());
}

/**
 * Load config.yaml from the tracker home. Every key is optional; paths are
 * resolved against the home directory unless absolute.
 */
export function loadConfig(homeOverride?: string): TrackerConfig {
  const home = resolveHome(homeOverride);
  const configPath = join(home, CONFIG_FILE);

  let raw: unknown = {};
  if (existsSync(configPath)) {
    raw = yamlParse(readFileSync(configPath, "utf8")) ?? {};
  }

  const parsed = ConfigFile.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${CONFIG_FILE}: ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  const cfg = parsed.data;
  const at = (p: string) => (isAbsolute(p) ? p : join(home, p));

  return {
    home,
    transactionsDir: at(cfg.directories.transactions),
    strategiesDir: at(cfg.directories.strategies),
    archiveDir: at(cfg.directories.archive),
    positionsFile: at(cfg.positions_file),
    defaultMultiplier: cfg.default_multiplier,
    combineOrders: cfg.combine_orders,
    database: {
      provider: cfg.database.provider,
      sqlitePath: at(cfg.database.sqlite_path),
    },
  };
}
