/**
 * TradeStore.ts — YAML trade repository
 *
 * One file per trade, named after its identifier. Open trades live in the
 * strategies directory, closed ones in the archive; saving a trade writes it
 * where its status belongs and drops the copy from the other directory.
 */

import { existsSync, mkdirSync, readdirSync } from "fs";
import { readFile, unlink, writeFile } from "fs/promises";
import { join } from "path";
import { stringify as yamlStringify, parse as yamlParse } from "yaml";
import { Trade, type TradeStatusT, type TradeT } from "./Schema";
import type { TradeDB } from "./TradeDB";

export interface TradeStoreDirs {
  strategiesDir: string;
  archiveDir: string;
}

export class TradeStore {
  constructor(
    private readonly dirs: TradeStoreDirs,
    private readonly db: TradeDB | null = null,
  ) {}

  async list(status?: TradeStatusT): Promise<TradeT[]> {
    const sources: Array<[TradeStatusT, string]> = [
      ["open", this.dirs.strategiesDir],
      ["closed", this.dirs.archiveDir],
    ];

    const trades: TradeT[] = [];
    for (const [dirStatus, dir] of sources) {
      if (status && status !== dirStatus) continue;
      for (const file of yamlFiles(dir)) {
        trades.push(await this.load(join(dir, file)));
      }
    }
    return trades.sort((a, b) => a.id.localeCompare(b.id));
  }

  async get(id: string): Promise<TradeT | null> {
    for (const dir of [this.dirs.strategiesDir, this.dirs.archiveDir]) {
      const path = join(dir, fileName(id));
      if (existsSync(path)) return this.load(path);
    }
    return null;
  }

  async require(id: string): Promise<TradeT> {
    const trade = await this.get(id);
    if (!trade) throw new Error(`Trade ${id} not found`);
    return trade;
  }

  async save(trade: TradeT): Promise<string> {
    const target = trade.status === "open" ? this.dirs.strategiesDir : this.dirs.archiveDir;
    const stale = trade.status === "open" ? this.dirs.archiveDir : this.dirs.strategiesDir;

    mkdirSync(target, { recursive: true });
    const path = join(target, fileName(trade.id));
    await writeFile(path, yamlStringify(toRecord(trade)));

    const stalePath = join(stale, fileName(trade.id));
    if (existsSync(stalePath)) await unlink(stalePath);

    this.db?.upsertTrade(trade);
    return path;
  }

  private async load(path: string): Promise<TradeT> {
    const content = await readFile(path, "utf8");
    const parsed = Trade.safeParse(yamlParse(content));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Invalid trade file ${path}: ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    return parsed.data;
  }
}

export function fileName(id: string): string {
  return `${id}.yaml`;
}

function yamlFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir).filter(f => f.endsWith(".yaml")).sort();
}

/** Stable key order, optional fields left out rather than written as null. */
function toRecord(trade: TradeT): Record<string, unknown> {
  const { legs, ...head } = trade;
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(head)) {
    if (value !== undefined) record[key] = value;
  }
  record.legs = legs.map(leg => {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(leg)) {
      if (value !== undefined) out[key] = value;
    }
    return out;
  });
  return record;
}
