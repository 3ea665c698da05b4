import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import path from "node:path";

import type { FactDocument } from "../../engine/facts/factTree.js";
import { isFactMapping } from "../../engine/facts/factTree.js";
import { type Logger, silentLogger } from "../../engine/logger.js";

const FILE_PATTERN = /^([A-Za-z0-9.-]+)_(\d{4})(?:_xbrl)?\.json$/;

/**
 * Fact documents on disk, one JSON file per ticker and fiscal year
 * (`AAPL_2023.json`, also `aapl_2023.json` or `AAPL_2023_xbrl.json`).
 */
export class DocumentStore {
  private readonly dir: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger = silentLogger) {
    this.dir = dir;
    this.logger = logger;
  }

  fileNameFor(ticker: string, year: number): string {
    return `${ticker.toUpperCase()}_${year}.json`;
  }

  save(ticker: string, year: number, document: FactDocument): string {
    mkdirSync(this.dir, { recursive: true });
    const file = path.join(this.dir, this.fileNameFor(ticker, year));
    writeFileSync(file, JSON.stringify(document, null, 2), "utf8");
    this.logger.info(`Saved ${Object.keys(document).length} facts to ${file}`);
    return file;
  }

  private candidatePaths(ticker: string, year: number): string[] {
    const names = [ticker, ticker.toUpperCase(), ticker.toLowerCase()].flatMap((t) => [`${t}_${year}.json`, `${t}_${year}_xbrl.json`]);
    return [...new Set(names)].map((name) => path.join(this.dir, name));
  }

  private findFile(ticker: string, year: number): string | null {
    for (const file of this.candidatePaths(ticker, year)) {
      if (existsSync(file)) return file;
    }
    if (!existsSync(this.dir)) return null;
    const upper = ticker.toUpperCase();
    const loose = readdirSync(this.dir).find(
      (name) => name.endsWith(".json") && name.toUpperCase().includes(upper) && name.includes(String(year)),
    );
    return loose ? path.join(this.dir, loose) : null;
  }

  load(ticker: string, year: number): FactDocument {
    const file = this.findFile(ticker, year);
    if (!file) {
      throw new Error(`No fact document for ${ticker} ${year} in ${this.dir}`);
    }
    this.logger.debug(`Loading ${file}`);
    const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
    if (!isFactMapping(parsed)) {
      throw new Error(`${file} does not hold a JSON object`);
    }
    return parsed;
  }

  /** Tickers (upper case) mapped to the fiscal years stored for them, ascending. */
  listAvailable(): Map<string, number[]> {
    const available = new Map<string, number[]>();
    if (!existsSync(this.dir)) return available;

    for (const name of readdirSync(this.dir)) {
      const match = FILE_PATTERN.exec(name);
      if (!match) continue;
      const ticker = match[1].toUpperCase();
      const years = available.get(ticker) ?? [];
      const year = Number(match[2]);
      if (!years.includes(year)) years.push(year);
      available.set(ticker, years);
    }

    for (const years of available.values()) years.sort((a, b) => a - b);
    return available;
  }

  /** Loads every requested year that is on disk; missing or unreadable years are logged and skipped. */
  loadMany(ticker: string, years: readonly number[]): Map<number, FactDocument> {
    const documents = new Map<number, FactDocument>();
    for (const year of years) {
      try {
        documents.set(year, this.load(ticker, year));
      } catch (err) {
        this.logger.warn(err instanceof Error ? err.message : String(err));
      }
    }
    return documents;
  }
}
