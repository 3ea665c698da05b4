import { SecHttpClient } from "./httpClient.js";
import { CompanyDirectoryEntry, CompanyTickersResponse } from "./types.js";

export const COMPANY_TICKERS_URL = "https://www.sec.gov/files/company_tickers.json";
const CACHE_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours

export const normalizeCik = (cik: string | number): string => {
  const numeric = String(cik).replace(/\D/g, "");
  return numeric.padStart(10, "0");
};

export const parseCompanyTickers = (raw: CompanyTickersResponse): CompanyDirectoryEntry[] => {
  const entries: CompanyDirectoryEntry[] = [];
  for (const row of Object.values(raw)) {
    if (row?.cik_str == null || !row.ticker || !row.title) continue;
    entries.push({
      cik: normalizeCik(row.cik_str),
      name: String(row.title),
      ticker: String(row.ticker).toUpperCase(),
    });
  }
  return entries;
};

export class CompanyDirectory {
  private client: SecHttpClient;
  private cache?: { fetchedAt: number; entries: CompanyDirectoryEntry[] };

  constructor(client: SecHttpClient) {
    this.client = client;
  }

  private async load(): Promise<CompanyDirectoryEntry[]> {
    if (this.cache && Date.now() - this.cache.fetchedAt < CACHE_TTL_MS) {
      return this.cache.entries;
    }

    const raw = await this.client.getJson<CompanyTickersResponse>(COMPANY_TICKERS_URL);
    const entries = parseCompanyTickers(raw);
    this.cache = { fetchedAt: Date.now(), entries };
    return entries;
  }

  async findByTicker(ticker: string): Promise<CompanyDirectoryEntry | null> {
    const entries = await this.load();
    const match = entries.find((entry) => entry.ticker === ticker.trim().toUpperCase());
    return match ?? null;
  }

  async findByCik(cik: string | number): Promise<CompanyDirectoryEntry | null> {
    const target = normalizeCik(cik);
    const entries = await this.load();
    const match = entries.find((entry) => entry.cik === target);
    return match ?? null;
  }

  /** Resolves a ticker to its 10-digit CIK, or throws when the SEC does not list it. */
  async requireCik(ticker: string): Promise<string> {
    const match = await this.findByTicker(ticker);
    if (!match) {
      throw new Error(`Ticker not found in directory: ${ticker}`);
    }
    return match.cik;
  }
}
