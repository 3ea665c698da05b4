import type { FactDocument } from "../../engine/facts/factTree.js";
import { type Logger, silentLogger } from "../../engine/logger.js";
import { CompanyDirectory } from "./companyDirectory.js";
import { companyFactsToDocument } from "./factDocuments.js";
import { SecHttpClient } from "./httpClient.js";
import { XbrlClient } from "./xbrlClient.js";
import { AnnualDocumentOptions, CompanyFacts } from "./types.js";

export interface EdgarClientOptions {
  userAgent: string;
  baseDelayMs?: number;
  maxRetries?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export class EdgarClient {
  private http: SecHttpClient;
  private directory: CompanyDirectory;
  private xbrl: XbrlClient;
  private logger: Logger;

  constructor(options: EdgarClientOptions) {
    this.http = new SecHttpClient({
      userAgent: options.userAgent,
      baseDelayMs: options.baseDelayMs,
      maxRetries: options.maxRetries,
      fetchImpl: options.fetchImpl,
      logger: options.logger,
    });
    this.directory = new CompanyDirectory(this.http);
    this.xbrl = new XbrlClient(this.http);
    this.logger = options.logger ?? silentLogger;
  }

  getCompanyDirectory(): CompanyDirectory {
    return this.directory;
  }

  async getCompanyFactsByTicker(ticker: string): Promise<CompanyFacts> {
    const cik = await this.directory.requireCik(ticker);
    return this.xbrl.getCompanyFacts(cik);
  }

  async getCompanyFactsByCik(cik: string | number): Promise<CompanyFacts> {
    return this.xbrl.getCompanyFacts(cik);
  }

  /**
   * One fact document per fiscal year, built from a single company-facts
   * download. Years with no matching filing are left out of the map.
   */
  async getAnnualDocuments(
    ticker: string,
    years: readonly number[],
    options: AnnualDocumentOptions = {},
  ): Promise<Map<number, FactDocument>> {
    const facts = await this.getCompanyFactsByTicker(ticker);
    const documents = new Map<number, FactDocument>();

    for (const year of years) {
      const document = companyFactsToDocument(facts, year, options);
      if (!Object.keys(document).length) {
        this.logger.warn(`No ${options.form ?? "10-K"} facts for ${ticker.toUpperCase()} fiscal year ${year}`);
        continue;
      }
      documents.set(year, document);
    }

    return documents;
  }
}
