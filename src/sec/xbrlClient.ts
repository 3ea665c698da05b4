import { normalizeCik } from "./companyDirectory.js";
import { SecHttpClient } from "./httpClient.js";
import { CompanyFactItem, CompanyFacts } from "./types.js";

const XBRL_BASE = "https://data.sec.gov/api/xbrl/";

export class XbrlClient {
  private client: SecHttpClient;

  constructor(client: SecHttpClient) {
    this.client = client;
  }

  async getCompanyFacts(cik: string | number): Promise<CompanyFacts> {
    const url = `${XBRL_BASE}companyfacts/CIK${normalizeCik(cik)}.json`;
    return this.client.getJson<CompanyFacts>(url);
  }
}

export const factsForTaxonomy = (facts: CompanyFacts, taxonomy: string): Record<string, CompanyFactItem> =>
  facts.facts?.[taxonomy] ?? {};
