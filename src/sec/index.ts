export { SecHttpClient, SecHttpError, type SecHttpClientOptions } from "./httpClient.js";
export { CompanyDirectory, normalizeCik, parseCompanyTickers, COMPANY_TICKERS_URL } from "./companyDirectory.js";
export { XbrlClient, factsForTaxonomy } from "./xbrlClient.js";
export { companyFactsToDocument, COMPANY_FACTS_SECTION } from "./factDocuments.js";
export { EdgarClient, type EdgarClientOptions } from "./edgarClient.js";
export type {
  AnnualDocumentOptions,
  CompanyDirectoryEntry,
  CompanyTickersResponse,
  CompanyFacts,
  CompanyFactItem,
  FactUnit,
} from "./types.js";
