/** `https://www.sec.gov/files/company_tickers.json`: an object keyed by row index. */
export type CompanyTickersResponse = Record<
  string,
  {
    cik_str: number | string;
    ticker: string;
    title: string;
  }
>;

export interface CompanyDirectoryEntry {
  cik: string;
  name: string;
  ticker: string;
}

export interface CompanyFacts {
  cik: number | string;
  entityName?: string;
  facts?: Record<string, Record<string, CompanyFactItem>>;
  [key: string]: unknown;
}

export interface CompanyFactItem {
  label?: string;
  description?: string;
  units?: Record<string, FactUnit[]>;
  [key: string]: unknown;
}

export interface FactUnit {
  start?: string;
  end?: string;
  val?: number;
  accn?: string;
  fy?: number;
  fp?: string;
  form?: string;
  filed?: string;
  frame?: string;
  [key: string]: unknown;
}

export interface AnnualDocumentOptions {
  /** Filing form to keep. Defaults to "10-K". */
  form?: string;
  /** XBRL taxonomy to read. Defaults to "us-gaap". */
  taxonomy?: string;
  /**
   * "flat": concept → single value, one pick per concept.
   * "candidates": concept → every matching fact, left for period selection.
   */
  layout?: "flat" | "candidates";
}
