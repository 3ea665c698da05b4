import type { FactDocument, FactMapping, FactValue } from "../../engine/facts/factTree.js";
import { factsForTaxonomy } from "./xbrlClient.js";
import { AnnualDocumentOptions, CompanyFacts, FactUnit } from "./types.js";

/** Section name the candidate layout files facts under; it matches the resolver's `Statements` prefix. */
export const COMPANY_FACTS_SECTION = "StatementsOfCompanyFacts";

const matchesFiling = (unit: FactUnit, fiscalYear: number, form: string): unit is FactUnit & { val: number } =>
  unit.form === form && unit.fy === fiscalYear && typeof unit.val === "number" && Number.isFinite(unit.val);

// Latest period end first, then the most recent filing.
const compareLatest = (a: FactUnit, b: FactUnit): number => {
  const aEnd = Date.parse(a.end || "") || 0;
  const bEnd = Date.parse(b.end || "") || 0;
  if (aEnd !== bEnd) return bEnd - aEnd;
  const aFiled = Date.parse(a.filed || "") || 0;
  const bFiled = Date.parse(b.filed || "") || 0;
  return bFiled - aFiled;
};

const toCandidate = (unit: FactUnit & { val: number }, unitName: string): FactMapping => {
  const candidate: FactMapping = { val: unit.val, unit: unitName };
  if (unit.start) candidate.start = unit.start;
  if (unit.end) candidate.end = unit.end;
  if (unit.filed) candidate.filed = unit.filed;
  if (unit.fp) candidate.fp = unit.fp;
  return candidate;
};

/**
 * Turns SEC company facts into the fact document for one fiscal year.
 *
 * A 10-K for fiscal year N carries comparatives for earlier periods under the
 * same `fy`, so the flat layout keeps the fact with the latest period end
 * (then the newest filing) per concept. The candidate layout keeps every
 * matching fact for the period selector to choose from.
 */
export const companyFactsToDocument = (
  facts: CompanyFacts,
  fiscalYear: number,
  options: AnnualDocumentOptions = {},
): FactDocument => {
  const form = options.form ?? "10-K";
  const concepts = factsForTaxonomy(facts, options.taxonomy ?? "us-gaap");

  if (options.layout === "candidates") {
    const section: FactMapping = {};
    for (const [concept, item] of Object.entries(concepts)) {
      const candidates: FactValue[] = [];
      for (const [unitName, units] of Object.entries(item.units ?? {})) {
        for (const unit of units) {
          if (matchesFiling(unit, fiscalYear, form)) candidates.push(toCandidate(unit, unitName));
        }
      }
      if (candidates.length) section[concept] = candidates;
    }
    return Object.keys(section).length ? { [COMPANY_FACTS_SECTION]: section } : {};
  }

  const flat: FactDocument = {};
  for (const [concept, item] of Object.entries(concepts)) {
    const matches = Object.values(item.units ?? {})
      .flat()
      .filter((unit): unit is FactUnit & { val: number } => matchesFiling(unit, fiscalYear, form));
    if (!matches.length) continue;
    const [best] = [...matches].sort(compareLatest);
    flat[concept] = best.val;
  }
  return flat;
};
