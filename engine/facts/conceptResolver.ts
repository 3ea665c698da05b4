import { type FactDocument, type FactMapping, type FactValue, classifyNode, findInTree } from "./factTree.js";
import { normalizeValue } from "./normalizeValue.js";
import { selectAnnualValue } from "./periodSelector.js";

export const DEFAULT_FALLBACK_PREFIXES: readonly string[] = ["Statements", "Revenue", "EarningsPerShare", "CashFlow"];

export type ResolveOptions = {
  prioritySections?: readonly string[];
  fallbackSectionPrefixes?: readonly string[];
};

const PERIOD_KEYS = ["period", "start", "end"];

// A dated record is a candidate like any list item and must pass the year filter.
const valueAt = (value: FactValue, fiscalYear: number): number | null => {
  const node = classifyNode(value);
  if (node.kind === "list") return selectAnnualValue(node.items, fiscalYear);
  if (node.kind === "mapping" && PERIOD_KEYS.some((key) => key in node.entries)) {
    return selectAnnualValue([value], fiscalYear);
  }
  return normalizeValue(value);
};

const aliasProbe =
  (aliases: readonly string[], fiscalYear: number) =>
  (mapping: FactMapping): number | null => {
    for (const alias of aliases) {
      if (!Object.prototype.hasOwnProperty.call(mapping, alias)) continue;
      const value = valueAt(mapping[alias], fiscalYear);
      if (value !== null) return value;
    }
    return null;
  };

export const searchSection = (section: FactValue, aliases: readonly string[], fiscalYear: number): number | null =>
  findInTree(section, aliasProbe(aliases, fiscalYear));

/**
 * Finds the value of one canonical metric for `fiscalYear`.
 *
 * Priority sections are searched first, in order. Failing that, every top-level
 * section whose name starts with a statement-like prefix is searched in document
 * order. Returns `null` when nothing matches.
 */
export const resolveConcept = (
  document: FactDocument,
  aliases: readonly string[],
  fiscalYear: number,
  options: ResolveOptions = {},
): number | null => {
  const prioritySections = options.prioritySections ?? [];
  const prefixes = options.fallbackSectionPrefixes ?? DEFAULT_FALLBACK_PREFIXES;

  for (const sectionName of prioritySections) {
    if (!Object.prototype.hasOwnProperty.call(document, sectionName)) continue;
    const value = searchSection(document[sectionName], aliases, fiscalYear);
    if (value !== null) return value;
  }

  for (const [sectionName, section] of Object.entries(document)) {
    if (!prefixes.some((prefix) => sectionName.startsWith(prefix))) continue;
    const value = searchSection(section, aliases, fiscalYear);
    if (value !== null) return value;
  }

  return null;
};

/** Direct key lookup for flat concept → value documents. `us-gaap:Revenues` matches `Revenues`. */
export const lookupFlat = (document: FactDocument, aliases: readonly string[]): number | null => {
  const keys = Object.keys(document);
  for (const alias of aliases) {
    const key = keys.find((k) => k === alias) ?? keys.find((k) => k.endsWith(`:${alias}`));
    if (key === undefined) continue;
    const value = normalizeValue(document[key]);
    if (value !== null) return value;
  }
  return null;
};
