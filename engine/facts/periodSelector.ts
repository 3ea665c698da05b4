import { type FactMapping, isFactMapping } from "./factTree.js";
import { normalizeValue } from "./normalizeValue.js";

export type CandidatePeriod = {
  startDate: string | null;
  endDate: string | null;
};

type RankedCandidate = {
  value: number;
  durationYears: number;
  filed: string;
  index: number;
};

const asDateString = (value: unknown): string | null =>
  typeof value === "string" && value.trim() ? value.trim() : null;

const yearOf = (date: string): number | null => {
  const match = /^(\d{4})/.exec(date);
  return match ? Number(match[1]) : null;
};

/**
 * Reads the reporting period of a candidate. Handles the xbrl-to-json shape
 * (`period: { startDate, endDate } | { instant }`) and the company-facts shape
 * (`start`, `end`). An instant is reported as its own end date.
 */
export const readPeriod = (record: FactMapping): CandidatePeriod => {
  const period = record.period;
  if (isFactMapping(period)) {
    const instant = asDateString(period.instant);
    return {
      startDate: asDateString(period.startDate),
      endDate: asDateString(period.endDate) ?? instant,
    };
  }
  return { startDate: asDateString(record.start), endDate: asDateString(record.end) };
};

export const readFilingDate = (record: FactMapping): string | null =>
  asDateString(record.filed) ?? asDateString(record.filedAt);

/**
 * Picks the annual figure for `fiscalYear` from time-stamped candidates of one concept.
 *
 * Candidates must end in the target year and span at most one calendar-year
 * boundary (multi-year cumulative figures are dropped). Ties go to the shortest
 * duration, then the most recent filing.
 */
export const selectAnnualValue = (candidates: readonly unknown[], fiscalYear: number): number | null => {
  const ranked: RankedCandidate[] = [];

  candidates.forEach((candidate, index) => {
    if (!isFactMapping(candidate)) return;
    const { startDate, endDate } = readPeriod(candidate);
    if (!endDate) return;

    const endYear = yearOf(endDate);
    if (endYear !== fiscalYear) return;

    const startYear = startDate ? yearOf(startDate) : null;
    const durationYears = startYear === null ? 0 : endYear - startYear;
    if (durationYears < 0 || durationYears > 1) return;

    const value = normalizeValue(candidate);
    if (value === null) return;

    ranked.push({ value, durationYears, filed: readFilingDate(candidate) ?? "", index });
  });

  if (!ranked.length) return null;

  ranked.sort((a, b) => {
    if (a.durationYears !== b.durationYears) return a.durationYears - b.durationYears;
    if (a.filed !== b.filed) return a.filed < b.filed ? 1 : -1;
    return a.index - b.index;
  });

  return ranked[0].value;
};
