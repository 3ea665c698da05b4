import { readFileSync } from "node:fs";
import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { BASE_METRICS, type BaseMetricName } from "../types/financials.js";

const MetricAliasesSchema = z.object({
  aliases: z.array(z.string().min(1)).min(1),
  prioritySections: z.array(z.string().min(1)).default([]),
});

const AliasFileSchema = z.object({
  fallbackSectionPrefixes: z.array(z.string().min(1)).min(1),
  defaultPrioritySections: z.array(z.string().min(1)),
  metrics: z.record(z.string(), MetricAliasesSchema),
});

export type MetricAliases = z.infer<typeof MetricAliasesSchema>;

export type AliasTable = {
  fallbackSectionPrefixes: readonly string[];
  /** Every base metric, in the order the extractor resolves them. */
  metrics: ReadonlyMap<BaseMetricName, MetricAliases>;
};

/**
 * Validates raw alias data. Every base metric needs an entry; metrics without
 * their own priority sections inherit `defaultPrioritySections`.
 */
export const parseAliasTable = (raw: unknown): AliasTable => {
  const parsed = AliasFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError({
      code: "INVALID_ALIAS_TABLE",
      message: "Alias table failed validation",
      details: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const { fallbackSectionPrefixes, defaultPrioritySections, metrics } = parsed.data;
  const table = new Map<BaseMetricName, MetricAliases>();
  const missing: string[] = [];

  for (const name of BASE_METRICS) {
    const entry = metrics[name];
    if (!entry) {
      missing.push(name);
      continue;
    }
    table.set(name, {
      aliases: entry.aliases,
      prioritySections: entry.prioritySections.length ? entry.prioritySections : defaultPrioritySections,
    });
  }

  if (missing.length) {
    throw new ConfigurationError({
      code: "INVALID_ALIAS_TABLE",
      message: `Alias table has no entry for: ${missing.join(", ")}`,
      details: missing,
    });
  }

  return { fallbackSectionPrefixes, metrics: table };
};

let defaultTable: AliasTable | undefined;

export const loadDefaultAliasTable = (): AliasTable => {
  if (!defaultTable) {
    const raw: unknown = JSON.parse(readFileSync(new URL("./aliases.json", import.meta.url), "utf8"));
    defaultTable = parseAliasTable(raw);
  }
  return defaultTable;
};
