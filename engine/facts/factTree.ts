/**
 * Schema-free view over a fact document.
 *
 * Filings converted to JSON do not share a layout: the same concept can sit under
 * a statement section, a note table, or a list of dimensional breakdowns. Every
 * lookup therefore goes through `classifyNode` and `findInTree` instead of
 * indexing into an assumed shape.
 */

export type FactScalar = string | number | boolean | null;

export type FactValue = FactScalar | FactValue[] | FactMapping;

export interface FactMapping {
  [key: string]: FactValue;
}

/** A fact document is a mapping of section names to anything. */
export type FactDocument = FactMapping;

export type FactNode =
  | { kind: "scalar"; value: FactScalar }
  | { kind: "list"; items: readonly FactValue[] }
  | { kind: "mapping"; entries: FactMapping };

export const isFactMapping = (value: unknown): value is FactMapping =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const classifyNode = (value: FactValue): FactNode => {
  if (Array.isArray(value)) return { kind: "list", items: value };
  if (isFactMapping(value)) return { kind: "mapping", entries: value };
  return { kind: "scalar", value };
};

/**
 * Depth-first search. `probe` runs on every mapping before its children are
 * visited; the first non-null result wins. Each call descends into a child of
 * the current value, so the walk ends on any finite document.
 */
export function findInTree<T>(root: FactValue, probe: (mapping: FactMapping) => T | null): T | null {
  const node = classifyNode(root);

  switch (node.kind) {
    case "scalar":
      return null;
    case "list":
      for (const item of node.items) {
        const found = findInTree(item, probe);
        if (found !== null) return found;
      }
      return null;
    case "mapping": {
      const direct = probe(node.entries);
      if (direct !== null) return direct;
      for (const child of Object.values(node.entries)) {
        if (classifyNode(child).kind === "scalar") continue;
        const found = findInTree(child, probe);
        if (found !== null) return found;
      }
      return null;
    }
  }
}

/** A document whose top-level values are all plain numbers (concept → value). */
export const isFlatDocument = (document: FactDocument): boolean =>
  Object.values(document).every((value) => typeof value === "number" && Number.isFinite(value));
