import { isFactMapping } from "./factTree.js";

const DECIMAL_LITERAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

const parseNumericString = (raw: string): number | null => {
  let text = raw.trim().replace(/,/g, "").replace(/\$/g, "").replace(/\s+/g, "");
  let negative = false;
  if (text.startsWith("(") && text.endsWith(")")) {
    negative = true;
    text = text.slice(1, -1);
  }
  if (!DECIMAL_LITERAL.test(text)) return null;
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -parsed : parsed;
};

const parseScalar = (raw: unknown): number | null => {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw === "string") return parseNumericString(raw);
  return null;
};

// "INF" and other non-integer exponents leave the base unscaled.
const parseExponent = (raw: unknown): number => {
  const parsed = parseScalar(raw);
  return parsed !== null && Number.isInteger(parsed) ? parsed : 0;
};

const scale = (base: number, exponent: number): number =>
  exponent < 0 ? base / 10 ** -exponent : base * 10 ** exponent;

/**
 * Converts one raw fact encoding into a number.
 *
 * Accepts a plain number, a `{ value | val, decimals }` record read as
 * `value × 10^decimals`, or a string such as `"1,234"`, `"$56"` or `"(78)"`.
 * Returns `null` for anything else; it never throws.
 */
export const normalizeValue = (raw: unknown): number | null => {
  if (raw === null || raw === undefined) return null;
  if (isFactMapping(raw)) {
    const baseRaw = "value" in raw ? raw.value : "val" in raw ? raw.val : undefined;
    const base = parseScalar(baseRaw);
    if (base === null) return null;
    const result = scale(base, parseExponent(raw.decimals));
    return Number.isFinite(result) ? result : null;
  }
  return parseScalar(raw);
};
