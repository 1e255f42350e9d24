export type ExtractionResult = {
  raw_text: string;
  name: string | null;
  mrp: number | null;
  sell_price: number | null;
};

const MRP_KEYWORDS = ["mrp", "m.r.p", "max retail", "price mrp"] as const;

const SELL_KEYWORDS = [
  "sell",
  "sale",
  "sp",
  "selling",
  "offer",
  "now",
  "our price",
] as const;

const NAME_SKIP_TOKENS = ["mrp", "sell", "price", "rs", "inr", "₹"];

const NAME_LINE_LOOKAHEAD = 3;

// 2–6 integer digits, optionally 1–2 decimals.
const AMOUNT_SOURCE = "([0-9]{2,6}(?:\\.[0-9]{1,2})?)";

const CANDIDATE_PATTERN = new RegExp(`(?:rs\\.?|inr|₹)?\\s*${AMOUNT_SOURCE}`, "gi");

const LINE_BREAK_PATTERN = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

// Information separators and NEL count as whitespace at the edges of a line.
const EDGE_WHITESPACE_PATTERN = /^[\s\x1c-\x1f\x85]+|[\s\x1c-\x1f\x85]+$/g;

const stripEdges = (value: string) => value.replace(EDGE_WHITESPACE_PATTERN, "");

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const buildKeywordPattern = (keywords: readonly string[]) =>
  new RegExp(
    `(?:${keywords.map(escapeRegExp).join("|")})(?:\\s*price)?\\s*[:\\-]?\\s*₹?\\s*${AMOUNT_SOURCE}`,
    "i",
  );

const MRP_PATTERN = buildKeywordPattern(MRP_KEYWORDS);
const SELL_PATTERN = buildKeywordPattern(SELL_KEYWORDS);

const parseAmount = (token: string | undefined): number | null => {
  if (!token) {
    return null;
  }

  const value = Number.parseFloat(token);
  return Number.isFinite(value) ? value : null;
};

export const splitLines = (text: string): string[] =>
  text
    .split(LINE_BREAK_PATTERN)
    .map(stripEdges)
    .filter((line) => line.length > 0);

/**
 * Amount that follows the first keyword hit. A zero amount counts as no
 * amount, so the field stays open for the fallback pool.
 */
export const findAmountAfterKeyword = (lowerText: string, pattern: RegExp): number | null => {
  const match = pattern.exec(lowerText);
  const value = parseAmount(match?.[1]);
  return value ? value : null;
};

export const collectCandidateAmounts = (lowerText: string): number[] => {
  const values = new Set<number>();
  for (const match of lowerText.matchAll(CANDIDATE_PATTERN)) {
    const value = parseAmount(match[1]);
    if (value !== null) {
      values.add(value);
    }
  }

  return Array.from(values).sort((a, b) => a - b);
};

export const guessNameLine = (lines: string[]): string | null => {
  for (const line of lines.slice(0, NAME_LINE_LOOKAHEAD)) {
    const lower = line.toLowerCase();
    if (NAME_SKIP_TOKENS.some((token) => lower.includes(token))) {
      continue;
    }

    if (/[a-zA-Z]/.test(line)) {
      return stripEdges(line);
    }
  }

  return null;
};

/**
 * Pulls the product name, MRP and selling price out of price-tag OCR text.
 *
 * Keyword hits ("MRP: 120", "Offer ₹99") win. Whatever is still open is
 * filled from every currency-like number on the tag: the largest becomes
 * the MRP and, when there is more than one, the smallest the selling price.
 * Unresolved fields are null.
 */
export function parsePriceTag(text: string): ExtractionResult {
  const lines = splitLines(text);
  const lowerText = text.toLowerCase();

  let mrp = findAmountAfterKeyword(lowerText, MRP_PATTERN);
  let sellPrice = findAmountAfterKeyword(lowerText, SELL_PATTERN);

  const candidates = collectCandidateAmounts(lowerText);
  if (candidates.length > 0) {
    const lowest = candidates[0];
    const highest = candidates[candidates.length - 1];

    if (mrp === null) {
      mrp = highest;
    }

    if (sellPrice === null) {
      sellPrice = mrp && candidates.length > 1 ? lowest : highest;
    }
  }

  return {
    raw_text: stripEdges(text),
    name: guessNameLine(lines),
    mrp,
    sell_price: sellPrice,
  };
}
