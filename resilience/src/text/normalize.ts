import { InvalidArgumentError } from "../errors";
import type { ExtractionResult } from "../types";

export type SymbolPosition = "before" | "after" | "either";
export type DecimalSeparator = "." | ",";

export interface PriceOptions {
  /** `","` for continental formats such as `1.299,00 €`. Defaults to `"."`. */
  decimalSeparator?: DecimalSeparator;
  /** Where the currency symbol sits relative to the amount. Defaults to `"before"`. */
  position?: SymbolPosition;
}

const NUMBER_PATTERNS: Record<DecimalSeparator, string> = {
  ".": String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?`,
  ",": String.raw`\d{1,3}(?:[. \u00A0]\d{3})+(?:,\d+)?|\d+(?:,\d+)?`,
};

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/;
const URL_TRAILING_PUNCTUATION = /[.,;:!?)]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function escapeCharClass(value: string): string {
  return value.replace(/[\\\]^-]/g, "\\$&");
}

function tokenToNumber(token: string, decimal: DecimalSeparator): number | null {
  const normalized =
    decimal === "."
      ? token.replace(/,/g, "")
      : token.replace(/[. \u00A0]/g, "").replace(",", ".");
  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

function pricePattern(symbol: string, options: PriceOptions): RegExp {
  const number = NUMBER_PATTERNS[options.decimalSeparator ?? "."];
  const sym = escapeRegExp(symbol);
  const before = String.raw`(-?)${sym}\s?(${number})`;
  const after = String.raw`(-?)(${number})\s?${sym}`;
  switch (options.position ?? "before") {
    case "before":
      return new RegExp(before);
    case "after":
      return new RegExp(after);
    case "either":
      return new RegExp(`${before}|${after}`);
  }
}

/**
 * First amount tagged with `symbol`, left to right. `rawSource` is the
 * matched token including the symbol.
 *
 * @example
 * extractPriceMatch("Price: $1,299.99 (was $1,499.00)", "$")
 * // { value: 1299.99, found: true, rawSource: "$1,299.99" }
 */
export function extractPriceMatch(
  text: string,
  symbol = "$",
  options: PriceOptions = {},
): ExtractionResult<number> {
  if (!text) {
    return { value: null, found: false, rawSource: null };
  }
  if (!symbol) {
    return firstNumberToken(text, options.decimalSeparator ?? ".");
  }
  const match = pricePattern(symbol, options).exec(text);
  if (!match) {
    return { value: null, found: false, rawSource: null };
  }
  // "before" fills groups 1-2, "after" (or the second half of "either") 3-4.
  const sign = match[1] ?? match[3] ?? "";
  const token = match[2] ?? match[4];
  if (token === undefined) {
    return { value: null, found: false, rawSource: null };
  }
  const amount = tokenToNumber(token, options.decimalSeparator ?? ".");
  if (amount === null) {
    return { value: null, found: false, rawSource: null };
  }
  return { value: sign === "-" ? -amount : amount, found: true, rawSource: match[0] };
}

export function extractPrice(
  text: string,
  symbol = "$",
  options: PriceOptions = {},
): number | null {
  return extractPriceMatch(text, symbol, options).value;
}

function firstNumberToken(text: string, decimal: DecimalSeparator): ExtractionResult<number> {
  const match = new RegExp(NUMBER_PATTERNS[decimal]).exec(text);
  if (!match) {
    return { value: null, found: false, rawSource: null };
  }
  const value = tokenToNumber(match[0], decimal);
  return value === null
    ? { value: null, found: false, rawSource: null }
    : { value, found: true, rawSource: match[0] };
}

export function extractNumber(text: string, decimal: DecimalSeparator = "."): number | null {
  if (!text) {
    return null;
  }
  return firstNumberToken(text, decimal).value;
}

/**
 * @example
 * extractNumbers("Showing 1-10 of 1,024 results") // [1, 10, 1024]
 */
export function extractNumbers(text: string, decimal: DecimalSeparator = "."): number[] {
  if (!text) {
    return [];
  }
  const values: number[] = [];
  for (const match of text.matchAll(new RegExp(NUMBER_PATTERNS[decimal], "g"))) {
    const value = tokenToNumber(match[0], decimal);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Parses a whole price string, detecting US (`1,299.99`) and continental
 * (`1.299,99`) grouping. Returns null when no number can be read.
 */
export function parsePrice(text: string): number | null {
  if (!text) {
    return null;
  }
  const firstDigit = text.search(/\d/);
  if (firstDigit === -1) {
    return null;
  }
  const minus = text.indexOf("-");
  const negative = minus !== -1 && minus < firstDigit;

  let cleaned = text.replace(/[^\d.,]/g, "");
  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");

  if (lastComma !== -1 && lastDot !== -1) {
    cleaned =
      lastComma > lastDot
        ? cleaned.replace(/\./g, "").replace(",", ".")
        : cleaned.replace(/,/g, "");
  } else if (lastComma !== -1) {
    cleaned = keepLastAsDecimal(cleaned, ",");
  } else if (lastDot !== -1 && cleaned.indexOf(".") !== lastDot) {
    cleaned = keepLastAsDecimal(cleaned, ".");
  }

  const value = Number(cleaned);
  if (!Number.isFinite(value)) {
    return null;
  }
  return negative ? -value : value;
}

/** Two trailing digits mean a decimal part; anything else is grouping. */
function keepLastAsDecimal(value: string, separator: "," | "."): string {
  const index = value.lastIndexOf(separator);
  const head = value.slice(0, index).split(separator).join("");
  const tail = value.slice(index + 1);
  return tail.length === 2 ? `${head}.${tail}` : `${head}${tail}`;
}

const MAX_FRACTION_DIGITS = 20;

/** `decimals` must be an integer in 0..20; anything else is a caller error. */
export function formatCurrency(amount: number, symbol = "$", decimals = 2): string {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_FRACTION_DIGITS) {
    throw new InvalidArgumentError(
      "decimals",
      `must be an integer between 0 and ${MAX_FRACTION_DIGITS}, got ${decimals}`,
    );
  }
  const formatter = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: true,
  });
  const negative = Number(amount.toFixed(decimals)) < 0;
  return `${negative ? "-" : ""}${symbol}${formatter.format(Math.abs(amount))}`;
}

export interface SanitizeOptions {
  maxLength?: number;
  suffix?: string;
  wordBoundary?: boolean;
}

/** Collapses whitespace runs (tabs, newlines, NBSP) to single spaces and trims. */
export function sanitizeText(text: string, options: SanitizeOptions = {}): string {
  if (!text) {
    return "";
  }
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (options.maxLength === undefined) {
    return collapsed;
  }
  return truncateText(collapsed, options.maxLength, options);
}

/**
 * Cuts `text` to at most `maxLength` characters including the suffix. The
 * suffix is only appended when something was cut.
 */
export function truncateText(
  text: string,
  maxLength: number,
  options: { suffix?: string; wordBoundary?: boolean } = {},
): string {
  const suffix = options.suffix ?? "...";
  if (!text || text.length <= maxLength) {
    return text;
  }
  const available = maxLength - suffix.length;
  if (available <= 0) {
    return suffix.slice(0, Math.max(0, maxLength));
  }
  let truncated = text.slice(0, available);
  const cutMidWord = text[available] !== " ";
  if ((options.wordBoundary ?? true) && cutMidWord) {
    const lastSpace = truncated.lastIndexOf(" ");
    if (lastSpace > 0) {
      truncated = truncated.slice(0, lastSpace);
    }
  }
  return `${truncated.trimEnd()}${suffix}`;
}

export function removeSpecialCharacters(
  text: string,
  options: { keepSpaces?: boolean; keepChars?: string } = {},
): string {
  if (!text) {
    return "";
  }
  const spaces = (options.keepSpaces ?? true) ? String.raw`\s` : "";
  const extra = options.keepChars ? escapeCharClass(options.keepChars) : "";
  return text.replace(new RegExp(`[^a-zA-Z0-9${spaces}${extra}]`, "g"), "");
}

export function extractEmail(text: string): string | null {
  if (!text) {
    return null;
  }
  return EMAIL_PATTERN.exec(text)?.[0] ?? null;
}

export function extractUrl(text: string): string | null {
  if (!text) {
    return null;
  }
  const match = URL_PATTERN.exec(text)?.[0];
  return match ? match.replace(URL_TRAILING_PUNCTUATION, "") : null;
}
