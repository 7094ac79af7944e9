import type { VariableKind, VariableSpec } from "./motion-types.js";

export type CaseValue = string | number;

export type FoundValue<T> = { index: number; end: number; raw: string; value: T };

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

const MONEY_PATTERN = /\$\s?\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?|\$\s?\d+(?:\.\d{1,2})?|\b\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?\b/g;
const ISO_DATE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g;
const US_DATE = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g;
const LONG_DATE = /\b(January|February|March|April|May|June|July|August|September|October|November|December|Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)\.?\s+(\d{1,2}),?\s+(\d{4})\b/gi;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function toIsoDate(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function parseMoneyToken(token: string): number | undefined {
  const cleaned = token
    .replace(/\b(usd|dollars?)\b/gi, "")
    .replace(/[$,\s]/g, "");
  if (!/^\d+(?:\.\d+)?$/.test(cleaned)) return undefined;
  const amount = Number(cleaned);
  if (!Number.isFinite(amount)) return undefined;
  return Math.round(amount * 100) / 100;
}

export function findMoneyAmounts(text: string): Array<FoundValue<number>> {
  const found: Array<FoundValue<number>> = [];
  for (const match of text.matchAll(MONEY_PATTERN)) {
    const value = parseMoneyToken(match[0]);
    if (value === undefined || match.index === undefined) continue;
    found.push({ index: match.index, end: match.index + match[0].length, raw: match[0], value });
  }
  return found;
}

export function findDates(text: string): Array<FoundValue<string>> {
  const found: Array<FoundValue<string>> = [];
  const push = (match: RegExpMatchArray, iso: string | undefined) => {
    if (!iso || match.index === undefined) return;
    found.push({ index: match.index, end: match.index + match[0].length, raw: match[0], value: iso });
  };

  for (const m of text.matchAll(ISO_DATE)) {
    push(m, toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])));
  }
  for (const m of text.matchAll(US_DATE)) {
    push(m, toIsoDate(Number(m[3]), Number(m[1]), Number(m[2])));
  }
  for (const m of text.matchAll(LONG_DATE)) {
    const month = MONTHS.findIndex((name) => name.startsWith(m[1].toLowerCase().slice(0, 3))) + 1;
    push(m, toIsoDate(Number(m[3]), month, Number(m[2])));
  }

  return found.sort((a, b) => a.index - b.index);
}

/**
 * Normalizes a raw value for a variable kind. Returns undefined when the raw
 * value cannot be read as that kind; callers drop such values.
 */
export function normalizeValue(kind: VariableKind, raw: unknown): CaseValue | undefined {
  if (raw === null || raw === undefined) return undefined;

  switch (kind) {
    case "money": {
      if (typeof raw === "number") {
        return Number.isFinite(raw) && raw >= 0 ? Math.round(raw * 100) / 100 : undefined;
      }
      if (typeof raw !== "string") return undefined;
      const amounts = findMoneyAmounts(raw);
      if (amounts.length === 1) return amounts[0].value;
      if (amounts.length > 1) return undefined;
      return parseMoneyToken(raw.trim());
    }
    case "date": {
      if (typeof raw !== "string") return undefined;
      const dates = findDates(raw);
      return dates.length === 1 ? dates[0].value : undefined;
    }
    case "text": {
      if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
      if (typeof raw !== "string") return undefined;
      const text = raw.replace(/\s+/g, " ").trim();
      return text.length > 0 ? text : undefined;
    }
  }
}

export function formatMoney(amount: number): string {
  return `$${amount.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function formatIsoDate(iso: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(iso);
  if (!match) return iso;
  const month = MONTHS[Number(match[2]) - 1];
  if (!month) return iso;
  return `${month[0].toUpperCase()}${month.slice(1)} ${Number(match[3])}, ${match[1]}`;
}

/** Display form used in prompts and drafts. */
export function formatValue(spec: VariableSpec, value: CaseValue): string {
  if (spec.kind === "money" && typeof value === "number") return formatMoney(value);
  if (spec.kind === "date" && typeof value === "string") return formatIsoDate(value);
  return String(value);
}
