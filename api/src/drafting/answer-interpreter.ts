import type { VariableSpec } from "../motions/motion-types.js";
import { findDates, findMoneyAmounts, normalizeValue, type CaseValue } from "../motions/values.js";

export type Attribution = { name: string; value: CaseValue };

export type AnswerInterpretation = {
  values: Attribution[];
  /** Variables the reply addressed without a usable value, or that compete for one value. */
  ambiguous: string[];
  /** The reply had content but nothing in it could be attributed. */
  unattributed: boolean;
};

export type InterpretOptions = {
  /**
   * Variables the reply may answer without naming them. Empty means only
   * labelled answers are read.
   */
  requested: readonly string[];
};

type LabelMatch = { name: string; start: number; end: number };

const CONNECTOR = String.raw`\s*(?::|=|-|\bis\b|\bwas\b|\bshould be\b)\s*`;

/** Where a labelled answer may begin: the start of the reply or of a clause. */
const CLAUSE_START = String.raw`(^|\n|[,;]|\band\b)(\s*)`;

const CONNECTOR_WORD = /(?::|=|\bis\b|\bwas\b|\bshould be\b)/i;
const FIRST_PERSON = /\bI(?:'m|'ll|'ve|'d)?\s+[a-z]/;
const HEDGE =
  /\b(?:we|we're|we'll|my|our|not sure|unsure|don't know|do not know|no idea|unknown|maybe|perhaps|probably|will check|tbd)\b|\?/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function labelPattern(label: string): RegExp {
  const words = label
    .toLowerCase()
    .split(/[\s_]+/)
    .filter(Boolean)
    .map(escapeRegExp)
    .join(String.raw`[\s_]+`);
  return new RegExp(String.raw`${CLAUSE_START}((?:(?:the|my|our)\s+)?${words})${CONNECTOR}`, "gi");
}

function findLabelMatches(message: string, candidates: readonly VariableSpec[]): { kept: LabelMatch[]; conflicts: string[] } {
  const all: LabelMatch[] = [];
  for (const spec of candidates) {
    for (const label of [spec.label, spec.name, ...spec.aliases]) {
      for (const m of message.matchAll(labelPattern(label))) {
        if (m.index === undefined) continue;
        const start = m.index + m[1].length + m[2].length;
        all.push({ name: spec.name, start, end: m.index + m[0].length });
      }
    }
  }

  all.sort((a, b) => a.start - b.start || b.end - a.end);

  const kept: LabelMatch[] = [];
  const conflicts: string[] = [];
  let lastEnd = -1;
  for (const match of all) {
    const previous = kept[kept.length - 1];
    if (previous && previous.start === match.start && previous.end === match.end) {
      if (previous.name !== match.name) {
        conflicts.push(previous.name, match.name);
      }
      continue;
    }
    if (match.start < lastEnd) continue;
    kept.push(match);
    lastEnd = match.end;
  }

  const conflicting = new Set(conflicts);
  return {
    kept: kept.filter((m) => !conflicting.has(m.name)),
    conflicts: [...conflicting],
  };
}

/** Drops trailing separators and dangling conjunctions from a captured value. */
export function cleanSegment(segment: string): string {
  let value = segment.trim();
  let previous: string;
  do {
    previous = value;
    value = value
      .replace(/[\s,;]+$/, "")
      .replace(/\s+(?:and|also|plus|then)(?:\s+(?:the|a|an))?$/i, "")
      .replace(/(?<=[a-z0-9])\.$/, "");
  } while (value !== previous);
  return value;
}

function firstLine(text: string): string {
  return text.split(/\r?\n/)[0] ?? "";
}

/**
 * Reads the value that follows a label. Money and dates take the first amount
 * or date when it leads the segment; whatever follows it stays available for
 * unlabelled attribution.
 */
function readLabelledValue(spec: VariableSpec, segment: string): { value?: CaseValue; rest: string } {
  if (spec.kind === "text") {
    const [first = "", ...others] = segment.trim().split(/\r?\n/);
    return { value: normalizeValue("text", cleanSegment(first)), rest: others.join("\n") };
  }

  const found = spec.kind === "money" ? findMoneyAmounts(segment) : findDates(segment);
  const lead = found[0];
  if (lead && !segment.slice(0, lead.index).trim()) {
    return { value: lead.value, rest: segment.slice(lead.end) };
  }
  return { value: normalizeValue(spec.kind, cleanSegment(segment)), rest: "" };
}

/** A reply that is only a value: no label, no sentence around it, no hedging. */
function readsAsBareValue(text: string): boolean {
  return !CONNECTOR_WORD.test(text) && !FIRST_PERSON.test(text) && !HEDGE.test(text);
}

/**
 * Attributes a free-text reply to variables of the motion. Labelled values
 * ("lien date: 03/15/2023", "the claim value is $12,500") are read for any
 * variable in `schema`, so a requested answer and a correction can share a
 * reply. Variables in `options.requested` may also be answered without a
 * label: a bare value answers a single requested variable, and otherwise a
 * lone money amount or date goes to the only requested variable of that kind.
 * Anything
 * else is reported as ambiguous instead of guessed.
 */
export function interpretAnswer(
  message: string,
  schema: readonly VariableSpec[],
  options: InterpretOptions
): AnswerInterpretation {
  const text = message.trim();
  const values: Attribution[] = [];
  const ambiguous: string[] = [];
  if (!text || schema.length === 0) {
    return { values, ambiguous, unattributed: false };
  }

  const specsByName = new Map(schema.map((spec) => [spec.name, spec]));
  const { kept, conflicts } = findLabelMatches(text, schema);
  ambiguous.push(...conflicts);

  let leftover = "";
  let cursor = 0;
  kept.forEach((match, i) => {
    leftover += `${text.slice(cursor, match.start)}\n`;
    const segmentEnd = kept[i + 1]?.start ?? text.length;
    cursor = segmentEnd;

    const spec = specsByName.get(match.name);
    if (!spec) return;
    const { value, rest } = readLabelledValue(spec, text.slice(match.end, segmentEnd));
    leftover += `${rest}\n`;
    const alreadySet = values.some((v) => v.name === spec.name);

    if (value === undefined || alreadySet) {
      if (!ambiguous.includes(spec.name)) ambiguous.push(spec.name);
      return;
    }
    values.push({ name: spec.name, value });
  });
  leftover += text.slice(cursor);

  // A name labelled twice with different values is ambiguous, not last-wins.
  const resolved = values.filter((v) => !ambiguous.includes(v.name));

  const requested = schema.filter((spec) => options.requested.includes(spec.name));
  if (requested.length === 1 && kept.length === 0 && conflicts.length === 0 && readsAsBareValue(text)) {
    const only = requested[0];
    const value = normalizeValue(only.kind, only.kind === "text" ? cleanSegment(firstLine(text)) : cleanSegment(text));
    if (value === undefined) {
      ambiguous.push(only.name);
    } else {
      resolved.push({ name: only.name, value });
    }
  } else if (requested.length > 0) {
    const open = requested.filter(
      (spec) => !resolved.some((v) => v.name === spec.name) && !ambiguous.includes(spec.name)
    );
    attributeByKind(open, "money", findMoneyAmounts(leftover).map((m) => m.value), resolved, ambiguous);
    attributeByKind(open, "date", findDates(leftover).map((d) => d.value), resolved, ambiguous);
  }

  return {
    values: resolved,
    ambiguous,
    unattributed: resolved.length === 0 && ambiguous.length === 0,
  };
}

function attributeByKind(
  open: readonly VariableSpec[],
  kind: "money" | "date",
  found: CaseValue[],
  resolved: Attribution[],
  ambiguous: string[]
) {
  if (found.length === 0) return;
  const targets = open.filter((spec) => spec.kind === kind);
  if (targets.length === 1 && found.length === 1) {
    resolved.push({ name: targets[0].name, value: found[0] });
    return;
  }
  for (const spec of targets) {
    if (!ambiguous.includes(spec.name)) ambiguous.push(spec.name);
  }
}
