import { contentTokens, normalizeText } from "../utils/text.js";

export type ValueKind = "time" | "date" | "number";

/** What a piece of text is about, and which concrete values it asserts. */
export interface TextProfile {
  /** Every content token, values included. */
  tokens: Set<string>;
  /** Content tokens minus values and negation words. */
  subject: Set<string>;
  values: Record<ValueKind, Set<string>>;
  negated: boolean;
}

const DATE_WORDS = new Set([
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
  "january", "february", "march", "april", "may", "june", "july", "august",
  "september", "october", "november", "december",
  "today", "tomorrow", "yesterday", "tonight",
  "今天", "明天", "昨天", "后天", "周一", "周二", "周三", "周四", "周五", "周六", "周日",
]);

const NEGATION_WORDS = new Set(["not", "no", "never", "cannot", "don", "doesn", "isn", "won", "aren", "wasn", "没有"]);
const HAN_NEGATION = /[不没别]/u;

const TIME_PATTERN = /\b\d{2}:\d{2}\b/g;
const NUMERIC_DATE_PATTERN = /\b\d{4}-\d{1,2}-\d{1,2}\b|\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/g;
const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

function collect(text: string, pattern: RegExp): { found: string[]; rest: string } {
  const found = text.match(pattern) ?? [];
  return { found: [...found], rest: text.replace(pattern, " ") };
}

export function profileText(text: string): TextProfile {
  const normalized = normalizeText(text);

  const times = collect(normalized, TIME_PATTERN);
  const dates = collect(times.rest, NUMERIC_DATE_PATTERN);
  const numbers = collect(dates.rest, NUMBER_PATTERN);

  const words = contentTokens(numbers.rest);
  const dateWords = words.filter((word) => DATE_WORDS.has(word));
  const negated = words.some((word) => NEGATION_WORDS.has(word)) || HAN_NEGATION.test(numbers.rest);

  const subject = new Set(words.filter((word) => !DATE_WORDS.has(word) && !NEGATION_WORDS.has(word)));
  const values: Record<ValueKind, Set<string>> = {
    time: new Set(times.found),
    date: new Set([...dates.found, ...dateWords]),
    number: new Set(numbers.found),
  };

  return {
    tokens: new Set([...words, ...values.time, ...values.date, ...values.number]),
    subject,
    values,
    negated,
  };
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export interface Contradiction {
  kind: ValueKind | "negation";
  before: string[];
  after: string[];
}

/**
 * A value kind asserted on both sides with no value in common, or one side
 * negated and the other not.
 */
export function findContradiction(existing: TextProfile, incoming: TextProfile): Contradiction | null {
  for (const kind of ["time", "date", "number"] as const) {
    const before = existing.values[kind];
    const after = incoming.values[kind];
    if (before.size === 0 || after.size === 0) continue;
    const overlaps = [...after].some((value) => before.has(value));
    if (!overlaps) {
      return { kind, before: [...before], after: [...after] };
    }
  }

  if (existing.negated !== incoming.negated) {
    return {
      kind: "negation",
      before: [existing.negated ? "negated" : "affirmed"],
      after: [incoming.negated ? "negated" : "affirmed"],
    };
  }

  return null;
}
