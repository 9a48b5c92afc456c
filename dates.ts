import { displayName, normalize } from "./names";
import type { Individual } from "./schema";

export interface ParsedDate {
  year: number;
  month: number;
  day: number;
}

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

const MONTH_LOOKUP = new Map<string, number>(
  MONTH_NAMES.flatMap((name, index) => [
    [name.toLowerCase(), index + 1],
    [name.slice(0, 3).toLowerCase(), index + 1],
  ] as const),
);

const MONTH = "(1[0-2]|0?[1-9])";
const DAY = "(3[01]|[12]\\d|0?[1-9])";
const YEAR = "(\\d{4})";
const SHORT_YEAR = "(\\d{2})";
const ABBREVIATED_MONTH = `(${MONTH_NAMES.map((name) => name.slice(0, 3)).join("|")})`;
const FULL_MONTH = `(${MONTH_NAMES.join("|")})`;

type DateParts = [year: string, month: string, day: string];

interface DatePattern {
  pattern: RegExp;
  parts: (match: RegExpMatchArray) => DateParts;
}

function fullMatch(source: string): RegExp {
  return new RegExp(`^${source}$`, "i");
}

// Tried in order; the first pattern that yields a real calendar date wins.
const DATE_PATTERNS: readonly DatePattern[] = [
  { pattern: fullMatch(`${MONTH}/${DAY}/${YEAR}`), parts: (m) => [m[3], m[1], m[2]] },
  { pattern: fullMatch(`${MONTH}/${DAY}/${SHORT_YEAR}`), parts: (m) => [expandShortYear(m[3]), m[1], m[2]] },
  { pattern: fullMatch(`${DAY}/${MONTH}/${YEAR}`), parts: (m) => [m[3], m[2], m[1]] },
  { pattern: fullMatch(`${DAY} ${ABBREVIATED_MONTH} ${YEAR}`), parts: (m) => [m[3], m[2], m[1]] },
  { pattern: fullMatch(`${DAY} ${FULL_MONTH} ${YEAR}`), parts: (m) => [m[3], m[2], m[1]] },
  { pattern: fullMatch(`${ABBREVIATED_MONTH} ${DAY} ${YEAR}`), parts: (m) => [m[3], m[1], m[2]] },
  { pattern: fullMatch(`${FULL_MONTH} ${DAY} ${YEAR}`), parts: (m) => [m[3], m[1], m[2]] },
];

function expandShortYear(value: string): string {
  const year = Number(value);
  return String(year < 69 ? 2000 + year : 1900 + year);
}

function toMonthNumber(value: string): number {
  return MONTH_LOOKUP.get(value.toLowerCase()) ?? Number(value);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function buildDate(year: number, month: number, day: number): ParsedDate | undefined {
  if (!Number.isInteger(year) || year < 1) {
    return undefined;
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return undefined;
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  return { year, month, day };
}

function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Parses the loosely formatted dates found in family files, e.g.
 * `"03/04/1930"`, `"4 MAR 1930"`, `"March 4, 1930"` or a bare `"1930"`.
 * Returns `undefined` when no supported shape matches.
 */
export function parseDate(value: string | null | undefined): ParsedDate | undefined {
  if (!value) {
    return undefined;
  }

  let cleaned = value.trim();
  if (!cleaned) {
    return undefined;
  }

  cleaned = cleaned.replace(/,/g, " ").replace(/\s+/g, " ").trim();
  if (/[A-Za-z]/.test(cleaned)) {
    cleaned = titleCase(cleaned);
  }

  for (const { pattern, parts } of DATE_PATTERNS) {
    const match = cleaned.match(pattern);
    if (!match) {
      continue;
    }

    const [year, month, day] = parts(match);
    const parsed = buildDate(Number(year), toMonthNumber(month), Number(day));
    if (parsed) {
      return parsed;
    }
  }

  if (/^\d{4}$/.test(cleaned)) {
    return buildDate(Number(cleaned), 1, 1);
  }

  return undefined;
}

export type BirthSortKey =
  | readonly [0, number, number, number, string]
  | readonly [1, string];

/**
 * Individuals with a parseable birth date come first, chronologically; the
 * rest follow by normalized display name.
 */
export function birthSortKey(individual: Individual): BirthSortKey {
  const name = normalize(displayName(individual));
  const birth = parseDate(individual.birth.date);

  if (birth) {
    return [0, birth.year, birth.month, birth.day, name];
  }

  return [1, name];
}

function compareValues(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  const left = String(a);
  const right = String(b);
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function compareSortKeys(a: BirthSortKey, b: BirthSortKey): number {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareValues(a[index], b[index]);
    if (result !== 0) {
      return result;
    }
  }
  return a.length - b.length;
}

export function compareByBirth(a: Individual, b: Individual): number {
  return compareSortKeys(birthSortKey(a), birthSortKey(b));
}

export function sortByBirth(individuals: readonly Individual[]): Individual[] {
  return [...individuals].sort(compareByBirth);
}
