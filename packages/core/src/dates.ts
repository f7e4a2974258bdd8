/**
 * Normalization of the free-form dates found in reference manager exports.
 */

interface DatePattern {
  regex: RegExp;
  /** Extract [year, month, day] from a match; missing parts default to 1. */
  parts(match: RegExpMatchArray): [number, number, number];
}

/**
 * Accepted input shapes, tried in order.
 */
const DATE_PATTERNS: DatePattern[] = [
  {
    // 2020-05-07
    regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    parts: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    // 2020-05
    regex: /^(\d{4})-(\d{1,2})$/,
    parts: (m) => [Number(m[1]), Number(m[2]), 1],
  },
  {
    // 05/2020
    regex: /^(\d{1,2})\/(\d{4})$/,
    parts: (m) => [Number(m[2]), Number(m[1]), 1],
  },
  {
    // 2020
    regex: /^(\d{4})$/,
    parts: (m) => [Number(m[1]), 1, 1],
  },
];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  return (
    year >= 1 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Convert a raw date string to YYYY-MM-DD.
 * @returns The normalized date, or null ("no date") when the input is empty
 * or matches none of the accepted shapes
 */
export function normalizeDate(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  for (const pattern of DATE_PATTERNS) {
    const match = raw.match(pattern.regex);
    if (!match) {
      continue;
    }

    const [year, month, day] = pattern.parts(match);
    // A shape match with an impossible date falls through to the next shape
    if (isCalendarDate(year, month, day)) {
      return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
    }
  }

  return null;
}
