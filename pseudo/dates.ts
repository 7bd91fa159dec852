/**
 * Calendar date surrogates in the source's own style
 */

import type { SeedSource } from "../engine/seed.js";
import type { SeededRng } from "../engine/rng.js";
import { matchCase } from "./case-preserver.js";
import { mutateDigits } from "./numbers.js";

export const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

const MONTH_INDEX = new Map<string, number>();
MONTH_NAMES.forEach((name, i) => {
  MONTH_INDEX.set(name.toLowerCase(), i + 1);
  MONTH_INDEX.set(name.slice(0, 3).toLowerCase(), i + 1);
});
MONTH_INDEX.set("sept", 9);

export const MONTH_PATTERN =
  "(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sept?(?:ember)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)";

export function monthNumber(name: string): number | undefined {
  return MONTH_INDEX.get(name.replace(/\.$/, "").toLowerCase());
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDate(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

function ordinal(day: number): string {
  if (day % 100 >= 11 && day % 100 <= 13) return "th";
  switch (day % 10) {
    case 1:
      return "st";
    case 2:
      return "nd";
    case 3:
      return "rd";
    default:
      return "th";
  }
}

// =============================================================================
// Styles
// =============================================================================

type Ymd = { year: number; month: number; day: number };

type ParsedDate = Ymd & { render: (date: Ymd) => string };

const ISO_RX = /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})$/;
const NUMERIC_RX = /^(\d{1,2})([-/.])(\d{1,2})\2(\d{4}|\d{2})$/;
const MONTH_FIRST_RX = new RegExp(`^(${MONTH_PATTERN})(\\.?)(\\s+)(\\d{1,2})(st|nd|rd|th)?(,?)(\\s+)(\\d{4})$`, "i");
const DAY_FIRST_RX = new RegExp(`^(\\d{1,2})(st|nd|rd|th)?(\\s+(?:of\\s+)?)(${MONTH_PATTERN})(\\.?)(,?)(\\s+)(\\d{4})$`, "i");

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function renderMonth(source: string, month: number): string {
  const bare = source.replace(/\.$/, "");
  const sourceMonth = monthNumber(bare);
  const full = MONTH_NAMES[month - 1];
  const abbreviated = sourceMonth !== undefined && bare.toLowerCase() !== MONTH_NAMES[sourceMonth - 1].toLowerCase();
  let name: string = full;
  if (abbreviated) name = bare.length === 4 && month === 9 ? "Sept" : full.slice(0, 3);
  return matchCase(bare, name);
}

function renderOrdinal(source: string | undefined, day: number): string {
  if (!source) return "";
  return matchCase(source, ordinal(day));
}

/** Parse one of the supported date styles, keeping what is needed to render it back. */
export function parseDate(text: string): ParsedDate | null {
  const src = text.trim();

  const iso = ISO_RX.exec(src);
  if (iso) {
    const [, y, sep, m, d] = iso;
    return {
      year: Number(y),
      month: Number(m),
      day: Number(d),
      render: (v) => `${pad(v.year, 4)}${sep}${pad(v.month, m.length)}${sep}${pad(v.day, d.length)}`,
    };
  }

  const num = NUMERIC_RX.exec(src);
  if (num) {
    const [, a, sep, b, y] = num;
    const shortYear = y.length === 2;
    const fullYear = shortYear ? expandYear(Number(y)) : Number(y);
    const renderYear = (year: number): string => (shortYear ? pad(year % 100, 2) : pad(year, 4));
    // Day-first when the first field cannot be a month
    if (Number(a) > 12 && Number(b) <= 12) {
      return {
        year: fullYear,
        month: Number(b),
        day: Number(a),
        render: (v) => `${pad(v.day, a.length)}${sep}${pad(v.month, b.length)}${sep}${renderYear(v.year)}`,
      };
    }
    return {
      year: fullYear,
      month: Number(a),
      day: Number(b),
      render: (v) => `${pad(v.month, a.length)}${sep}${pad(v.day, b.length)}${sep}${renderYear(v.year)}`,
    };
  }

  const mf = MONTH_FIRST_RX.exec(src);
  if (mf) {
    const [, mon, dot, ws1, d, ord, comma, ws2, y] = mf;
    const month = monthNumber(mon);
    if (month === undefined) return null;
    return {
      year: Number(y),
      month,
      day: Number(d),
      render: (v) =>
        `${renderMonth(mon, v.month)}${dot}${ws1}${pad(v.day, d.length)}${renderOrdinal(ord, v.day)}${comma}${ws2}${v.year}`,
    };
  }

  const df = DAY_FIRST_RX.exec(src);
  if (df) {
    const [, d, ord, ws1, mon, dot, comma, ws2, y] = df;
    const month = monthNumber(mon);
    if (month === undefined) return null;
    return {
      year: Number(y),
      month,
      day: Number(d),
      render: (v) =>
        `${pad(v.day, d.length)}${renderOrdinal(ord, v.day)}${ws1}${renderMonth(mon, v.month)}${dot}${comma}${ws2}${v.year}`,
    };
  }

  return null;
}

function expandYear(twoDigit: number): number {
  return twoDigit >= 30 ? 1900 + twoDigit : 2000 + twoDigit;
}

// =============================================================================
// Generator
// =============================================================================

export type DateOptions = {
  /** Birth dates stay within three years of the original. */
  dob?: boolean;
};

function drawDate(original: Ymd, rng: SeededRng, spread: number): Ymd {
  const year = original.year + rng.int(-spread, spread);
  const month = rng.int(1, 12);
  let day = rng.int(1, daysInMonth(year, month));
  if (year === original.year && month === original.month && day === original.day) {
    day = (day % daysInMonth(year, month)) + 1;
  }
  return { year, month, day };
}

export function dateLike(source: string, key: string, seeds: SeedSource, options: DateOptions = {}): string {
  const rng = seeds.rng(options.dob ? "DOB" : "DATE", key);
  const lead = /^\s*/.exec(source)?.[0] ?? "";
  const trail = /\s*$/.exec(source.slice(lead.length))?.[0] ?? "";
  const parsed = parseDate(source);
  if (!parsed || !isValidDate(parsed.year, parsed.month, parsed.day)) {
    return mutateDigits(source, rng);
  }
  const next = drawDate(parsed, rng, options.dob ? 3 : 2);
  return lead + parsed.render(next) + trail;
}
