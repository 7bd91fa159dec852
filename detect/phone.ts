/**
 * Phone number detector
 *
 * North American numbers, with or without a leading `+1`/`1`, and `+CC`
 * international numbers. Candidates inside a statute reference (`§ 212-555`),
 * after `No.` or touching an `@` are dropped; the span merger sorts out any
 * remaining overlap with account numbers.
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan } from "../engine/types.js";
import { rtrimIndex } from "./patterns.js";

export const PHONE_CONFIDENCE_GROUPED = 0.99;
export const PHONE_CONFIDENCE_BARE = 0.9;

// Separators never cross a line break
const NANP_RX =
  /(?<![\w+@])(\+?1[-. ]?)?(\( ?[2-9]\d{2} ?\)|[2-9]\d{2})[-. ]?([2-9]\d{2})[-. ]?(\d{4})(?: *(?:x|ext\.?) *(\d{1,5}))?(?![\w@])/g;
const INTL_RX = /(?<![\w+@])\+([2-9]\d{0,2})([-. ]?\(?\d{1,4}\)?(?:[-. ]?\d{2,4}){2,4})(?![\w@])/g;
const NO_PREFIX_RX = /No\.\s*$/i;

// Two-digit country calling codes; `7` is the only one-digit code outside NANP
const TWO_DIGIT_CODES = new Set([
  "20", "27", "30", "31", "32", "33", "34", "36", "39", "40", "41", "43", "44", "45", "46", "47", "48", "49",
  "51", "52", "53", "54", "55", "56", "57", "58", "60", "61", "62", "63", "64", "65", "66", "81", "82", "84",
  "86", "90", "91", "92", "93", "94", "95", "98",
]);

/** `explicit` is the code as written when a separator follows it. */
function countryCodeOf(digits: string, explicit: string | null): string {
  if (explicit) return explicit;
  if (digits.startsWith("7")) return "7";
  if (TWO_DIGIT_CODES.has(digits.slice(0, 2))) return digits.slice(0, 2);
  return digits.slice(0, 3);
}

function rejected(text: string, start: number, end: number): boolean {
  const body = text.slice(start, end);
  if (body.includes("@") || body.includes("§")) return true;
  if (text.slice(Math.max(0, start - 2), start).includes("§")) return true;
  return NO_PREFIX_RX.test(text.slice(Math.max(0, start - 5), start));
}

function isGrouped(raw: string): boolean {
  return /[-.\s()+]/.test(raw);
}

export function createPhoneDetector(): Detector {
  return {
    name: () => "phone",
    detect(text) {
      const byRange = new Map<string, EntitySpan>();
      const push = (start: number, rawEnd: number, attrs: Record<string, unknown>) => {
        const end = rtrimIndex(text, rawEnd, start);
        if (end <= start || rejected(text, start, end)) return;
        const key = `${start}:${end}`;
        if (byRange.has(key)) return;
        const raw = text.slice(start, end);
        byRange.set(
          key,
          spanFromText(text, start, end, {
            label: "PHONE",
            source: "phone",
            confidence: isGrouped(raw) ? PHONE_CONFIDENCE_GROUPED : PHONE_CONFIDENCE_BARE,
            attrs,
          }),
        );
      };

      for (const m of text.matchAll(NANP_RX)) {
        const start = m.index ?? 0;
        const [whole, trunk, area, exchange, line, ext] = m;
        const areaDigits = area.replace(/\D/g, "");
        push(start, start + whole.length, {
          e164: `+1${areaDigits}${exchange}${line}`,
          national: `${areaDigits}${exchange}${line}`,
          country_code: 1,
          region_code: "US",
          had_plus: (trunk ?? "").startsWith("+"),
          extension: ext ?? null,
        });
      }

      for (const m of text.matchAll(INTL_RX)) {
        const start = m.index ?? 0;
        const [whole, code, rest] = m;
        const digits = code + rest.replace(/\D/g, "");
        if (digits.length < 8 || digits.length > 15) continue;
        const countryCode = countryCodeOf(digits, /^[-. (]/.test(rest) ? code : null);
        push(start, start + whole.length, {
          e164: `+${digits}`,
          national: digits.slice(countryCode.length),
          country_code: Number(countryCode),
          region_code: null,
          had_plus: true,
          extension: null,
        });
      }

      return [...byRange.values()].sort((a, b) => a.start - b.start || a.end - b.end);
    },
  };
}
