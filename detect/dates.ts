/**
 * Date detectors
 *
 * `date_generic` finds calendar dates in a few high-precision shapes:
 *
 *   July 4, 1982 / Jul. 4th 1982    month name first
 *   4 July 1982 / 4th of July 1982   day first
 *   1982-07-04                       ISO
 *   7/4/1982, 7-4-1982               numeric, month first
 *
 * Impossible dates are still reported, with `normalized: null`.
 *
 * `date_dob` promotes a date to `DOB` when a birth cue precedes it: an
 * explicit trigger (`DOB`, `Date of Birth`, `birthdate`) right before the date
 * or at the end of the previous line, or `born` within 40 characters on the
 * same line or anywhere on the previous line.
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan, SpanAttrs } from "../engine/types.js";
import { isValidDate, MONTH_PATTERN, monthNumber } from "../pseudo/dates.js";
import { buildLineIndex, lineIndexAt, rtrimIndex } from "./patterns.js";

export const DATE_NAMED_CONFIDENCE = 0.97;
export const DATE_NUMERIC_CONFIDENCE = 0.94;
export const DOB_TRIGGER_CONFIDENCE = 0.99;
export const DOB_BORN_CONFIDENCE = 0.98;

const BORN_WINDOW = 40;

const MONTH_FIRST_RX = new RegExp(
  `\\b(${MONTH_PATTERN})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`,
  "gi",
);
const DAY_FIRST_RX = new RegExp(
  `\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?(${MONTH_PATTERN})\\.?,?\\s+(\\d{4})\\b`,
  "gi",
);
const ISO_RX = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
const MDY_RX = /\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/g;

export type DateFormat = "month_name_mdY" | "month_name_dmY" | "iso" | "mdY_numeric";

type DateParts = { year: number; month: number | undefined; day: number };

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function normalizeDateParts({ year, month, day }: DateParts): {
  normalized: string | null;
  components: Record<string, string> | null;
} {
  if (month === undefined || !isValidDate(year, month, day)) return { normalized: null, components: null };
  const components = { year: pad(year, 4), month: pad(month, 2), day: pad(day, 2) };
  return { normalized: `${components.year}-${components.month}-${components.day}`, components };
}

// =============================================================================
// Generic dates
// =============================================================================

export function createDateGenericDetector(): Detector {
  return {
    name: () => "date_generic",
    detect(text) {
      const byRange = new Map<string, EntitySpan>();
      const add = (m: RegExpMatchArray, format: DateFormat, parts: DateParts, confidence: number) => {
        const start = m.index ?? 0;
        const end = rtrimIndex(text, start + m[0].length, start);
        const key = `${start}:${end}`;
        if (byRange.has(key)) return;
        const { normalized, components } = normalizeDateParts(parts);
        const attrs: SpanAttrs = { format, normalized, ...(components ? { components } : {}) };
        byRange.set(key, spanFromText(text, start, end, { label: "DATE_GENERIC", source: "date_generic", confidence, attrs }));
      };

      for (const m of text.matchAll(MONTH_FIRST_RX)) {
        add(m, "month_name_mdY", { year: Number(m[3]), month: monthNumber(m[1]), day: Number(m[2]) }, DATE_NAMED_CONFIDENCE);
      }
      for (const m of text.matchAll(DAY_FIRST_RX)) {
        add(m, "month_name_dmY", { year: Number(m[3]), month: monthNumber(m[2]), day: Number(m[1]) }, DATE_NAMED_CONFIDENCE);
      }
      for (const m of text.matchAll(ISO_RX)) {
        add(m, "iso", { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }, DATE_NAMED_CONFIDENCE);
      }
      for (const m of text.matchAll(MDY_RX)) {
        add(m, "mdY_numeric", { year: Number(m[3]), month: Number(m[1]), day: Number(m[2]) }, DATE_NUMERIC_CONFIDENCE);
      }
      return [...byRange.values()].sort((a, b) => a.start - b.start || a.end - b.end);
    },
  };
}

// =============================================================================
// Dates of birth
// =============================================================================

const TRIGGERS: ReadonlyArray<[RegExp, string]> = [
  [/\bD(?:\.\s*O\.\s*B\.?|OB)(?![A-Za-z])/gi, "dob"],
  [/\bdate\s+of\s+birth\b/gi, "date_of_birth"],
  [/\bbirth\s*date\b/gi, "birthdate"],
];
const BORN_RX = /\bborn\b/i;
// Allowed between a trigger and its date: a colon, dashes and spaces
const TRIGGER_GAP_RX = /^[\s:\-\u2013\u2014]{0,3}$/;

type Trigger = { start: number; end: number; name: string };

function triggersIn(line: string, offset: number): Trigger[] {
  const out: Trigger[] = [];
  for (const [rx, name] of TRIGGERS) {
    for (const m of line.matchAll(rx)) {
      const start = offset + (m.index ?? 0);
      out.push({ start, end: start + m[0].length, name });
    }
  }
  return out.sort((a, b) => a.start - b.start);
}

export function createDobDetector(dates: Detector = createDateGenericDetector()): Detector {
  return {
    name: () => "date_dob",
    detect(text, context) {
      const candidates = dates.detect(text, context).filter((d) => typeof d.attrs.normalized === "string");
      if (candidates.length === 0) return [];
      const lines = buildLineIndex(text);
      const byLine = new Map<number, EntitySpan[]>();
      for (const d of candidates) {
        const line = lineIndexAt(lines, d.start);
        byLine.set(line, [...(byLine.get(line) ?? []), d]);
      }

      const found = new Map<EntitySpan, { confidence: number; trigger: string; scope: "same_line" | "prev_line" }>();
      let pending: string | null = null;

      lines.forEach((line, lineNo) => {
        const entries = byLine.get(lineNo) ?? [];
        let next = 0;

        // A trigger ending the previous line claims this line's leading date
        if (pending && entries.length > 0 && text.slice(line.start, entries[0].start).trim() === "") {
          found.set(entries[0], { confidence: DOB_TRIGGER_CONFIDENCE, trigger: pending, scope: "prev_line" });
          next = 1;
        }
        pending = null;

        for (const trigger of triggersIn(line.text, line.start)) {
          while (next < entries.length && entries[next].start < trigger.end) next++;
          if (next >= entries.length) {
            if (/^[\s:\-\u2013\u2014]*$/.test(text.slice(trigger.end, line.end))) pending = trigger.name;
            break;
          }
          const date = entries[next];
          const gap = text.slice(trigger.end, date.start);
          if (gap.includes(".") || !TRIGGER_GAP_RX.test(gap)) continue;
          found.set(date, { confidence: DOB_TRIGGER_CONFIDENCE, trigger: trigger.name, scope: "same_line" });
          next++;
        }
      });

      for (const date of candidates) {
        if (found.has(date)) continue;
        const lineNo = lineIndexAt(lines, date.start);
        const line = lines[lineNo];
        if (BORN_RX.test(text.slice(Math.max(line.start, date.start - BORN_WINDOW), date.start))) {
          found.set(date, { confidence: DOB_BORN_CONFIDENCE, trigger: "born", scope: "same_line" });
        } else if (lineNo > 0 && BORN_RX.test(lines[lineNo - 1].text)) {
          found.set(date, { confidence: DOB_BORN_CONFIDENCE, trigger: "born", scope: "prev_line" });
        }
      }

      return [...found.entries()]
        .map(([date, hit]) =>
          spanFromText(text, date.start, date.end, {
            label: "DOB",
            source: "date_dob",
            confidence: hit.confidence,
            attrs: {
              normalized: date.attrs.normalized,
              components: date.attrs.components ?? null,
              trigger: hit.trigger,
              line_scope: hit.scope,
            },
          }),
        )
        .sort((a, b) => a.start - b.start);
    },
  };
}
