/**
 * US address detection
 *
 * The detector classifies one line at a time (street, unit, city/state/zip or
 * PO box) after trimming wrapping punctuation and a `Label:` prefix. A street
 * and a city/state/zip sharing one line ("12 Elm St, Dover, DE 19901") come
 * out as two line spans.
 *
 * `mergeAddressLines` then folds stacked lines ending in a city/state/zip line
 * into one block span; lines it does not merge are kept as they are.
 */

import { attrString, compareByStart, spanFromText } from "../engine/span.js";
import { isAddressLineKind, type AddressLineKind, type Detector, type EntitySpan } from "../engine/types.js";
import {
  buildLineIndex,
  lineIndexAt,
  LEFT_WRAP_CHARS,
  parseAddressLine,
  rtrimIndex,
  type AddressLineParse,
  type LineInfo,
} from "./patterns.js";

export const ADDRESS_SOURCE = "address";
export const ADDRESS_MERGE_SOURCE = "address_block_merge";

const LINE_CONFIDENCE: Record<AddressLineKind, number> = {
  street: 0.9,
  unit: 0.85,
  city_state_zip: 0.93,
  po_box: 0.95,
};
export const BLOCK_CONFIDENCE = 0.97;

const LABEL_PREFIX_RX = /^[A-Z][A-Za-z ]{0,30}:[ \t]*/;

// =============================================================================
// Line detector
// =============================================================================

type Hit = { start: number; end: number; parse: AddressLineParse; trimmedPrefix: string };

/** Bounds of `line` without wrapping punctuation and a leading label. */
function trimLine(line: LineInfo): { start: number; end: number; prefix: string } {
  const { text } = line;
  let start = 0;
  while (start < text.length && (/\s/.test(text[start]) || LEFT_WRAP_CHARS.includes(text[start]))) start++;
  let end = text.length;
  while (end > start && /\s/.test(text[end - 1])) end--;
  end = rtrimIndex(text, end, start);

  const label = LABEL_PREFIX_RX.exec(text.slice(start, end));
  const prefix = label ? label[0] : "";
  return { start: line.start + start + prefix.length, end: line.start + end, prefix };
}

/** A street followed by `, City, ST 12345` on the same line. */
function splitInline(text: string, start: number, end: number): Hit[] {
  const body = text.slice(start, end);
  for (let comma = body.indexOf(", "); comma >= 0; comma = body.indexOf(", ", comma + 1)) {
    const tail = parseAddressLine(body.slice(comma + 2));
    if (tail?.kind !== "city_state_zip") continue;
    const head = body.slice(0, comma);
    for (const m of head.matchAll(/(?<![\w-])\d/g)) {
      const from = m.index ?? 0;
      const street = parseAddressLine(head.slice(from));
      if (street?.kind !== "street") continue;
      return [
        { start: start + from, end: start + comma, parse: street, trimmedPrefix: "" },
        { start: start + comma + 2, end, parse: tail, trimmedPrefix: "" },
      ];
    }
  }
  return [];
}

function lineHits(text: string, line: LineInfo): Hit[] {
  const { start, end, prefix } = trimLine(line);
  if (end <= start) return [];
  const parse = parseAddressLine(text.slice(start, end));
  if (parse) return [{ start, end, parse, trimmedPrefix: prefix }];
  return splitInline(text, start, end);
}

export function createAddressDetector(): Detector {
  return {
    name: () => ADDRESS_SOURCE,
    detect(text) {
      return buildLineIndex(text).flatMap((line) =>
        lineHits(text, line).map((hit) =>
          spanFromText(text, hit.start, hit.end, {
            label: "ADDRESS_BLOCK",
            source: ADDRESS_SOURCE,
            confidence: LINE_CONFIDENCE[hit.parse.kind],
            attrs: {
              line_kind: hit.parse.kind,
              components: hit.parse.components,
              normalized: hit.parse.normalized,
              trimmed_prefix: hit.trimmedPrefix || null,
            },
          }),
        ),
      );
    },
  };
}

// =============================================================================
// Block merge
// =============================================================================

type LineSpan = { span: EntitySpan; kind: AddressLineKind; line: number };

function zipKind(span: EntitySpan): "zip5" | "zip9" {
  return /\d{5}-\d{4}$/.test(span.text) ? "zip9" : "zip5";
}

function mergeGroup(text: string, group: readonly LineSpan[]): EntitySpan {
  const first = group[0].span;
  const last = group[group.length - 1].span;
  let hadBlank = false;
  for (let i = 1; i < group.length; i++) {
    if (group[i].line - group[i - 1].line === 2) hadBlank = true;
  }
  return spanFromText(text, first.start, last.end, {
    label: "ADDRESS_BLOCK",
    source: ADDRESS_MERGE_SOURCE,
    confidence: BLOCK_CONFIDENCE,
    attrs: {
      lines: group.map(({ span, kind }) => ({ kind, text: span.text, start: span.start, end: span.end })),
      line_kinds: group.map((g) => g.kind),
      zip_kind: zipKind(last),
      had_blank_line_between: hadBlank,
      normalized: group.map((g) => attrString(g.span.attrs, "normalized") ?? g.span.text).join(", "),
    },
  });
}

/**
 * Fold consecutive street/unit/PO box lines that end in a city/state/zip line
 * into one `ADDRESS_BLOCK` span. At most one blank line may separate two
 * stacked lines. Spans that are not address lines pass through untouched.
 */
export function mergeAddressLines(text: string, spans: readonly EntitySpan[]): EntitySpan[] {
  const lines = buildLineIndex(text);
  const isBlank = (i: number) => lines[i].text.trim() === "";

  const perLine = new Map<number, LineSpan[]>();
  const others: EntitySpan[] = [];
  for (const span of spans) {
    const kind = span.attrs.line_kind;
    if (span.label !== "ADDRESS_BLOCK" || span.source !== ADDRESS_SOURCE || !isAddressLineKind(kind)) {
      others.push(span);
      continue;
    }
    const line = lineIndexAt(lines, span.start);
    const bucket = perLine.get(line) ?? [];
    bucket.push({ span, kind, line });
    perLine.set(line, bucket);
  }

  // Only lines holding exactly one address span can stack
  const stackable = [...perLine.values()]
    .filter((bucket) => bucket.length === 1)
    .map((bucket) => bucket[0])
    .sort((a, b) => a.line - b.line);
  const shared = [...perLine.values()].filter((bucket) => bucket.length > 1).flat();

  const out: EntitySpan[] = [...others, ...shared.map((l) => l.span)];
  let run: LineSpan[] = [];
  const flush = () => {
    out.push(...run.map((l) => l.span));
    run = [];
  };

  for (const current of stackable) {
    const prev = run[run.length - 1];
    const adjacent =
      prev !== undefined &&
      (current.line === prev.line + 1 || (current.line === prev.line + 2 && isBlank(prev.line + 1)));
    if (!adjacent) flush();

    if (current.kind === "city_state_zip") {
      if (run.length > 0) {
        out.push(mergeGroup(text, [...run, current]));
        run = [];
      } else {
        out.push(current.span);
      }
      continue;
    }
    run.push(current);
  }
  flush();
  return out.sort(compareByStart);
}
