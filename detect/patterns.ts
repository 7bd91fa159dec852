/**
 * Character tables, line helpers and US address line grammar shared by the
 * detectors and the address generators.
 */

import type { AddressLineKind } from "../engine/types.js";

// =============================================================================
// Trimming
// =============================================================================

export const RIGHT_TRIM_CHARS = ")]};:,.!?»”’>";
export const LEFT_WRAP_CHARS = "«“‘(<[{";

/** Move `end` left past trailing prose punctuation, never below `start`. */
export function rtrimIndex(text: string, end: number, start = 0): number {
  while (end > start && RIGHT_TRIM_CHARS.includes(text[end - 1])) end--;
  return end;
}

// =============================================================================
// Lines
// =============================================================================

export type LineInfo = {
  start: number;
  end: number; // exclusive, before the terminator
  text: string;
};

export function buildLineIndex(text: string): LineInfo[] {
  const lines: LineInfo[] = [];
  const re = /\r\n|\n|\r/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    lines.push({ start, end: m.index, text: text.slice(start, m.index) });
    start = m.index + m[0].length;
  }
  lines.push({ start, end: text.length, text: text.slice(start) });
  return lines;
}

export function lineIndexAt(lines: readonly LineInfo[], offset: number): number {
  let lo = 0;
  let hi = lines.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lines[mid].start <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

export function lineStarts(text: string): number[] {
  return buildLineIndex(text).map((l) => l.start);
}

export type LinePiece = { body: string; eol: string };

/** Split into lines keeping each terminator (`\n`, `\r\n`, `\r`). */
export function splitLinesKeepEnds(text: string): LinePiece[] {
  const pieces: LinePiece[] = [];
  const re = /\r\n|\n|\r/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    pieces.push({ body: text.slice(start, m.index), eol: m[0] });
    start = m.index + m[0].length;
  }
  if (start < text.length) pieces.push({ body: text.slice(start), eol: "" });
  return pieces;
}

// =============================================================================
// Address line grammar
// =============================================================================

export const STREET_SUFFIX_WORDS = [
  "Street", "St", "Avenue", "Ave", "Av", "Road", "Rd", "Boulevard", "Blvd", "Drive", "Dr",
  "Lane", "Ln", "Court", "Ct", "Way", "Place", "Pl", "Terrace", "Ter", "Circle", "Cir",
  "Parkway", "Pkwy", "Trail", "Trl", "Highway", "Hwy", "Square", "Sq", "Plaza", "Plz",
  "Pike", "Alley", "Aly", "Row", "Loop", "Crescent", "Cres",
];

const DIRECTIONAL = "(?:N|S|E|W|NE|NW|SE|SW|North|South|East|West|Northeast|Northwest|Southeast|Southwest)";
const UNIT_KEYWORD = "(?:Apt|Apartment|Suite|Ste|Unit|Rm|Room|Fl|Floor|Bldg|Building)";
const SUFFIX_ALT = STREET_SUFFIX_WORDS.join("|");

export const UNIT_TAIL_RX = new RegExp(
  `(,?\\s+)(${UNIT_KEYWORD}\\.?\\s*#?\\s*|#\\s*)([A-Za-z0-9][A-Za-z0-9-]*)$`,
  "i",
);
export const UNIT_LINE_RX = new RegExp(
  `^(${UNIT_KEYWORD}\\.?\\s*#?\\s*|#\\s*)([A-Za-z0-9][A-Za-z0-9-]*)$`,
  "i",
);
export const PO_BOX_RX = /^(P\.?\s*O\.?\s*Box|Post\s+Office\s+Box)(\s+)(\d+[A-Za-z]?)$/i;
export const CITY_STATE_ZIP_RX =
  /^([A-Z][A-Za-z.'-]*(?:[ ][A-Z][A-Za-z.'-]*){0,3})(,?\s+)([A-Z]{2})(\s+)(\d{5})(-\d{4})?$/;
export const STREET_LINE_RX = new RegExp(
  `^(\\d{1,6}[A-Za-z]?(?:-\\d{1,4})?)(\\s+)((?:${DIRECTIONAL}\\.?\\s+)?)` +
    `([A-Z0-9][A-Za-z0-9.'-]*(?:\\s+[A-Za-z0-9][A-Za-z0-9.'-]*){0,4}?)` +
    `((?:\\s+(?:${SUFFIX_ALT})\\.?)?)((?:\\s+${DIRECTIONAL}\\.?)?)$`,
  "i",
);

export type { AddressLineKind };

export type AddressLineParse = {
  kind: AddressLineKind;
  components: Record<string, string>;
  normalized: string;
};

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function parseStreet(line: string): AddressLineParse | null {
  let main = line;
  const components: Record<string, string> = {};
  const unit = UNIT_TAIL_RX.exec(line);
  if (unit) {
    main = line.slice(0, unit.index);
    components.OccupancyType = collapse(unit[2].replace(/[#.]/g, "")) || "#";
    components.OccupancyIdentifier = unit[3];
  }
  const m = STREET_LINE_RX.exec(main);
  if (!m) return null;
  const [, number, , preDir, name, suffix, postDir] = m;
  const nameWords = name.trim().split(/\s+/);
  const hasSuffix = suffix.trim() !== "";
  // Without a street type the name must look like a proper noun
  if (!hasSuffix) {
    if (nameWords.length > 2 || /^(?:19|20)\d{2}$/.test(number)) return null;
    if (!nameWords.every((w) => /^[A-Z][a-z]+$|^\d+(?:st|nd|rd|th)$/.test(w))) return null;
  }
  components.AddressNumber = number;
  if (preDir.trim()) components.StreetNamePreDirectional = preDir.trim();
  components.StreetName = name.trim();
  if (hasSuffix) components.StreetNamePostType = suffix.trim();
  if (postDir.trim()) components.StreetNamePostDirectional = postDir.trim();
  return { kind: "street", components, normalized: collapse(line) };
}

/**
 * Classify one trimmed line as an address line, or return null.
 */
export function parseAddressLine(line: string): AddressLineParse | null {
  const text = line.trim();
  if (!text) return null;

  const po = PO_BOX_RX.exec(text);
  if (po) {
    return {
      kind: "po_box",
      components: { USPSBoxType: "PO Box", USPSBoxID: po[3] },
      normalized: `PO Box ${po[3]}`,
    };
  }

  const csz = CITY_STATE_ZIP_RX.exec(text);
  if (csz) {
    const components: Record<string, string> = {
      PlaceName: csz[1],
      StateName: csz[3],
      ZipCode: csz[5] + (csz[6] ?? ""),
    };
    return { kind: "city_state_zip", components, normalized: collapse(text) };
  }

  const unit = UNIT_LINE_RX.exec(text);
  if (unit) {
    return {
      kind: "unit",
      components: {
        OccupancyType: collapse(unit[1].replace(/[#.]/g, "")) || "#",
        OccupancyIdentifier: unit[2],
      },
      normalized: collapse(text),
    };
  }

  return parseStreet(text);
}
