/**
 * Span guards
 *
 * Two filters applied after address merging. Section headings ("Prenuptial
 * Agreement", "I. The Parties:", "ARTICLE IV DEFINITIONS") are left alone, and
 * place names are only redacted where they are part of an address block.
 */

import { overlaps } from "../engine/span.js";
import type { EntityLabel, EntitySpan, OffsetPair } from "../engine/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { detectorLexicon } from "./lexicon.js";
import { splitLinesKeepEnds } from "./patterns.js";

export type GuardOptions = {
  protectHeadings: boolean;
  gpeOutsideAddresses: boolean;
  logger?: Logger;
};

const HEADING_PROTECTED: ReadonlySet<EntityLabel> = new Set(["PERSON", "ORG", "GPE", "LOC", "ALIAS_LABEL"]);
const PLACE_LABELS: ReadonlySet<EntityLabel> = new Set(["GPE", "LOC"]);

const ROMAN_HEADING_RX = /^[IVXLCDM]+\.\s+(?:[A-Z][a-z]+\s+){0,7}[A-Z][a-z]+:?$/;
const MIN_HEADING_TOKENS = 2;
const MAX_HEADING_TOKENS = 6;

function bareToken(token: string): string {
  return token.replace(/^[.:;,'"-]+|[.:;,'"-]+$/g, "");
}

function isTitleToken(token: string): boolean {
  const base = bareToken(token);
  const first = base.charAt(0);
  const rest = base.slice(1);
  return (
    first !== first.toLowerCase() &&
    first === first.toUpperCase() &&
    rest !== rest.toUpperCase() &&
    rest === rest.toLowerCase()
  );
}

function isBoilerplateToken(token: string): boolean {
  const bare = bareToken(token);
  const { exclusions, upperStopwords } = detectorLexicon();
  const title = bare.charAt(0).toUpperCase() + bare.slice(1).toLowerCase();
  return exclusions.has(title) || upperStopwords.has(bare.toUpperCase());
}

/**
 * Title-case and upper-case lines need a boilerplate word ("Agreement",
 * "ARTICLE") to count. A colon followed by more text makes a labelled line
 * ("Witness: Jane Roe"), never a heading.
 */
function isHeading(line: string): boolean {
  if (/:\s*\S/.test(line)) return false;
  if (ROMAN_HEADING_RX.test(line)) return true;
  const tokens = line.split(/\s+/);
  if (tokens.length < MIN_HEADING_TOKENS || tokens.length > MAX_HEADING_TOKENS) return false;
  if (!tokens.some(isBoilerplateToken)) return false;
  return tokens.every(isTitleToken) || (/[A-Z]/.test(line) && line === line.toUpperCase());
}

/** Ranges of heading lines, terminator included. */
export function findHeadingRanges(text: string): OffsetPair[] {
  const ranges: OffsetPair[] = [];
  let offset = 0;
  for (const { body, eol } of splitLinesKeepEnds(text)) {
    const end = offset + body.length + eol.length;
    const stripped = body.trim();
    if (stripped && isHeading(stripped)) ranges.push([offset, end]);
    offset = end;
  }
  return ranges;
}

function isProtectedByHeading(span: EntitySpan, headings: readonly OffsetPair[]): boolean {
  if (!HEADING_PROTECTED.has(span.label)) return false;
  return headings.some(([start, end]) => span.start >= start && span.end <= end);
}

export function guardSpans(text: string, spans: readonly EntitySpan[], options: GuardOptions): EntitySpan[] {
  const logger = options.logger ?? silentLogger;
  const headings = options.protectHeadings ? findHeadingRanges(text) : [];
  const blocks = spans.filter((sp) => sp.label === "ADDRESS_BLOCK");

  const kept: EntitySpan[] = [];
  for (const span of spans) {
    if (isProtectedByHeading(span, headings)) {
      logger.debug?.(`guard: ${span.label} [${span.start}, ${span.end}) is inside a heading`);
      continue;
    }
    if (options.gpeOutsideAddresses && PLACE_LABELS.has(span.label) && !blocks.some((b) => overlaps(span, b))) {
      logger.debug?.(`guard: ${span.label} [${span.start}, ${span.end}) is outside any address block`);
      continue;
    }
    kept.push(span);
  }
  return kept;
}
