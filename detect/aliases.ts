/**
 * Alias definition detector
 *
 * Finds the places where a document introduces another name for a party:
 *
 *   John Doe, hereinafter "Morgan"
 *   Acme Widgets LLC (the "Company")
 *   Jane Roe a/k/a "JR"
 *
 * Each definition becomes an `ALIAS_LABEL` span over the alias text. The
 * subject is taken from the capitalized name right before the trigger; when
 * the trigger opens its line, the last name on one of the two previous lines
 * is recorded as a guess instead. The alias resolver turns these into
 * clusters.
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan, SpanAttrs } from "../engine/types.js";
import { detectorLexicon, isRoleWord, isStopWord } from "./lexicon.js";
import { buildLineIndex, lineIndexAt, type LineInfo } from "./patterns.js";

export const ALIAS_SOURCE = "aliases";
export const ALIAS_SAME_LINE_CONFIDENCE = 0.99;
export const ALIAS_GUESS_CONFIDENCE = 0.97;
export const ALIAS_NO_SUBJECT_CONFIDENCE = 0.9;

const GUESS_LOOKBACK_LINES = 2;
const MAX_ALIAS_LENGTH = 60;

const QUOTES: ReadonlyArray<{ open: string; close: string; style: QuoteStyle }> = [
  { open: '"', close: '"', style: "double" },
  { open: "“", close: "”", style: "curly" },
  { open: "'", close: "'", style: "single" },
  { open: "‘", close: "’", style: "curly" },
];

export type QuoteStyle = "double" | "single" | "curly" | "none";

export type AliasTrigger = "hereinafter" | "aka" | "fka" | "dba" | "paren";

const VERBAL_TRIGGER_RX =
  /\b(?:(hereinafter)(?:[ \t]+(?:referred[ \t]+to[ \t]+as|called|known[ \t]+as))?|(a\/k\/a|aka|also[ \t]+known[ \t]+as)|(f\/k\/a|fka|formerly[ \t]+known[ \t]+as)|(d\/b\/a|dba|doing[ \t]+business[ \t]+as))(?![A-Za-z/])[ \t,:]*(?:the[ \t]+)?/gi;
const PAREN_TRIGGER_RX = /\((?:the[ \t]+|hereinafter[ \t]+(?:the[ \t]+)?)?(?=["“'‘])/gi;
const TITLE_RUN_RX = /^[A-Z][A-Za-z'’-]*(?:[ \t]+[A-Z][A-Za-z'’-]*){0,3}/;

// A capitalized name ending where the text ends
const SUBJECT_RX =
  /[A-Z][\w'’.&-]*(?:[ \t]+(?:[A-Z][\w'’.&-]*|of|and|&|de|van|von|the))*(?:,[ \t]+(?:LLC|L\.L\.C\.|Inc\.?|Corp\.?|Ltd\.?|N\.A\.))?$/;

type AliasText = { start: number; end: number; quote: QuoteStyle };

type Subject =
  | { kind: "same_line"; text: string; start: number; end: number }
  | { kind: "guess"; text: string; line: number }
  | { kind: "none" };

// =============================================================================
// Alias text
// =============================================================================

function quotedAt(text: string, pos: number): AliasText | null {
  for (const { open, close, style } of QUOTES) {
    if (!text.startsWith(open, pos)) continue;
    const from = pos + open.length;
    const closeAt = text.indexOf(close, from);
    if (closeAt <= from || closeAt - from > MAX_ALIAS_LENGTH) return null;
    if (/[\r\n]/.test(text.slice(from, closeAt))) return null;
    let start = from;
    let end = closeAt;
    while (start < end && /\s/.test(text[start])) start++;
    while (end > start && /\s/.test(text[end - 1])) end--;
    return end > start ? { start, end, quote: style } : null;
  }
  return null;
}

function unquotedAt(text: string, pos: number): AliasText | null {
  const m = TITLE_RUN_RX.exec(text.slice(pos));
  if (!m) return null;
  return { start: pos, end: pos + m[0].length, quote: "none" };
}

/** Aliases made only of boilerplate words ("the Agreement") define nothing; party roles always define one. */
function isBoilerplate(alias: string): boolean {
  if (isRoleWord(alias)) return false;
  const { exclusions, functionWords } = detectorLexicon();
  const words = alias.split(/\s+/).filter(Boolean);
  return words.every((w) => exclusions.has(w) || functionWords.has(w));
}

// =============================================================================
// Subjects
// =============================================================================

function trimSubject(text: string, start: number, end: number): { start: number; end: number } | null {
  const m = SUBJECT_RX.exec(text.slice(start, end));
  if (!m) return null;
  let from = start + (m.index ?? 0);
  // Drop leading function words ("Between John Doe")
  for (;;) {
    const word = /^\S+/.exec(text.slice(from, end));
    if (!word || !isStopWord(word[0])) break;
    const next = text.slice(from + word[0].length, end).search(/\S/);
    if (next < 0) return null;
    from += word[0].length + next;
  }
  return end > from ? { start: from, end } : null;
}

function sameLineSubject(text: string, line: LineInfo, triggerStart: number): Subject | null {
  let end = triggerStart;
  while (end > line.start && /[\s,("“”']/.test(text[end - 1])) end--;
  if (end <= line.start) return null;
  const range = trimSubject(text, line.start, end);
  if (!range) return null;
  return { kind: "same_line", text: text.slice(range.start, range.end), start: range.start, end: range.end };
}

function previousLineSubject(text: string, lines: readonly LineInfo[], lineNo: number): Subject | null {
  for (let back = 1; back <= GUESS_LOOKBACK_LINES && lineNo - back >= 0; back++) {
    const line = lines[lineNo - back];
    let end = line.end;
    while (end > line.start && /[\s,.;:("“”']/.test(text[end - 1])) end--;
    if (end <= line.start) continue;
    const range = trimSubject(text, line.start, end);
    if (range) return { kind: "guess", text: text.slice(range.start, range.end), line: lineNo - back };
  }
  return null;
}

function subjectFor(text: string, lines: readonly LineInfo[], triggerStart: number): Subject {
  const lineNo = lineIndexAt(lines, triggerStart);
  const line = lines[lineNo];
  const same = sameLineSubject(text, line, triggerStart);
  if (same) return same;
  // Fall back only when the trigger opens its line
  if (text.slice(line.start, triggerStart).trim() !== "") return { kind: "none" };
  return previousLineSubject(text, lines, lineNo) ?? { kind: "none" };
}

// =============================================================================
// Detector
// =============================================================================

function aliasSpan(text: string, alias: AliasText, trigger: AliasTrigger, subject: Subject): EntitySpan {
  const value = text.slice(alias.start, alias.end);
  const isRole = isRoleWord(value);
  const attrs: SpanAttrs = {
    alias: value,
    alias_kind: isRole ? "role" : "nickname",
    role_flag: isRole,
    quote_style: alias.quote,
    trigger,
    scope_hint: trigger === "paren" || trigger === "hereinafter" ? "definition" : "other_name",
  };
  let confidence = ALIAS_NO_SUBJECT_CONFIDENCE;
  if (subject.kind === "same_line") {
    attrs.subject_text = subject.text;
    attrs.subject_span = [subject.start, subject.end];
    confidence = ALIAS_SAME_LINE_CONFIDENCE;
  } else if (subject.kind === "guess") {
    attrs.subject_guess = subject.text;
    attrs.subject_guess_line = subject.line;
    confidence = ALIAS_GUESS_CONFIDENCE;
  }
  return spanFromText(text, alias.start, alias.end, { label: "ALIAS_LABEL", source: ALIAS_SOURCE, confidence, attrs });
}

function triggerName(m: RegExpMatchArray): AliasTrigger {
  if (m[1]) return "hereinafter";
  if (m[2]) return "aka";
  if (m[3]) return "fka";
  return "dba";
}

export function createAliasDetector(): Detector {
  return {
    name: () => ALIAS_SOURCE,
    detect(text) {
      const lines = buildLineIndex(text);
      const byRange = new Map<string, EntitySpan>();
      const add = (triggerStart: number, alias: AliasText | null, trigger: AliasTrigger) => {
        if (!alias) return;
        const value = text.slice(alias.start, alias.end);
        if (isBoilerplate(value)) return;
        const key = `${alias.start}:${alias.end}`;
        if (byRange.has(key)) return;
        byRange.set(key, aliasSpan(text, alias, trigger, subjectFor(text, lines, triggerStart)));
      };

      for (const m of text.matchAll(VERBAL_TRIGGER_RX)) {
        const start = m.index ?? 0;
        const pos = start + m[0].length;
        add(start, quotedAt(text, pos) ?? unquotedAt(text, pos), triggerName(m));
      }
      for (const m of text.matchAll(PAREN_TRIGGER_RX)) {
        const start = m.index ?? 0;
        const alias = quotedAt(text, start + m[0].length);
        // The closing parenthesis must follow the quote
        if (alias && !/^["”'’]\)/.test(text.slice(alias.end))) continue;
        add(start, alias, "paren");
      }

      return [...byRange.values()].sort((a, b) => a.start - b.start);
    },
  };
}
