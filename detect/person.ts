/**
 * Person name detector
 *
 * Scans each line for runs of capitalized tokens, initials and name particles
 * and scores each run with `scorePersonName`. A run that follows an honorific
 * and holds a single name ("Mr. Doe") is kept as a surname-only mention.
 */

import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan } from "../engine/types.js";
import { placeLexicon } from "../pseudo/lexicon.js";
import { isHonorific, isNameSuffix, NAME_PARTICLES } from "../pseudo/names.js";
import { detectorLexicon, isRoleWord, isStopWord } from "./lexicon.js";
import { buildLineIndex } from "./patterns.js";

export const PERSON_THRESHOLD = 0.6;
export const PERSON_MAX_CONFIDENCE = 0.95;
export const SURNAME_ONLY_CONFIDENCE = 0.85;

// Dotted abbreviations ("L.L.C.", "N.A.") are one token
const TOKEN_RX = /(?:[A-Za-z]\.){2,}|[A-Za-z][A-Za-z'’-]*\.?/g;
const CORE_RX = /^[A-Z][A-Za-z'’-]*[A-Za-z]$/;
const INITIAL_RX = /^[A-Z]\.?$/;
const SKIP_LINE_RX = /^\s*(?:#|\*\*)/;
const ORG_WORD_RX =
  /^(?:LLC|LLP|LP|PLC|PC|NA|Inc|Incorporated|Corp|Corporation|Company|Co|Ltd|Bank|Bancorp|Trust|Group|Holdings|Partners|Associates|Foundation|University)$/i;
const ORG_FOLLOWS_RX =
  /^,?[ \t]+(?:LLC|L\.L\.C\.|LLP|LP|PLC|Inc|Incorporated|Corp|Corporation|Company|Co\.|Ltd|Bank|Trust|Group|Holdings|Partners|Associates|Foundation|University)(?![A-Za-z])/;

export type NameTokenKind = "honorific" | "suffix" | "initial" | "particle" | "core" | "role" | "other";

export function classifyNameToken(token: string): NameTokenKind {
  if (isHonorific(token)) return "honorific";
  if (isNameSuffix(token)) return "suffix";
  // "A" and "I" read as words more often than as initials
  if (INITIAL_RX.test(token) && (token.endsWith(".") || (token !== "A" && token !== "I"))) return "initial";
  if (NAME_PARTICLES.has(token)) return "particle";
  const bare = token.replace(/\.$/, "");
  if (isRoleWord(bare)) return "role";
  if (ORG_WORD_RX.test(bare.replace(/\./g, ""))) return "other";
  if (CORE_RX.test(bare) && !isStopWord(bare)) return "core";
  return "other";
}

// =============================================================================
// Scoring
// =============================================================================

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Likelihood in [0, 1] that `tokens` spell a person's name. Two name tokens
 * score exactly the detection threshold.
 */
export function scorePersonName(tokens: readonly string[]): number {
  const kinds = tokens.map(classifyNameToken);
  const count = (kind: NameTokenKind) => kinds.filter((k) => k === kind).length;
  const core = count("core");
  const initials = count("initial");

  let score = 0;
  if (core >= 2 || (core >= 1 && initials >= 1)) score += 0.45;
  if (core >= 2) score += 0.15 + 0.15 * Math.min(2, core - 2);
  if (core >= 1 && initials >= 1 && initials <= 2) score += 0.15;
  if (count("particle") > 0) score += 0.1;
  if (count("suffix") > 0) score += 0.05;
  if (tokens.some((t) => /\d/.test(t))) score -= 0.25;

  const upper = tokens.length > 1 && tokens.every((t) => t === t.toUpperCase() && /[A-Z]/.test(t));
  const { upperStopwords } = detectorLexicon();
  if (upper && tokens.some((t) => upperStopwords.has(t.replace(/\.$/, "")))) score -= 0.2;
  if (tokens.length === 1 && kinds[0] === "role") score -= 0.3;

  return round2(Math.min(1, Math.max(0, score)));
}

// =============================================================================
// Runs
// =============================================================================

type Token = { start: number; end: number; text: string; kind: NameTokenKind };

function lineTokens(lineText: string, offset: number): Token[] {
  const out: Token[] = [];
  for (const m of lineText.matchAll(TOKEN_RX)) {
    const start = offset + (m.index ?? 0);
    let text = m[0];
    const kind = classifyNameToken(text);
    // Sentence punctuation after a plain word is not part of the name
    if (text.endsWith(".") && (kind === "core" || kind === "particle" || kind === "role" || kind === "other")) {
      text = text.slice(0, -1);
    }
    out.push({ start, end: start + text.length, text, kind });
  }
  return out;
}

function nameRuns(text: string, tokens: readonly Token[]): Token[][] {
  const runs: Token[][] = [];
  let run: Token[] = [];
  const flush = () => {
    if (run.length > 0) runs.push(run);
    run = [];
  };

  for (const tok of tokens) {
    const prev = run[run.length - 1];
    if (prev) {
      const gap = text.slice(prev.end, tok.start);
      const joinable = /^[ \t]+$/.test(gap) || (tok.kind === "suffix" && /^,[ \t]+$/.test(gap));
      if (!joinable) flush();
    }
    switch (tok.kind) {
      case "honorific":
        flush();
        run.push(tok);
        break;
      case "suffix":
        if (run.some((t) => t.kind === "core")) run.push(tok);
        flush();
        break;
      case "particle":
        if (run.length > 0) run.push(tok);
        break;
      case "initial":
      case "core":
        run.push(tok);
        break;
      default:
        flush();
    }
  }
  flush();

  return runs.map((r) => {
    let end = r.length;
    while (end > 0 && r[end - 1].kind === "particle") end--;
    return r.slice(0, end);
  });
}

// =============================================================================
// Detector
// =============================================================================

let placeNames: ReadonlySet<string> | null = null;

/** City and state names, which the gazetteer labels as places instead. */
export function knownPlaceNames(): ReadonlySet<string> {
  if (!placeNames) {
    const places = placeLexicon();
    placeNames = new Set([...places.cities.map((c) => c.city), ...places.majorCities, ...places.stateNames]);
  }
  return placeNames;
}

function personSpan(text: string, run: readonly Token[], lineEnd: number): EntitySpan | null {
  const honorific = run[0]?.kind === "honorific" ? run[0] : null;
  const names = honorific ? run.slice(1) : run;
  if (names.length === 0) return null;

  const start = run[0].start;
  const end = run[run.length - 1].end;
  if (ORG_FOLLOWS_RX.test(text.slice(end, lineEnd))) return null;
  if (knownPlaceNames().has(names.map((t) => t.text).join(" "))) return null;

  const cores = names.filter((t) => t.kind === "core").length;
  const suffix = names.find((t) => t.kind === "suffix")?.text ?? null;
  if (honorific && cores === 1 && names.every((t) => t.kind === "core" || t.kind === "suffix")) {
    return spanFromText(text, start, end, {
      label: "PERSON",
      source: "person",
      confidence: SURNAME_ONLY_CONFIDENCE,
      attrs: { surname_only: true, honorific: honorific.text, suffix, score: null },
    });
  }

  const score = scorePersonName(names.map((t) => t.text));
  if (score < PERSON_THRESHOLD) return null;
  return spanFromText(text, start, end, {
    label: "PERSON",
    source: "person",
    confidence: Math.min(PERSON_MAX_CONFIDENCE, score),
    attrs: { surname_only: false, honorific: honorific?.text ?? null, suffix, score },
  });
}

export function createPersonDetector(): Detector {
  return {
    name: () => "person",
    detect(text) {
      const spans: EntitySpan[] = [];
      for (const line of buildLineIndex(text)) {
        if (SKIP_LINE_RX.test(line.text)) continue;
        for (const run of nameRuns(text, lineTokens(line.text, line.start))) {
          const span = personSpan(text, run, line.end);
          if (span) spans.push(span);
        }
      }
      return spans;
    },
  };
}
