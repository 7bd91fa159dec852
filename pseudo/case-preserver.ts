/**
 * Case and punctuation mirroring between a source string and a replacement
 */

import type { SeededRng } from "../engine/rng.js";

const ALNUM = /[\p{L}\p{N}]/u;
const LETTER = /\p{L}/u;
const LEADING_PUNCT = /^[^\p{L}\p{N}]*/u;
const TRAILING_PUNCT = /[^\p{L}\p{N}]*$/u;
const POSSESSIVE = /(?<=\p{L})['’][sS]$/u;
export const INITIALS_PATTERN = /^(?:[A-Za-z][.\- ]+)+[A-Za-z][.]?$/;

function isAlnum(ch: string): boolean {
  return ALNUM.test(ch);
}

function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

/** Upper after a non-letter, lower after a letter. */
function isTitleCase(text: string): boolean {
  let prevLetter = false;
  let sawLetter = false;
  for (const ch of text) {
    if (isLetter(ch)) {
      sawLetter = true;
      if (prevLetter ? !isLower(ch) && isUpper(ch) : !isUpper(ch)) return false;
      prevLetter = true;
    } else {
      prevLetter = false;
    }
  }
  return sawLetter;
}

export function toTitleCase(text: string): string {
  let out = "";
  let prevLetter = false;
  for (const ch of text) {
    if (isLetter(ch)) {
      out += prevLetter ? ch.toLowerCase() : ch.toUpperCase();
      prevLetter = true;
    } else {
      out += ch;
      prevLetter = false;
    }
  }
  return out;
}

// =============================================================================
// Case
// =============================================================================

/**
 * Mirror the aggregate case of `source` onto `candidate`. Mixed-case sources
 * that are not title case cycle their per-letter pattern over the candidate.
 */
export function matchCase(source: string, candidate: string): string {
  const letters = [...source].filter(isLetter);
  const cased = letters.filter((ch) => isUpper(ch) || isLower(ch));
  if (cased.length === 0) return candidate;

  if (cased.every(isUpper)) return candidate.toUpperCase();
  if (cased.every(isLower)) return candidate.toLowerCase();
  if (isTitleCase(source)) return toTitleCase(candidate);

  const pattern = cased.map(isUpper);
  let idx = 0;
  let out = "";
  for (const ch of candidate) {
    if (isLetter(ch)) {
      out += pattern[idx % pattern.length] ? ch.toUpperCase() : ch.toLowerCase();
      idx++;
    } else {
      out += ch;
    }
  }
  return out;
}

// =============================================================================
// Shape
// =============================================================================

type PunctRun = { offset: number; run: string };

/** Non-alphanumeric runs keyed by the count of alphanumerics before them. */
function interiorRuns(core: string): { alnum: string[]; runs: PunctRun[] } {
  const alnum: string[] = [];
  const runs: PunctRun[] = [];
  let current = "";
  for (const ch of core) {
    if (isAlnum(ch)) {
      if (current) {
        runs.push({ offset: alnum.length, run: current });
        current = "";
      }
      alnum.push(ch);
    } else {
      current += ch;
    }
  }
  // A trailing run cannot exist: `core` has its outer punctuation stripped.
  return { alnum, runs };
}

function placeRuns(runs: PunctRun[], boundaries: number[], letterCount: number): number[] {
  const used = new Set<number>();
  const targets: number[] = [];
  let prev = 0;
  runs.forEach((run, i) => {
    const remaining = runs.length - i - 1;
    const lo = prev + 1;
    const hi = letterCount - 1 - remaining;
    let best: number | null = null;
    for (const b of boundaries) {
      if (b < lo || b > hi || used.has(b)) continue;
      if (best === null || Math.abs(b - run.offset) < Math.abs(best - run.offset)) best = b;
    }
    const target = best ?? Math.min(Math.max(run.offset, lo), hi);
    used.add(target);
    targets.push(target);
    prev = target;
  });
  return targets;
}

function formatInitials(core: string, candidate: string, rng?: SeededRng): string {
  const initials = candidate
    .split(/[\s.\-]+/)
    .map((tok) => [...tok].find(isLetter))
    .filter((ch): ch is string => ch !== undefined)
    .map((ch) => ch.toUpperCase());

  let idx = 0;
  let out = "";
  for (const ch of core) {
    if (!isLetter(ch)) {
      out += ch;
      continue;
    }
    let initial: string;
    if (idx < initials.length) {
      initial = initials[idx];
    } else if (rng) {
      initial = rng.upperLetter();
    } else {
      initial = initials[initials.length - 1] ?? "X";
    }
    out += isLower(ch) ? initial.toLowerCase() : initial;
    idx++;
  }
  return out;
}

export type FormatOptions = {
  rng?: SeededRng;
};

/**
 * Shape `candidate` like `source`: outer punctuation, interior punctuation
 * positions, possessive marker, initials and case.
 */
export function formatLike(source: string, candidate: string, options: FormatOptions = {}): string {
  if (!source) return candidate;
  if (![...source].some(isAlnum)) return candidate;

  const lead = LEADING_PUNCT.exec(source)?.[0] ?? "";
  const trail = TRAILING_PUNCT.exec(source)?.[0] ?? "";
  let core = source.slice(lead.length, source.length - trail.length);

  let possessive = "";
  const poss = POSSESSIVE.exec(core);
  if (poss && core.length > poss[0].length + 1) {
    possessive = poss[0];
    core = core.slice(0, core.length - possessive.length);
  }

  if (INITIALS_PATTERN.test(core)) {
    return lead + formatInitials(core, candidate, options.rng) + possessive + trail;
  }

  const { runs } = interiorRuns(core);
  const cand = interiorRuns(candidate.replace(LEADING_PUNCT, "").replace(TRAILING_PUNCT, ""));
  let letters = cand.alnum;
  if (letters.length === 0) return lead + candidate + possessive + trail;
  while (letters.length < runs.length + 1) {
    letters = letters.concat(cand.alnum);
  }

  const boundaries = cand.runs.map((r) => r.offset);
  const targets = placeRuns(runs, boundaries, letters.length);

  let shaped = "";
  let runIdx = 0;
  letters.forEach((ch, i) => {
    while (runIdx < targets.length && targets[runIdx] === i) {
      shaped += runs[runIdx].run;
      runIdx++;
    }
    shaped += ch;
  });

  return lead + matchCase(core, shaped) + possessive + trail;
}
