/**
 * Statistical name detector
 *
 * Proper-noun runs from the wink-nlp tagger are scored with the same name
 * heuristics as the rule-based person detector. City and state names from the
 * place gazetteer are reported as `GPE`; that part needs no tagger, so it keeps
 * working when wink cannot load.
 */

import { PipelineError } from "../engine/errors.js";
import { spanFromText } from "../engine/span.js";
import type { Detector, EntitySpan } from "../engine/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { placeLexicon } from "../pseudo/lexicon.js";
import { PERSON_MAX_CONFIDENCE, PERSON_THRESHOLD, scorePersonName } from "./person.js";
import { loadWink, type WinkHandle, type WinkToken } from "./wink.js";

export const NER_SOURCE = "ner";
export const GPE_CONFIDENCE = 0.9;

export type NerOptions = {
  required?: boolean;
  logger?: Logger;
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

let gazetteer: RegExp | null = null;

function gazetteerPattern(): RegExp {
  if (gazetteer) return gazetteer;
  const places = placeLexicon();
  const names = [...new Set([...places.cities.map((c) => c.city), ...places.majorCities, ...places.stateNames])];
  // Longest first so "New York City" wins over "New York"
  names.sort((a, b) => b.length - a.length || a.localeCompare(b));
  gazetteer = new RegExp(`\\b(?:${names.map(escapeRegExp).join("|")})\\b`, "g");
  return gazetteer;
}

function gpeSpans(text: string): EntitySpan[] {
  const spans: EntitySpan[] = [];
  for (const m of text.matchAll(gazetteerPattern())) {
    const start = m.index ?? 0;
    spans.push(
      spanFromText(text, start, start + m[0].length, {
        label: "GPE",
        source: NER_SOURCE,
        confidence: GPE_CONFIDENCE,
        attrs: { gazetteer: true },
      }),
    );
  }
  return spans;
}

/** Consecutive PROPN tokens separated by spaces or tabs only. */
function properNounRuns(text: string, tokens: readonly WinkToken[]): WinkToken[][] {
  const runs: WinkToken[][] = [];
  let run: WinkToken[] = [];
  for (const tok of tokens) {
    const prev = run[run.length - 1];
    const joins = prev !== undefined && /^[ \t]+$/.test(text.slice(prev.end, tok.start));
    if (tok.pos !== "PROPN" || (prev && !joins)) {
      if (run.length > 0) runs.push(run);
      run = [];
    }
    if (tok.pos === "PROPN") run.push(tok);
  }
  if (run.length > 0) runs.push(run);
  return runs;
}

function personSpans(text: string, wink: WinkHandle): EntitySpan[] {
  const spans: EntitySpan[] = [];
  for (const run of properNounRuns(text, wink.tokenize(text))) {
    const score = scorePersonName(run.map((t) => t.text));
    if (score < PERSON_THRESHOLD) continue;
    const start = run[0].start;
    const end = run[run.length - 1].end;
    spans.push(
      spanFromText(text, start, end, {
        label: "PERSON",
        source: NER_SOURCE,
        confidence: Math.min(PERSON_MAX_CONFIDENCE, score),
        attrs: { surname_only: false, score },
      }),
    );
  }
  return spans;
}

/**
 * Fails with a `PipelineError` when wink cannot load and `required` is set;
 * otherwise warns once and reports places only.
 */
export function createNerDetector(options: NerOptions = {}): Detector {
  const logger = options.logger ?? silentLogger;
  const wink = loadWink();
  if (!wink.available) {
    if (options.required) throw new PipelineError("ner", `wink unavailable: ${wink.reason}`);
    logger.warn(`ner backend wink unavailable (${wink.reason}); places only`);
  }
  return {
    name: () => NER_SOURCE,
    detect(text) {
      const people = wink.available ? personSpans(text, wink.handle) : [];
      return [...people, ...gpeSpans(text)].sort((a, b) => a.start - b.start || a.end - b.end);
    },
  };
}
