/**
 * wink-nlp token stream with character offsets
 *
 * The English lite model carries POS tags but no PERSON entities, so callers
 * work from PROPN runs and PRON tokens. The pipeline is built once, on first
 * use.
 */

import winkNLP from "wink-nlp";
import type { ItemToken } from "wink-nlp";
import model from "wink-eng-lite-web-model";
import type { Availability } from "../engine/types.js";

export type WinkToken = {
  start: number;
  end: number;
  text: string;
  pos: string;
};

export type WinkHandle = {
  tokenize(text: string): WinkToken[];
};

let cached: Availability<WinkHandle> | null = null;

function createHandle(): WinkHandle {
  const nlp = winkNLP(model);
  const its = nlp.its;
  return {
    tokenize(text) {
      const tokens: WinkToken[] = [];
      let offset = 0;
      nlp
        .readDoc(text)
        .tokens()
        .each((token: ItemToken) => {
          const value = String(token.out(its.value));
          offset += String(token.out(its.precedingSpaces)).length;
          // Expanded contractions and similar can drift; resync on the source text
          if (!text.startsWith(value, offset)) {
            const found = text.indexOf(value, offset);
            if (found < 0) return;
            offset = found;
          }
          tokens.push({ start: offset, end: offset + value.length, text: value, pos: String(token.out(its.pos)) });
          offset += value.length;
        });
      return tokens;
    },
  };
}

/** Loads the wink pipeline once; later calls return the same result. */
export function loadWink(): Availability<WinkHandle> {
  if (cached) return cached;
  try {
    cached = { available: true, handle: createHandle() };
  } catch (err) {
    cached = { available: false, reason: err instanceof Error ? err.message : String(err) };
  }
  return cached;
}
