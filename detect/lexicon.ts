/**
 * Word lists for the heuristic detectors, loaded once from detect/data/
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const LexiconSchema = z.object({
  roleWords: z.array(z.string().min(1)).min(1),
  nameExclusions: z.array(z.string().min(1)),
  functionWords: z.array(z.string().min(1)),
  upperStopwords: z.array(z.string().min(1)),
  orgStopwords: z.array(z.string().min(1)),
  countryCodes: z.array(z.string().length(2)).min(1),
});

export type DetectorLexicon = {
  /** Lower-cased role nouns ("buyer", "disclosing party"). */
  roles: ReadonlySet<string>;
  /** Title-case words that never start or continue a name. */
  exclusions: ReadonlySet<string>;
  functionWords: ReadonlySet<string>;
  upperStopwords: ReadonlySet<string>;
  orgStopwords: ReadonlySet<string>;
  countries: ReadonlySet<string>;
};

let cached: DetectorLexicon | null = null;

export function detectorLexicon(): DetectorLexicon {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(new URL("./data/lexicon.json", import.meta.url), "utf-8"));
  const data = LexiconSchema.parse(raw);
  cached = {
    roles: new Set(data.roleWords.map((w) => w.toLowerCase())),
    exclusions: new Set(data.nameExclusions),
    functionWords: new Set(data.functionWords),
    upperStopwords: new Set(data.upperStopwords),
    orgStopwords: new Set(data.orgStopwords),
    countries: new Set(data.countryCodes),
  };
  return cached;
}

export function isRoleWord(text: string): boolean {
  return detectorLexicon().roles.has(text.replace(/\s+/g, " ").trim().toLowerCase());
}

/** Words that break a name or organization run, in any case. */
export function isStopWord(token: string): boolean {
  const lex = detectorLexicon();
  const title = token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
  return (
    lex.functionWords.has(title) ||
    lex.exclusions.has(title) ||
    lex.upperStopwords.has(token.toUpperCase()) ||
    lex.roles.has(token.toLowerCase())
  );
}
