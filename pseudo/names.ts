/**
 * Person, organization, bank and place-name surrogates
 */

import type { SeedSource } from "../engine/seed.js";
import type { SeededRng } from "../engine/rng.js";
import { formatLike, INITIALS_PATTERN } from "./case-preserver.js";
import { nameLexicon, placeLexicon } from "./lexicon.js";

// =============================================================================
// Name token classes
// =============================================================================

const HONORIFIC_RX = /^(?:mr|mrs|ms|mx|dr|prof|hon|sir|dame|lord|lady|rev|fr|judge|justice)\.?$/i;
const SUFFIX_RX = /^(?:jr|sr|ii|iii|iv|esq|esquire|ph\.?d|md|jd|llm|cpa)\.?,?$/i;
export const NAME_PARTICLES: ReadonlySet<string> = new Set([
  "de", "del", "della", "di", "da", "van", "von", "der", "den", "dos", "das", "du", "la", "le", "bin", "ibn",
]);
const INITIAL_RX = /^[A-Za-z]\.?$/;

export function isHonorific(token: string): boolean {
  return HONORIFIC_RX.test(token);
}

export function isNameSuffix(token: string): boolean {
  return SUFFIX_RX.test(token.replace(/,$/, ""));
}

type Part = { text: string; kind: "space" | "keep" | "initial" | "name" };

function splitPersonName(source: string): Part[] {
  return source.split(/(\s+)/).filter(Boolean).map((text): Part => {
    if (/^\s+$/.test(text)) return { text, kind: "space" };
    const bare = text.replace(/^[("“]+|[)"”,;:]+$/g, "");
    if (isHonorific(bare) || isNameSuffix(bare) || NAME_PARTICLES.has(bare)) return { text, kind: "keep" };
    if (INITIAL_RX.test(bare)) return { text, kind: "initial" };
    return { text, kind: "name" };
  });
}

function drawDistinct(rng: SeededRng, pool: readonly string[], count: number): string[] {
  return rng.shuffle(pool).slice(0, count);
}

/** One surname per hyphen-separated segment, space-joined so formatLike can re-hyphenate. */
function surnameCandidate(word: string, rng: SeededRng): string {
  const segments = word.split("-").filter(Boolean).length || 1;
  return drawDistinct(rng, nameLexicon().surnames, segments).join(" ");
}

// =============================================================================
// Person
// =============================================================================

export type PersonOptions = {
  /** Treat a single name token as a surname ("Mr. Doe", "Doe"). */
  surnameOnly?: boolean;
};

/**
 * Surrogate surname for `key`. Given names and surnames come from separate
 * streams keyed only by `key`, so every mention of one entity shares a
 * surname whatever its surface form. `shape` is the source surname; a
 * hyphenated one gets a hyphenated surrogate with as many segments.
 */
export function surnameFor(key: string, seeds: SeedSource, shape = "surname"): string {
  return surnameCandidate(shape, seeds.rng("PERSON_SURNAME", key)).split(" ").join("-");
}

/** The surname token of a full name: "Smith-Jones" in "Dr. Mary Smith-Jones Jr.". */
export function surnameOf(fullName: string): string | null {
  const names = splitPersonName(fullName).filter((p) => p.kind === "name");
  const last = names[names.length - 1];
  return last ? last.text.replace(/^[("“]+|[)"”,;:]+$/g, "") : null;
}

export function givenNameFor(key: string, seeds: SeedSource): string {
  return seeds.rng("PERSON_GIVEN", key).pick(nameLexicon().given);
}

export function personLike(source: string, key: string, seeds: SeedSource, options: PersonOptions = {}): string {
  const core = source.trim();
  if (INITIALS_PATTERN.test(core.replace(/^[("“]+|[)"”]+$/g, ""))) {
    const rng = seeds.rng("PERSON_INITIALS", key);
    return formatLike(source, `${givenNameFor(key, seeds)} ${surnameFor(key, seeds)}`, { rng });
  }

  const parts = splitPersonName(source);
  const nameIdx = parts.flatMap((p, i) => (p.kind === "name" ? [i] : []));
  const hasHonorific = parts.some((p) => p.kind === "keep" && isHonorific(p.text.replace(/[,;:]$/, "")));

  const givenRng = seeds.rng("PERSON_GIVEN", key);
  const surnameRng = seeds.rng("PERSON_SURNAME", key);
  const initialRng = seeds.rng("PERSON_INITIALS", key);
  const givenPool = nameLexicon().given;

  const lastName = nameIdx[nameIdx.length - 1];
  const singleAsSurname = nameIdx.length === 1 && (options.surnameOnly || hasHonorific);

  return parts
    .map((part, i) => {
      switch (part.kind) {
        case "space":
        case "keep":
          return part.text;
        case "initial":
          return formatLike(part.text, initialRng.upperLetter(), { rng: initialRng });
        case "name": {
          const isSurname = nameIdx.length > 1 ? i === lastName : singleAsSurname;
          if (isSurname) return formatLike(part.text, surnameCandidate(part.text, surnameRng));
          return formatLike(part.text, givenRng.pick(givenPool));
        }
      }
    })
    .join("");
}

// =============================================================================
// Organizations
// =============================================================================

const ORG_SUFFIX_RX =
  /(?:,?\s+(?:Inc\.?|Incorporated|LLC|L\.L\.C\.|LLP|L\.L\.P\.|LP|L\.P\.|Ltd\.?|Limited|PLC|N\.A\.|N\.V\.|S\.A\.|GmbH|Company|Co\.?|Corp\.?|Corporation|Trust|Credit\s+Union|Group|Holdings|Partners|Associates))+\.?$/i;

export function splitOrgSuffix(source: string): { base: string; suffix: string } {
  const m = ORG_SUFFIX_RX.exec(source);
  if (!m || m.index === 0) return { base: source, suffix: "" };
  return { base: source.slice(0, m.index), suffix: m[0] };
}

function wordCount(text: string): number {
  return text.split(/[^\p{L}\p{N}]+/u).filter(Boolean).length;
}

function shapeWords(base: string, rng: SeededRng, pool: readonly string[]): string {
  const lead = /^the\s+/i.exec(base)?.[0] ?? "";
  const rest = base.slice(lead.length);
  const count = Math.max(1, wordCount(rest));
  return lead + formatLike(rest, drawDistinct(rng, pool, count).join(" "), { rng });
}

export function orgLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("ORG", key);
  const { base, suffix } = splitOrgSuffix(source);
  return shapeWords(base, rng, nameLexicon().orgWords) + suffix;
}

// =============================================================================
// Banks
// =============================================================================

const BANK_TAIL_RX =
  /(?:\s*(?:&|and)\s+Trust(?:\s+Company)?|\s+Trust\s+Company|\s+Savings\s+Bank|\s+Credit\s+Union|,?\s+N\.A\.|,?\s+National\s+Association|,?\s+FSB)+$/i;

export function bankOrgLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("BANK_ORG", key);
  const pool = nameLexicon().bankWords;
  const tailMatch = BANK_TAIL_RX.exec(source);
  const tail = tailMatch && tailMatch.index > 0 ? tailMatch[0] : "";
  const base = source.slice(0, source.length - tail.length);

  const bankOf = /^(bank\s+of\s+)(the\s+)?/i.exec(base);
  if (bankOf) {
    const name = base.slice(bankOf[0].length);
    const words = drawDistinct(rng, pool, Math.max(1, wordCount(name)));
    return bankOf[0] + formatLike(name, words.join(" "), { rng }) + tail;
  }
  const bankWord = /(\s+bank)$/i.exec(base);
  if (bankWord) {
    return shapeWords(base.slice(0, bankWord.index), rng, pool) + bankWord[0] + tail;
  }
  return shapeWords(base, rng, pool) + tail;
}

// =============================================================================
// Places (GPE / LOC)
// =============================================================================

export function placeLike(source: string, key: string, seeds: SeedSource): string {
  const rng = seeds.rng("PLACE", key);
  const lex = placeLexicon();
  const count = Math.max(1, wordCount(source));
  const candidates = [...lex.cities.map((c) => c.city), ...lex.majorCities, ...lex.stateNames].filter(
    (c) => wordCount(c) === count,
  );
  const candidate =
    candidates.length > 0
      ? rng.pick(candidates)
      : drawDistinct(rng, lex.cities.map((c) => c.city), count).join(" ");
  return formatLike(source, candidate, { rng });
}
