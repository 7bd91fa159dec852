/**
 * Lightweight coreference
 *
 * Links later PERSON mentions to the full name they refer to, so one person
 * gets one surrogate throughout a document:
 *
 *   - "Doe" / "Mr. Doe" join the most recent full mention whose surname matches
 *   - a bare capitalised surname repeat becomes a new PERSON span
 *   - he/she/him/her/his/hers attach to the most recent PERSON within two
 *     sentences; pronouns are recorded on the chain but never replaced
 *
 * A backend only supplies candidate pronoun and proper-noun tokens; linking is
 * shared. Two different people with the same surname are merged.
 */

import { silentLogger, type Logger } from "../logger.js";
import { loadWink } from "../detect/wink.js";
import { isHonorific, isNameSuffix } from "../pseudo/names.js";
import { PipelineError } from "./errors.js";
import type { SeedSource } from "./seed.js";
import { attrBool, attrString, compareByStart, createSpan, overlaps, withEntityId } from "./span.js";
import type { Availability, EntitySpan, OffsetPair } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type CorefBackendName = "regex" | "wink";
export type CorefBackendChoice = CorefBackendName | "auto";

export type CorefCandidates = {
  pronouns: OffsetPair[];
  properNouns: OffsetPair[];
};

export type CorefBackend = {
  name: CorefBackendName;
  candidates(text: string): CorefCandidates;
};

export type CorefMention = {
  start: number;
  end: number;
  kind: "name" | "surname" | "pronoun";
};

export type CorefChain = {
  /** Entity id; null until unified. */
  id: string | null;
  head: CorefMention & { text: string };
  surname: string;
  mentions: CorefMention[];
};

export type CorefResult = {
  backend: CorefBackendName;
  chains: CorefChain[];
  /** PERSON spans created for bare surname repeats. */
  added: EntitySpan[];
};

export const COREF_SOURCE = "coref";
export const COREF_CONFIDENCE = 0.9;

const PRONOUNS = new Set(["he", "she", "him", "her", "his", "hers"]);
const PRONOUN_RX = /\b(?:he|she|him|her|his|hers)\b/gi;
const PROPER_NOUN_RX = /\b[A-Z][A-Za-z'-]*[a-z]\b/g;

// =============================================================================
// Backends
// =============================================================================

function collect(re: RegExp, text: string): OffsetPair[] {
  return Array.from(text.matchAll(re), (m): OffsetPair => [m.index ?? 0, (m.index ?? 0) + m[0].length]);
}

export const regexBackend: CorefBackend = {
  name: "regex",
  candidates: (text) => ({ pronouns: collect(PRONOUN_RX, text), properNouns: collect(PROPER_NOUN_RX, text) }),
};

export function winkBackend(): Availability<CorefBackend> {
  const wink = loadWink();
  if (!wink.available) return wink;
  const { handle } = wink;
  return {
    available: true,
    handle: {
      name: "wink",
      candidates(text) {
        const pronouns: OffsetPair[] = [];
        const properNouns: OffsetPair[] = [];
        for (const token of handle.tokenize(text)) {
          if (token.pos === "PRON" && PRONOUNS.has(token.text.toLowerCase())) pronouns.push([token.start, token.end]);
          else if (token.pos === "PROPN" && /^[A-Z][a-z]/.test(token.text)) properNouns.push([token.start, token.end]);
        }
        return { pronouns, properNouns };
      },
    },
  };
}

/**
 * "auto" prefers wink and falls back to regex. An explicit backend that cannot
 * load falls back with a warning, or fails the run when `required`.
 */
export function selectCorefBackend(
  choice: CorefBackendChoice,
  options: { required?: boolean; logger?: Logger } = {},
): CorefBackend {
  const logger = options.logger ?? silentLogger;
  if (choice === "regex") return regexBackend;
  const wink = winkBackend();
  if (wink.available) return wink.handle;
  if (choice === "wink" && options.required) {
    throw new PipelineError("coref", `wink backend unavailable: ${wink.reason}`);
  }
  logger.warn(`coref backend wink unavailable (${wink.reason}); using regex`);
  return regexBackend;
}

// =============================================================================
// Linking
// =============================================================================

function coreTokens(text: string): string[] {
  return text
    .split(/\s+/)
    .map((t) => t.replace(/^[("]+|[)",;:]+$/g, ""))
    .filter((t) => t !== "" && !isHonorific(t) && !isNameSuffix(t));
}

function surnameKey(token: string): string {
  return token.replace(/['’]s$/i, "").toLowerCase();
}

/** Start offsets of sentences; honorific and initial periods do not end one. */
function sentenceStarts(text: string): number[] {
  const starts = [0];
  for (const m of text.matchAll(/[.!?]["')\]]*\s+/g)) {
    const at = m.index ?? 0;
    const word = /(\S+)$/.exec(text.slice(Math.max(0, at - 12), at + 1));
    if (word && (isHonorific(word[1]) || /^[A-Z]\.$/.test(word[1]))) continue;
    starts.push(at + m[0].length);
  }
  return starts;
}

function sentenceOf(starts: readonly number[], offset: number): number {
  let i = 0;
  while (i + 1 < starts.length && starts[i + 1] <= offset) i++;
  return i;
}

/** The chain whose latest non-pronoun mention before `offset` is closest. */
function latestChain(chains: readonly CorefChain[], offset: number, match: (chain: CorefChain) => boolean): CorefChain | null {
  let best: CorefChain | null = null;
  let bestEnd = -1;
  for (const chain of chains) {
    if (!match(chain)) continue;
    for (const m of chain.mentions) {
      if (m.kind !== "pronoun" && m.end <= offset && m.end > bestEnd) {
        best = chain;
        bestEnd = m.end;
      }
    }
  }
  return best;
}

export function computeCoref(text: string, spans: readonly EntitySpan[], backend: CorefBackend): CorefResult {
  const persons = spans.filter((sp) => sp.label === "PERSON").sort(compareByStart);
  const chains: CorefChain[] = [];

  for (const sp of persons) {
    const tokens = coreTokens(sp.text);
    if (tokens.length === 0) continue;
    const surname = surnameKey(tokens[tokens.length - 1]);
    if (tokens.length >= 2 && !attrBool(sp.attrs, "surname_only")) {
      const canonical = tokens.join(" ").toLowerCase();
      const same = chains.find((c) => coreTokens(c.head.text).join(" ").toLowerCase() === canonical);
      if (same) {
        same.mentions.push({ start: sp.start, end: sp.end, kind: "name" });
      } else {
        const head = { start: sp.start, end: sp.end, kind: "name" as const, text: sp.text };
        chains.push({ id: null, head, surname, mentions: [{ start: sp.start, end: sp.end, kind: "name" }] });
      }
      continue;
    }
    const target = latestChain(chains, sp.start, (c) => c.surname === surname);
    target?.mentions.push({ start: sp.start, end: sp.end, kind: "surname" });
  }

  const { pronouns, properNouns } = backend.candidates(text);
  const added: EntitySpan[] = [];
  for (const [start, end] of properNouns) {
    if (spans.some((sp) => overlaps(sp, { start, end }))) continue;
    const token = text.slice(start, end);
    const target = latestChain(chains, start, (c) => c.surname === surnameKey(token));
    if (!target) continue;
    target.mentions.push({ start, end, kind: "surname" });
    added.push(
      createSpan({
        start,
        end,
        text: token,
        label: "PERSON",
        source: COREF_SOURCE,
        confidence: COREF_CONFIDENCE,
        attrs: { surname_only: true, trigger: "surname_repeat" },
      }),
    );
  }

  const starts = sentenceStarts(text);
  for (const [start, end] of pronouns) {
    const sentence = sentenceOf(starts, start);
    const target = latestChain(chains, start, (c) =>
      c.mentions.some((m) => m.kind !== "pronoun" && m.end <= start && sentence - sentenceOf(starts, m.start) <= 1),
    );
    target?.mentions.push({ start, end, kind: "pronoun" });
  }

  for (const chain of chains) chain.mentions.sort(compareByStart);
  return { backend: backend.name, chains, added };
}

/**
 * Give every chain an id: the alias cluster id (or entity id) carried by any
 * span one of its mentions overlaps, else a stable id of the head text.
 */
export function unifyWithAliasClusters(
  result: CorefResult,
  spans: readonly EntitySpan[],
  seeder: SeedSource,
): CorefResult {
  const chains = result.chains.map((chain) => {
    let id: string | null = null;
    for (const mention of chain.mentions) {
      if (mention.kind === "pronoun") continue;
      const carrier = spans.find(
        (sp) => overlaps(sp, mention) && (attrString(sp.attrs, "cluster_id") !== undefined || sp.entityId !== undefined),
      );
      if (carrier) {
        id = attrString(carrier.attrs, "cluster_id") ?? carrier.entityId ?? null;
        break;
      }
    }
    return { ...chain, id: id ?? seeder.token("ENTITY_CLUSTER", chain.head.text, 20) };
  });
  return { ...result, chains };
}

/** Write chain ids onto PERSON spans that have none and add the surname-repeat spans. */
export function assignCorefEntityIds(spans: readonly EntitySpan[], result: CorefResult): EntitySpan[] {
  const idFor = (sp: EntitySpan): string | null => {
    for (const chain of result.chains) {
      if (chain.id && chain.mentions.some((m) => m.kind !== "pronoun" && m.start === sp.start && m.end === sp.end)) {
        return chain.id;
      }
    }
    return null;
  };
  return [...spans, ...result.added]
    .map((sp) => {
      if (sp.label !== "PERSON" || sp.entityId !== undefined) return sp;
      const id = idFor(sp);
      return id ? withEntityId(sp, id) : sp;
    })
    .sort(compareByStart);
}
