/**
 * Replacement plan builder
 *
 * Turns a conflict-free span set into plan entries: one surrogate per span,
 * chosen by label and keyed by entity id (or the span text) so every mention of
 * one entity gets the same replacement.
 */

import { silentLogger, type Logger } from "../logger.js";
import type { RedactPolicy } from "../config/schema.js";
import { splitLinesKeepEnds } from "../detect/patterns.js";
import { formatLike, matchCase } from "../pseudo/case-preserver.js";
import type { PseudonymGenerator } from "../pseudo/generator.js";
import { surnameOf } from "../pseudo/names.js";
import { OverlapError } from "./errors.js";
import { canonicalizeKey } from "./seed.js";
import { attrBool, attrString, attrStringArray, compareByStart } from "./span.js";
import {
  isAccountSubtype,
  isAddressLineKind,
  type AccountSubtype,
  type ClusterArena,
  type EntitySpan,
  type PlanEntry,
  type PlanMeta,
} from "./types.js";

export type PlanOptions = {
  generator: PseudonymGenerator;
  clusters?: ClusterArena;
  logger?: Logger;
};

type Replacement = {
  text: string;
  subtype?: string;
  flags: string[];
  lineReplacements?: string[];
};

// =============================================================================
// Helpers
// =============================================================================

function assertDisjoint(sorted: readonly EntitySpan[]): void {
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (cur.start < prev.end) {
      throw new OverlapError(
        `spans [${prev.start}, ${prev.end}) ${prev.label} and [${cur.start}, ${cur.end}) ${cur.label} overlap`,
      );
    }
  }
}

function clusterIdOf(span: EntitySpan): string | undefined {
  return attrString(span.attrs, "cluster_id") ?? span.entityId;
}

function isRoleAlias(span: EntitySpan): boolean {
  return span.label === "ALIAS_LABEL" && (attrBool(span.attrs, "role_flag") || span.attrs.alias_kind === "role");
}

/** A, B, ..., Z, AA, AB, ... */
export function partyLetter(index: number): string {
  let n = index;
  let out = "";
  do {
    out = String.fromCharCode(65 + (n % 26)) + out;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return out;
}

/** Party letters by first appearance: per role cluster, else per canonical role text. */
function assignPartyLetters(sorted: readonly EntitySpan[]): Map<string, string> {
  const letters = new Map<string, string>();
  for (const span of sorted) {
    if (!isRoleAlias(span)) continue;
    const key = partyKey(span);
    if (!letters.has(key)) letters.set(key, partyLetter(letters.size));
  }
  return letters;
}

function partyKey(span: EntitySpan): string {
  return clusterIdOf(span) ?? `role:${canonicalizeKey(span.text)}`;
}

function skipReason(span: EntitySpan, policy: RedactPolicy): string | null {
  if (attrBool(span.attrs, "skip_replacement")) return "skip_replacement";
  if (span.label === "OTHER") return "other";
  if (isRoleAlias(span) && policy.alias_labels === "keep_roles") return "keep_roles";
  if (span.label === "DATE_GENERIC" && !policy.generic_dates) return "generic_dates";
  if (span.label === "PERSON" && !policy.person_names) return "person_names";
  return null;
}

// =============================================================================
// Dispatch
// =============================================================================

// A hyphenated surname keeps its own hyphens rather than the alias's shape
function aliasSurname(alias: string, surname: string): string {
  return surname.includes("-") ? matchCase(alias, surname) : formatLike(alias, surname);
}

function aliasReplacement(
  span: EntitySpan,
  key: string,
  policy: RedactPolicy,
  options: PlanOptions,
  letters: Map<string, string>,
): Replacement {
  const { generator } = options;
  const clusterId = clusterIdOf(span);
  const cluster = clusterId ? options.clusters?.get(clusterId) : undefined;
  const subjectLabel = cluster?.subjectLabel ?? null;
  const isOrg = subjectLabel === "ORG" || subjectLabel === "BANK_ORG";
  const shape = (subjectLabel === "PERSON" && cluster ? surnameOf(cluster.primarySurface) : null) ?? undefined;

  if (isRoleAlias(span)) {
    if (policy.role_alias_style === "party_letter") {
      const letter = letters.get(partyKey(span)) ?? partyLetter(0);
      return { text: matchCase(span.text, `Party ${letter}`), flags: ["role_alias", "party_letter"] };
    }
    if (isOrg) return { text: generator.org(span.text, key), flags: ["role_alias", "surrogate"] };
    return { text: aliasSurname(span.text, generator.surname(key, span.text, shape)), flags: ["role_alias", "surrogate"] };
  }

  if (isOrg) return { text: generator.org(span.text, key), flags: ["nickname"] };
  return { text: aliasSurname(span.text, generator.surname(key, span.text, shape)), flags: ["nickname", "cluster_surname"] };
}

function addressReplacement(span: EntitySpan, key: string, generator: PseudonymGenerator): Replacement {
  const lineKinds = (attrStringArray(span.attrs, "line_kinds") ?? []).filter(isAddressLineKind);
  const lineKind = span.attrs.line_kind;
  const isBlock = Array.isArray(span.attrs.lines) || lineKinds.length > 1 || /[\r\n]/.test(span.text);
  const text = isBlock
    ? generator.addressBlock(span.text, key, lineKinds)
    : generator.addressLine(span.text, key, isAddressLineKind(lineKind) ? lineKind : undefined);
  const lineReplacements = splitLinesKeepEnds(text)
    .map((piece) => piece.body.trim())
    .filter((line) => line !== "");
  return { text, flags: [isBlock ? "address_block" : "address_line"], lineReplacements };
}

function replacementFor(
  span: EntitySpan,
  policy: RedactPolicy,
  options: PlanOptions,
  letters: Map<string, string>,
): Replacement {
  const { generator } = options;
  const key = span.entityId ?? span.text;
  switch (span.label) {
    case "PERSON": {
      const surnameOnly = attrBool(span.attrs, "surname_only");
      return { text: generator.person(span.text, key, { surnameOnly }), flags: surnameOnly ? ["surname_only"] : [] };
    }
    case "ALIAS_LABEL":
      return aliasReplacement(span, key, policy, options, letters);
    case "ORG":
      return { text: generator.org(span.text, key), flags: [] };
    case "BANK_ORG":
      return { text: generator.bank(span.text, key), flags: [] };
    case "ADDRESS_BLOCK":
      return addressReplacement(span, key, generator);
    case "EMAIL":
      return { text: generator.email(span.text, key), flags: [] };
    case "PHONE":
      return { text: generator.phone(span.text, key), flags: [] };
    case "ACCOUNT_ID": {
      const raw = span.attrs.subtype;
      const subtype: AccountSubtype = isAccountSubtype(raw) ? raw : "generic";
      return { text: generator.account(span.text, key, subtype), subtype, flags: [] };
    }
    case "DOB":
      return { text: generator.date(span.text, key, { dob: true }), flags: ["dob"] };
    case "DATE_GENERIC":
      return { text: generator.date(span.text, key), flags: [] };
    case "GPE":
    case "LOC":
      return { text: generator.place(span.text, key), flags: [] };
    case "OTHER":
      return { text: span.text, flags: [] };
  }
}

// =============================================================================
// Public API
// =============================================================================

export function buildPlan(
  text: string,
  spans: readonly EntitySpan[],
  policy: RedactPolicy,
  options: PlanOptions,
): PlanEntry[] {
  const logger = options.logger ?? silentLogger;
  const sorted = [...spans].sort(compareByStart);
  assertDisjoint(sorted);

  const letters = policy.role_alias_style === "party_letter" ? assignPartyLetters(sorted) : new Map<string, string>();

  const plan: PlanEntry[] = [];
  let skipped = 0;
  for (const span of sorted) {
    const reason = skipReason(span, policy);
    if (reason) {
      skipped++;
      logger.debug?.(`plan skip label=${span.label} [${span.start}, ${span.end}) reason=${reason}`);
      continue;
    }

    const source = text.slice(span.start, span.end);
    const replacement = replacementFor(span, policy, options, letters);
    const clusterId = clusterIdOf(span);
    const meta: PlanMeta = {
      source: span.source,
      ...(replacement.subtype ? { subtype: replacement.subtype } : {}),
      ...(clusterId ? { cluster_id: clusterId } : {}),
      policy_flags: replacement.flags,
      original_text: source,
      confidence: span.confidence,
      ...(replacement.lineReplacements ? { line_replacements: replacement.lineReplacements } : {}),
      ...(replacement.text.normalize("NFC") === source.normalize("NFC") ? { exhausted: true } : {}),
    };
    plan.push({
      start: span.start,
      end: span.end,
      replacement: replacement.text,
      label: span.label,
      entityId: span.entityId ?? null,
      spanId: span.spanId ?? null,
      meta,
    });
  }

  logger.debug?.(`plan entries=${plan.length} skipped=${skipped}`);
  return plan;
}
