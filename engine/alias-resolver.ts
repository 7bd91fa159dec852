/**
 * Alias resolution
 *
 * Links alias definitions (`ALIAS_LABEL` spans from the aliases detector) to
 * their subjects, groups subject and aliases into a cluster, and synthesises
 * spans for later alias mentions. A definition's propagation scope runs from
 * its end to the next definition of the same cluster, or the end of the text.
 *
 * Overlaps with other detections are left for the span resolver.
 */

import { silentLogger, type Logger } from "../logger.js";
import { buildLineIndex, lineIndexAt, type LineInfo } from "../detect/patterns.js";
import type { SeedSource } from "./seed.js";
import {
  attrBool,
  attrNumber,
  attrOffsetPair,
  attrString,
  compareByStart,
  createSpan,
  withEntityId,
} from "./span.js";
import type { AliasCluster, ClusterArena, EntityLabel, EntitySpan, OffsetPair } from "./types.js";

export const SUBJECT_LABELS: ReadonlySet<EntityLabel> = new Set(["PERSON", "ORG", "BANK_ORG"]);
export const ALIAS_DEFINITION_SOURCE = "aliases";
export const ALIAS_MENTION_SOURCE = "alias_resolver";
export const ALIAS_MENTION_CONFIDENCE = 0.96;

/** Max characters between a subject's end and its definition. */
const SUBJECT_WINDOW = 80;

export type AliasOptions = {
  keepRoles: boolean;
  seeder: SeedSource;
  logger?: Logger;
};

export type AliasResolution = {
  spans: EntitySpan[];
  clusters: ClusterArena;
};

type Subject = {
  text: string | null;
  range: OffsetPair | null;
  label: EntityLabel | null;
  entityId: string | undefined;
};

type Definition = {
  span: EntitySpan;
  index: number;
  alias: string;
  isRole: boolean;
  subject: Subject;
  clusterId: string;
  nextStart: number | null;
};

function isSubjectSpan(span: EntitySpan): boolean {
  return SUBJECT_LABELS.has(span.label);
}

function intersects(span: { start: number; end: number }, [start, end]: OffsetPair): boolean {
  return span.start < end && start < span.end;
}

// =============================================================================
// Subject lookup
// =============================================================================

function findSubject(def: EntitySpan, spans: readonly EntitySpan[], text: string, lines: LineInfo[]): Subject {
  const explicit = attrOffsetPair(def.attrs, "subject_span");
  const explicitText = attrString(def.attrs, "subject_text");
  if (explicit && explicitText) {
    const hit = spans.find((sp) => isSubjectSpan(sp) && intersects(sp, explicit));
    return { text: explicitText, range: explicit, label: hit?.label ?? null, entityId: hit?.entityId };
  }

  const defLine = lineIndexAt(lines, def.start);
  let best: { distance: number; span: EntitySpan } | null = null;
  for (const sp of spans) {
    if (!isSubjectSpan(sp) || sp.end > def.start) continue;
    const line = lineIndexAt(lines, sp.start);
    if (line > defLine || defLine - line > 1) continue;
    const distance = def.start - sp.end;
    if (distance > SUBJECT_WINDOW) continue;
    if (best === null || distance < best.distance) best = { distance, span: sp };
  }
  if (best) {
    const sp = best.span;
    return { text: text.slice(sp.start, sp.end), range: [sp.start, sp.end], label: sp.label, entityId: sp.entityId };
  }

  const guess = attrString(def.attrs, "subject_guess");
  if (!guess) return { text: null, range: null, label: null, entityId: undefined };
  const guessLine = attrNumber(def.attrs, "subject_guess_line");
  if (guessLine !== undefined && guessLine >= 0 && guessLine < lines.length) {
    const line = lines[guessLine];
    const sp = spans.find((s) => isSubjectSpan(s) && s.start < line.end && line.start < s.end);
    if (sp) {
      return { text: text.slice(sp.start, sp.end), range: [sp.start, sp.end], label: sp.label, entityId: sp.entityId };
    }
  }
  return { text: guess, range: null, label: null, entityId: undefined };
}

// =============================================================================
// Clusters
// =============================================================================

function registerCluster(arena: ClusterArena, def: Definition): AliasCluster {
  let cluster = arena.get(def.clusterId);
  if (!cluster) {
    cluster = {
      clusterId: def.clusterId,
      primarySurface: def.subject.text ?? def.alias,
      subjectLabel: def.subject.label,
      aliases: [],
      roleAliases: [],
      subjectSpans: [],
      aliasDefSpans: [],
      aliasMentionSpans: [],
    };
    arena.set(def.clusterId, cluster);
  }
  const range = def.subject.range;
  if (range && !cluster.subjectSpans.some(([s, e]) => s === range[0] && e === range[1])) {
    cluster.subjectSpans.push(range);
  }
  if (cluster.subjectLabel === null) cluster.subjectLabel = def.subject.label;
  if (!cluster.aliases.includes(def.alias)) cluster.aliases.push(def.alias);
  if (def.isRole && !cluster.roleAliases.includes(def.alias)) cluster.roleAliases.push(def.alias);
  cluster.aliasDefSpans.push([def.span.start, def.span.end]);
  return cluster;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function scanMentions(text: string, alias: string, from: number, to: number, occupied: OffsetPair[]): OffsetPair[] {
  const re = new RegExp(`\\b${escapeRegExp(alias)}\\b`, "g");
  re.lastIndex = from;
  const out: OffsetPair[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const start = m.index;
    const end = start + m[0].length;
    if (end > to) break;
    if (!occupied.some((range) => intersects({ start, end }, range))) out.push([start, end]);
  }
  return out;
}

// =============================================================================
// Public API
// =============================================================================

export function resolveAliases(text: string, spans: readonly EntitySpan[], options: AliasOptions): AliasResolution {
  const logger = options.logger ?? silentLogger;
  const clusters: ClusterArena = new Map();
  const defs = spans
    .map((span, index) => ({ span, index }))
    .filter(({ span }) => span.label === "ALIAS_LABEL" && span.source === ALIAS_DEFINITION_SOURCE)
    .sort((a, b) => compareByStart(a.span, b.span));
  if (defs.length === 0) return { spans: [...spans], clusters };

  const lines = buildLineIndex(text);
  const definitions: Definition[] = defs.map(({ span, index }) => {
    const alias = attrString(span.attrs, "alias") ?? span.text;
    const subject = findSubject(span, spans, text, lines);
    const clusterId = subject.entityId ?? options.seeder.token("ENTITY_CLUSTER", subject.text ?? alias, 20);
    return { span, index, alias, isRole: attrBool(span.attrs, "role_flag"), subject, clusterId, nextStart: null };
  });

  const byCluster = new Map<string, Definition[]>();
  for (const def of definitions) {
    const group = byCluster.get(def.clusterId) ?? [];
    group.push(def);
    byCluster.set(def.clusterId, group);
  }
  for (const group of byCluster.values()) {
    for (let i = 0; i < group.length - 1; i++) group[i].nextStart = group[i + 1].span.start;
  }

  const updated = [...spans];
  const occupied: OffsetPair[] = spans.map((sp) => [sp.start, sp.end]);
  const synthesized: EntitySpan[] = [];

  for (const def of definitions) {
    const { clusterId } = def;
    updated[def.index] = createSpan({
      ...def.span,
      entityId: clusterId,
      attrs: {
        ...def.span.attrs,
        cluster_id: clusterId,
        is_definition: true,
        ...(options.keepRoles && def.isRole ? { skip_replacement: true } : {}),
      },
    });

    const range = def.subject.range;
    if (range) {
      updated.forEach((sp, i) => {
        if (isSubjectSpan(sp) && sp.entityId === undefined && intersects(sp, range)) {
          updated[i] = withEntityId(sp, clusterId);
        }
      });
    }

    const cluster = registerCluster(clusters, def);
    const stop = def.nextStart ?? text.length;
    for (const alias of cluster.aliases) {
      const isRole = cluster.roleAliases.includes(alias);
      for (const [start, end] of scanMentions(text, alias, def.span.end, stop, occupied)) {
        synthesized.push(
          createSpan({
            start,
            end,
            text: alias,
            label: "ALIAS_LABEL",
            source: ALIAS_MENTION_SOURCE,
            confidence: ALIAS_MENTION_CONFIDENCE,
            entityId: clusterId,
            attrs: {
              alias,
              alias_kind: isRole ? "role" : "nickname",
              trigger: "propagation",
              cluster_id: clusterId,
              role_flag: isRole,
              skip_replacement: options.keepRoles && isRole,
            },
          }),
        );
        occupied.push([start, end]);
        cluster.aliasMentionSpans.push([start, end]);
      }
    }
  }

  logger.debug?.(`alias clusters=${clusters.size} mentions=${synthesized.length}`);
  return { spans: [...updated, ...synthesized].sort(compareByStart), clusters };
}
