/**
 * Report artifacts
 *
 * Every artifact is derived from a `RedactionResult`. `audit.json` and
 * `diff.html` carry original text next to its replacement and must stay with
 * the operator. No artifact carries the seed secret; the audit summary records
 * only whether one was present.
 */

import fs from "node:fs";
import path from "node:path";
import type { RedactionResult } from "../engine/pipeline.js";
import type { EntityLabel, PlanEntry, VerificationReport } from "../engine/types.js";
import type { NormalizationResult } from "../engine/normalizer.js";
import { silentLogger, type Logger } from "../logger.js";
import { entryId, renderDiffHtml } from "./diff.js";

// =============================================================================
// Types
// =============================================================================

export type PlanArtifactEntry = {
  start: number;
  end: number;
  label: EntityLabel;
  replacement: string;
  entity_id: string | null;
  subtype: string | null;
  cluster_id: string | null;
  applied_index: number;
};

export type AuditEntry = {
  id: string;
  start: number;
  end: number;
  label: EntityLabel;
  source: string;
  entity_id: string | null;
  subtype: string | null;
  cluster_id: string | null;
  original_text: string;
  replacement_text: string;
  confidence: number | null;
  length_delta: number;
  policy_flags: string[];
};

export type AuditSummary = {
  total_replacements: number;
  counts_by_label: Partial<Record<EntityLabel, number>>;
  deltas_total: number;
  generated_at: string;
  doc_hash_b32: string;
  seed_present: boolean;
};

export type AuditArtifact = {
  entries: AuditEntry[];
  summary: AuditSummary;
  verification: {
    residual_count: number;
    score: number;
    counts_by_label: Partial<Record<EntityLabel, number>>;
    ignored_by_label: Partial<Record<EntityLabel, number>>;
  };
};

export type VerificationArtifact = {
  residual_count: number;
  ignored_count: number;
  total_found: number;
  score: number;
  counts_by_label: Partial<Record<EntityLabel, number>>;
  ignored_by_label: Partial<Record<EntityLabel, number>>;
  min_confidence: number;
  weights: Record<EntityLabel, number>;
  findings: Array<{
    start: number;
    end: number;
    label: EntityLabel;
    text: string;
    confidence: number;
    ignored_reason: string | null;
  }>;
};

export type PreprocessArtifact = {
  changed: boolean;
  normalized_length: number;
  char_map: number[];
};

export const REPORT_FILES = {
  plan: "plan.json",
  audit: "audit.json",
  verification: "verification.json",
  diff: "diff.html",
  preprocess: "preprocess.json",
} as const;

export type ReportPaths = Record<keyof typeof REPORT_FILES, string>;

export type WriteReportsOptions = {
  /** Fixed timestamp for the audit summary; defaults to now. */
  generatedAt?: Date;
  logger?: Logger;
};

// =============================================================================
// Builders
// =============================================================================

function metaString(entry: PlanEntry, key: "source" | "subtype" | "cluster_id"): string | null {
  const value = entry.meta[key];
  return typeof value === "string" ? value : null;
}

export function buildPlanArtifact(applied: readonly PlanEntry[]): PlanArtifactEntry[] {
  return applied.map((entry, i) => ({
    start: entry.start,
    end: entry.end,
    label: entry.label,
    replacement: entry.replacement,
    entity_id: entry.entityId,
    subtype: metaString(entry, "subtype"),
    cluster_id: metaString(entry, "cluster_id"),
    applied_index: entry.meta.applied_index ?? i + 1,
  }));
}

export function buildAuditEntries(applied: readonly PlanEntry[]): AuditEntry[] {
  return applied.map((entry, i) => {
    const original = entry.meta.original_text ?? "";
    return {
      id: entryId(entry, i),
      start: entry.start,
      end: entry.end,
      label: entry.label,
      source: metaString(entry, "source") ?? "",
      entity_id: entry.entityId,
      subtype: metaString(entry, "subtype"),
      cluster_id: metaString(entry, "cluster_id"),
      original_text: original,
      replacement_text: entry.replacement,
      confidence: entry.meta.confidence ?? null,
      length_delta: entry.replacement.length - (entry.end - entry.start),
      policy_flags: [...(entry.meta.policy_flags ?? [])],
    };
  });
}

export function summarizeAudit(
  entries: readonly AuditEntry[],
  info: { docHashB32: string; seedPresent: boolean; generatedAt: Date },
): AuditSummary {
  const counts: Partial<Record<EntityLabel, number>> = {};
  let deltas = 0;
  for (const entry of entries) {
    counts[entry.label] = (counts[entry.label] ?? 0) + 1;
    deltas += entry.length_delta;
  }
  return {
    total_replacements: entries.length,
    counts_by_label: counts,
    deltas_total: deltas,
    generated_at: info.generatedAt.toISOString(),
    doc_hash_b32: info.docHashB32,
    seed_present: info.seedPresent,
  };
}

export function buildVerificationArtifact(report: VerificationReport): VerificationArtifact {
  return {
    residual_count: report.residualCount,
    ignored_count: report.ignoredCount,
    total_found: report.totalFound,
    score: report.score,
    counts_by_label: { ...report.countsByLabel },
    ignored_by_label: { ...report.ignoredByLabel },
    min_confidence: report.details.min_confidence,
    weights: { ...report.details.weights },
    findings: report.findings.map((f) => ({
      start: f.start,
      end: f.end,
      label: f.label,
      text: f.text,
      confidence: f.confidence,
      ignored_reason: f.ignoredReason ?? null,
    })),
  };
}

export function buildPreprocessArtifact(normalized: NormalizationResult): PreprocessArtifact {
  return {
    changed: normalized.changed,
    normalized_length: normalized.text.length,
    char_map: [...normalized.charMap],
  };
}

// =============================================================================
// Writer
// =============================================================================

/** Write through a temp file and rename so readers never see a partial file. */
function writeAtomic(filePath: string, content: string): void {
  const tmpPath = filePath + ".tmp";
  fs.writeFileSync(tmpPath, content, { encoding: "utf-8", mode: 0o600 });
  fs.renameSync(tmpPath, filePath);
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}

export function writeReports(dir: string, result: RedactionResult, options: WriteReportsOptions = {}): ReportPaths {
  const logger = options.logger ?? silentLogger;
  fs.mkdirSync(dir, { recursive: true });

  const entries = buildAuditEntries(result.applied);
  const audit: AuditArtifact = {
    entries,
    summary: summarizeAudit(entries, {
      docHashB32: result.docHashB32,
      seedPresent: result.seedPresent,
      generatedAt: options.generatedAt ?? new Date(),
    }),
    verification: {
      residual_count: result.verification.residualCount,
      score: result.verification.score,
      counts_by_label: { ...result.verification.countsByLabel },
      ignored_by_label: { ...result.verification.ignoredByLabel },
    },
  };

  const paths: ReportPaths = {
    plan: path.join(dir, REPORT_FILES.plan),
    audit: path.join(dir, REPORT_FILES.audit),
    verification: path.join(dir, REPORT_FILES.verification),
    diff: path.join(dir, REPORT_FILES.diff),
    preprocess: path.join(dir, REPORT_FILES.preprocess),
  };
  writeAtomic(paths.plan, json(buildPlanArtifact(result.applied)));
  writeAtomic(paths.audit, json(audit));
  writeAtomic(paths.verification, json(buildVerificationArtifact(result.verification)));
  writeAtomic(paths.diff, renderDiffHtml(result.normalized.text, result.applied));
  writeAtomic(paths.preprocess, json(buildPreprocessArtifact(result.normalized)));

  logger.info(`reports written to ${dir} (${entries.length} replacements)`);
  return paths;
}
