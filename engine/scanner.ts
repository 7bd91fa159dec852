/**
 * Verification scanner
 *
 * Re-runs the detectors over redacted text. Findings that are our own
 * surrogates, or that policy deliberately leaves in place, are set aside with
 * a reason; the rest are residual and weighted into a leakage score.
 */

import { silentLogger, type Logger } from "../logger.js";
import type { RedactorConfig } from "../config/schema.js";
import { buildLineIndex, lineIndexAt } from "../detect/patterns.js";
import { emailDomain, isSafeEmailDomain, isSafePhone } from "../pseudo/contact.js";
import { remapPlan } from "./applier.js";
import { attrBool, compareByStart } from "./span.js";
import {
  ENTITY_LABELS,
  type DetectionContext,
  type Detector,
  type EntityLabel,
  type IgnoredReason,
  type PlanEntry,
  type VerificationFinding,
  type VerificationReport,
} from "./types.js";

export type ScanOptions = {
  detectors: readonly Detector[];
  appliedPlan?: readonly PlanEntry[];
  context?: DetectionContext;
  logger?: Logger;
};

export const DEFAULT_WEIGHTS: Readonly<Record<EntityLabel, number>> = {
  PERSON: 3,
  ADDRESS_BLOCK: 3,
  DOB: 3,
  EMAIL: 3,
  ACCOUNT_ID: 3,
  PHONE: 2,
  BANK_ORG: 1,
  ORG: 1,
  ALIAS_LABEL: 1,
  GPE: 1,
  LOC: 1,
  DATE_GENERIC: 1,
  OTHER: 0,
};

const LOCATION_LABELS: ReadonlySet<EntityLabel> = new Set(["GPE", "LOC", "ADDRESS_BLOCK"]);

export function resolveWeights(config: RedactorConfig): Record<EntityLabel, number> {
  const weights = { ...DEFAULT_WEIGHTS };
  if (!config.redact.generic_dates) weights.DATE_GENERIC = 0;
  for (const label of ENTITY_LABELS) {
    const override = config.verification.weights[label];
    if (override !== undefined) weights[label] = override;
  }
  return weights;
}

// =============================================================================
// Collection
// =============================================================================

function collectFindings(text: string, options: ScanOptions, minConfidence: number): VerificationFinding[] {
  const byKey = new Map<string, VerificationFinding>();
  for (const detector of options.detectors) {
    for (const span of detector.detect(text, options.context)) {
      if (span.confidence < minConfidence) continue;
      const key = `${span.start}:${span.end}:${span.label}`;
      const prev = byKey.get(key);
      if (prev && prev.confidence >= span.confidence) continue;
      byKey.set(key, {
        start: span.start,
        end: span.end,
        text: span.text,
        label: span.label,
        confidence: span.confidence,
        attrs: span.attrs,
      });
    }
  }
  return [...byKey.values()].sort((a, b) => compareByStart(a, b) || a.label.localeCompare(b.label));
}

// =============================================================================
// Classification
// =============================================================================

type PlanIndex = {
  replacements: Map<EntityLabel, Map<string, number>>;
  blockLines: Set<string>;
  blockRanges: Array<{ start: number; end: number }>;
  ranges: Array<{ start: number; end: number }>;
};

function indexPlan(applied: readonly PlanEntry[]): PlanIndex {
  const replacements = new Map<EntityLabel, Map<string, number>>();
  const blockLines = new Set<string>();
  for (const entry of applied) {
    const counts = replacements.get(entry.label) ?? new Map<string, number>();
    counts.set(entry.replacement, (counts.get(entry.replacement) ?? 0) + 1);
    replacements.set(entry.label, counts);
    if (entry.label === "ADDRESS_BLOCK") {
      for (const line of entry.meta.line_replacements ?? []) blockLines.add(line.trim());
    }
  }
  const remapped = remapPlan(applied);
  const blockRanges = remapped.filter((e) => e.label === "ADDRESS_BLOCK").map(({ start, end }) => ({ start, end }));
  const ranges = remapped.filter((e) => e.end > e.start).map(({ start, end }) => ({ start, end }));
  return { replacements, blockLines, blockRanges, ranges };
}

function isRoleFinding(finding: VerificationFinding): boolean {
  return attrBool(finding.attrs, "role_flag") || finding.attrs.alias_kind === "role";
}

function classify(
  finding: VerificationFinding,
  plan: PlanIndex,
  lineOf: (offset: number) => string,
  config: RedactorConfig,
): IgnoredReason | null {
  const counts = plan.replacements.get(finding.label);
  const remaining = counts?.get(finding.text) ?? 0;
  if (counts && remaining > 0) {
    counts.set(finding.text, remaining - 1);
    return "replacement_match";
  }
  if (plan.blockLines.has(finding.text.trim())) return "replacement_match_block_line";
  if (plan.blockRanges.some((r) => finding.start >= r.start && finding.end <= r.end)) {
    return "in_address_block_replacement";
  }
  if (LOCATION_LABELS.has(finding.label) && plan.blockLines.has(lineOf(finding.start).trim())) {
    return "in_address_block_replacement";
  }
  // Surrogates can look like another label ("03/28/1973" as a generic date)
  if (plan.ranges.some((r) => finding.start >= r.start && finding.end <= r.end)) return "inside_replacement";
  if (finding.label === "EMAIL" && isSafeEmailDomain(emailDomain(finding.text))) return "safe_email_domain";
  if (finding.label === "PHONE" && isSafePhone(finding.text)) return "safe_phone";
  if (finding.label === "ALIAS_LABEL" && config.redact.alias_labels === "keep_roles" && isRoleFinding(finding)) {
    return "policy_keep_roles";
  }
  if (finding.label === "DATE_GENERIC" && !config.redact.generic_dates) return "policy_generic_dates";
  return null;
}

function countBy(findings: readonly VerificationFinding[]): Partial<Record<EntityLabel, number>> {
  const out: Partial<Record<EntityLabel, number>> = {};
  for (const f of findings) out[f.label] = (out[f.label] ?? 0) + 1;
  return out;
}

// =============================================================================
// Public API
// =============================================================================

export function scanText(text: string, config: RedactorConfig, options: ScanOptions): VerificationReport {
  const logger = options.logger ?? silentLogger;
  const minConfidence = config.verification.min_confidence;
  const weights = resolveWeights(config);
  const findings = collectFindings(text, options, minConfidence);
  const plan = indexPlan(options.appliedPlan ?? []);
  const lines = buildLineIndex(text);
  const lineOf = (offset: number) => lines[lineIndexAt(lines, offset)].text;

  const residual: VerificationFinding[] = [];
  const ignored: VerificationFinding[] = [];
  const classified = findings.map((finding) => {
    const reason = classify(finding, plan, lineOf, config);
    const out: VerificationFinding = reason ? { ...finding, ignoredReason: reason } : finding;
    (reason ? ignored : residual).push(out);
    return out;
  });

  const score = residual.reduce((sum, f) => sum + weights[f.label], 0);
  logger.debug?.(`verification found=${findings.length} residual=${residual.length} score=${score}`);

  return {
    findings: classified,
    residual,
    ignored,
    countsByLabel: countBy(residual),
    ignoredByLabel: countBy(ignored),
    residualCount: residual.length,
    ignoredCount: ignored.length,
    totalFound: findings.length,
    score,
    details: { weights, min_confidence: minConfidence },
  };
}
