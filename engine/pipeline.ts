/**
 * Document pipeline
 *
 * normalize → detect → merge → guard → resolve → aliases → coref → re-resolve →
 * plan → apply → scan
 *
 * Every stage is synchronous and works on one document. Detector output is
 * checked against the text before it is used; a span that does not match is
 * dropped with a warning.
 */

import { readSeedSecret, resolveConfig } from "../config/config.js";
import type { RedactorConfig } from "../config/schema.js";
import { buildDetectors, guardSpans, mergeAddressLines } from "../detect/index.js";
import { lineStarts } from "../detect/patterns.js";
import { silentLogger, type Logger } from "../logger.js";
import { PseudonymGenerator } from "../pseudo/generator.js";
import { resolveAliases } from "./alias-resolver.js";
import { applyPlan } from "./applier.js";
import { assignCorefEntityIds, computeCoref, selectCorefBackend, unifyWithAliasClusters } from "./coref.js";
import { PipelineError, RedactionError } from "./errors.js";
import { normalizeText, type NormalizationResult } from "./normalizer.js";
import { buildPlan } from "./plan-builder.js";
import { scanText } from "./scanner.js";
import { docHashB32, Seeder } from "./seed.js";
import { resolveSpans } from "./span-resolver.js";
import type {
  ClusterArena,
  DetectionContext,
  Detector,
  EntitySpan,
  PlanEntry,
  VerificationReport,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export const STAGES = [
  "normalize",
  "detect",
  "merge",
  "guard",
  "resolve",
  "aliases",
  "coref",
  "reresolve",
  "plan",
  "apply",
  "scan",
] as const;

export type StageName = (typeof STAGES)[number];

/** Milliseconds per stage; skipped stages are absent. */
export type StageTimings = Partial<Record<StageName, number>>;

export type RedactOptions = {
  config?: RedactorConfig;
  /** Overrides the secret read from the configured environment variable. */
  secret?: string;
  /** Fail with `MissingSecretError` when no secret is available. */
  requireSecret?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Replaces the configured detector set, for detection and for the scan. */
  detectors?: readonly Detector[];
  logger?: Logger;
};

export type RedactionResult = {
  normalized: NormalizationResult;
  redactedText: string;
  /** Entries in input coordinates. */
  plan: PlanEntry[];
  /** The plan sorted by offset, with 1-based `applied_index`. */
  applied: PlanEntry[];
  spans: EntitySpan[];
  clusters: ClusterArena;
  verification: VerificationReport;
  seedPresent: boolean;
  docHashB32: string;
  timings: StageTimings;
};

// =============================================================================
// Helpers
// =============================================================================

function runStage<T>(name: StageName, timings: StageTimings, fn: () => T): T {
  const started = Date.now();
  try {
    return fn();
  } catch (err) {
    if (err instanceof RedactionError) throw err;
    throw new PipelineError(name, err instanceof Error ? err.message : String(err), err);
  } finally {
    timings[name] = Date.now() - started;
  }
}

function isConsistent(text: string, span: EntitySpan): boolean {
  return span.start >= 0 && span.end <= text.length && span.end > span.start && text.slice(span.start, span.end) === span.text;
}

/** Run every detector, keeping only spans that match the text they claim. */
export function detectAll(
  text: string,
  detectors: readonly Detector[],
  context: DetectionContext,
  logger: Logger = silentLogger,
): EntitySpan[] {
  const spans: EntitySpan[] = [];
  for (const detector of detectors) {
    for (const span of detector.detect(text, context)) {
      if (!isConsistent(text, span)) {
        logger.warn(`dropping span from ${detector.name()} label=${span.label} [${span.start}, ${span.end})`);
        continue;
      }
      spans.push(span);
    }
  }
  return spans;
}

// =============================================================================
// Public API
// =============================================================================

export function redactDocument(input: string, options: RedactOptions = {}): RedactionResult {
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? resolveConfig();
  const secret = options.secret || readSeedSecret(config, { require: options.requireSecret, env: options.env });
  const detectors = options.detectors ?? buildDetectors(config, logger);
  const timings: StageTimings = {};

  const normalized = runStage("normalize", timings, () => normalizeText(input));
  const text = normalized.text;
  const seeder = Seeder.forDocument({ secret, crossDocConsistency: config.pseudonyms.cross_doc_consistency }, text);
  const context: DetectionContext = { lineStarts: lineStarts(text) };

  let spans = runStage("detect", timings, () => detectAll(text, detectors, context, logger));
  if (config.detectors.address.merge_blocks) {
    spans = runStage("merge", timings, () => mergeAddressLines(text, spans));
  }
  const { protect_headings: protectHeadings, gpe_outside_addresses: gpeOutsideAddresses } = config.filters;
  if (protectHeadings || gpeOutsideAddresses) {
    spans = runStage("guard", timings, () =>
      guardSpans(text, spans, { protectHeadings, gpeOutsideAddresses, logger }),
    );
  }
  spans = runStage("resolve", timings, () => resolveSpans(spans, config.precedence, logger));

  const aliases = runStage("aliases", timings, () =>
    resolveAliases(text, spans, { keepRoles: config.redact.alias_labels === "keep_roles", seeder, logger }),
  );
  spans = aliases.spans;

  const coref = config.detectors.coref;
  if (coref.enabled) {
    spans = runStage("coref", timings, () => {
      const backend = selectCorefBackend(coref.backend, { required: coref.required, logger });
      const result = unifyWithAliasClusters(computeCoref(text, spans, backend), spans, seeder);
      logger.debug?.(`coref backend=${result.backend} chains=${result.chains.length}`);
      return assignCorefEntityIds(spans, result);
    });
  }
  spans = runStage("reresolve", timings, () => resolveSpans(spans, config.precedence, logger));

  const generator = new PseudonymGenerator(seeder, logger);
  const plan = runStage("plan", timings, () =>
    buildPlan(text, spans, config.redact, { generator, clusters: aliases.clusters, logger }),
  );
  const { text: redactedText, applied } = runStage("apply", timings, () => applyPlan(text, plan));
  const verification = runStage("scan", timings, () =>
    scanText(redactedText, config, { detectors, appliedPlan: applied, logger }),
  );

  logger.debug?.(
    `redacted spans=${spans.length} entries=${plan.length} residual=${verification.residualCount} score=${verification.score}`,
  );

  return {
    normalized,
    redactedText,
    plan,
    applied,
    spans,
    clusters: aliases.clusters,
    verification,
    seedPresent: seeder.seedPresent,
    docHashB32: docHashB32(text),
    timings,
  };
}
