/**
 * docredact - deterministic, shape-preserving PII redaction
 *
 * Detects sensitive spans in plain text, picks one winner per overlapping
 * region, replaces each with a seeded surrogate of the same shape, and
 * re-scans the output. Everything here is synchronous and per-document.
 */

// Pipeline
export { redactDocument, detectAll, STAGES } from "./engine/pipeline.js";
export type { RedactOptions, RedactionResult, StageName, StageTimings } from "./engine/pipeline.js";

// Core stages
export { normalizeText } from "./engine/normalizer.js";
export type { NormalizationResult } from "./engine/normalizer.js";
export { resolveSpans, precedenceRank } from "./engine/span-resolver.js";
export { resolveAliases } from "./engine/alias-resolver.js";
export { selectCorefBackend, computeCoref, unifyWithAliasClusters, assignCorefEntityIds } from "./engine/coref.js";
export { buildPlan } from "./engine/plan-builder.js";
export { applyPlan, remapPlan, validatePlan } from "./engine/applier.js";
export { scanText, resolveWeights } from "./engine/scanner.js";
export { Seeder, docHashB32, canonicalizeKey } from "./engine/seed.js";
export { createSpan, spanFromText, withEntityId, withAttrs, overlaps } from "./engine/span.js";
export * from "./engine/errors.js";
export * from "./engine/types.js";

// Surrogates
export { PseudonymGenerator } from "./pseudo/generator.js";
export { formatLike, matchCase } from "./pseudo/case-preserver.js";

// Detectors
export { buildDetectors, findHeadingRanges, guardSpans, mergeAddressLines } from "./detect/index.js";

// Config
export { DEFAULT_CONFIG, DEFAULT_SECRET_ENV, loadConfig, resolveConfig, readSeedSecret } from "./config/config.js";
export type { RedactorConfig, RedactPolicy } from "./config/schema.js";

// Reports & run log
export { writeReports, buildPlanArtifact, buildAuditEntries, buildVerificationArtifact } from "./report/report.js";
export { renderDiffHtml } from "./report/diff.js";
export { RunStore } from "./memory/store.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
