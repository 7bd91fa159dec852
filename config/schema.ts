/**
 * Configuration schema
 */

import { z } from "zod";
import { ENTITY_LABELS } from "../engine/types.js";

const LabelSchema = z.enum(ENTITY_LABELS);

export const RedactSchema = z
  .object({
    person_names: z.boolean(),
    generic_dates: z.boolean(),
    alias_labels: z.enum(["redact", "keep_roles"]),
    role_alias_style: z.enum(["party_letter", "surrogate"]),
  })
  .strict();

export const PseudonymsSchema = z
  .object({
    cross_doc_consistency: z.boolean(),
    seed: z.object({ secret_env: z.string().min(1) }).strict(),
  })
  .strict();

export const VerificationSchema = z
  .object({
    fail_on_residual: z.boolean(),
    min_confidence: z.number().min(0).max(1),
    weights: z.record(LabelSchema, z.number().min(0)),
  })
  .strict();

export const DetectorsSchema = z
  .object({
    ner: z.object({ enabled: z.boolean(), required: z.boolean() }).strict(),
    coref: z
      .object({
        enabled: z.boolean(),
        backend: z.enum(["regex", "wink", "auto"]),
        required: z.boolean(),
      })
      .strict(),
    account_ids: z.object({ generic: z.boolean() }).strict(),
    address: z.object({ merge_blocks: z.boolean() }).strict(),
  })
  .strict();

export const FiltersSchema = z
  .object({
    protect_headings: z.boolean(),
    gpe_outside_addresses: z.boolean(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    redact: RedactSchema,
    pseudonyms: PseudonymsSchema,
    verification: VerificationSchema,
    detectors: DetectorsSchema,
    filters: FiltersSchema,
    precedence: z.array(LabelSchema).min(1),
  })
  .strict();

export type RedactorConfig = z.infer<typeof ConfigSchema>;
export type RedactPolicy = RedactorConfig["redact"];
