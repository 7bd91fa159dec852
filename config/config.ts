/**
 * Configuration loading
 *
 * A JSON file is deep-merged over DEFAULT_CONFIG (objects recurse, arrays and
 * scalars replace) and the result is validated. The seed secret comes from the
 * environment and is never part of the config object.
 */

import { readFileSync } from "node:fs";
import { ConfigError, MissingSecretError } from "../engine/errors.js";
import { ConfigSchema } from "./schema.js";
import type { RedactorConfig } from "./schema.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_SECRET_ENV = "REDACTOR_SEED_SECRET";

export const DEFAULT_CONFIG: RedactorConfig = {
  redact: {
    person_names: true,
    generic_dates: false,
    alias_labels: "redact",
    role_alias_style: "party_letter",
  },
  pseudonyms: {
    cross_doc_consistency: false,
    seed: { secret_env: DEFAULT_SECRET_ENV },
  },
  verification: {
    fail_on_residual: true,
    min_confidence: 0,
    weights: {},
  },
  detectors: {
    ner: { enabled: false, required: false },
    coref: { enabled: false, backend: "auto", required: false },
    account_ids: { generic: true },
    address: { merge_blocks: true },
  },
  filters: {
    protect_headings: true,
    gpe_outside_addresses: true,
  },
  precedence: [
    "ACCOUNT_ID",
    "EMAIL",
    "PHONE",
    "ADDRESS_BLOCK",
    "ALIAS_LABEL",
    "PERSON",
    "ORG",
    "BANK_ORG",
    "GPE",
    "LOC",
    "DOB",
    "DATE_GENERIC",
  ],
};

// =============================================================================
// Merge & validate
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Objects merge recursively; arrays and scalars from `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    out[key] = key in base ? deepMerge(base[key], value) : value;
  }
  return out;
}

export function validateConfig(raw: unknown): RedactorConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.path.join(".") || "(root)");
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${detail.join("; ")}`, issues);
  }
  return result.data;
}

/** Merge `overrides` over the defaults and validate. */
export function resolveConfig(overrides?: unknown): RedactorConfig {
  return validateConfig(deepMerge(structuredClone(DEFAULT_CONFIG), overrides ?? {}));
}

/**
 * Load configuration from a JSON file, or the defaults when no path is given.
 */
export function loadConfig(configPath?: string): RedactorConfig {
  if (!configPath) return resolveConfig();

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config from ${configPath}: ${reason}`);
  }
  return resolveConfig(parsed);
}

// =============================================================================
// Secret
// =============================================================================

/**
 * Read the seed secret from the environment variable the config names. An
 * empty value counts as absent.
 */
export function readSeedSecret(
  config: RedactorConfig,
  options: { require?: boolean; env?: NodeJS.ProcessEnv } = {},
): string | undefined {
  const envName = config.pseudonyms.seed.secret_env;
  const value = (options.env ?? process.env)[envName];
  if (value) return value;
  if (options.require) throw new MissingSecretError(envName);
  return undefined;
}
