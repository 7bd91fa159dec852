import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, deepMerge, loadConfig, readSeedSecret, resolveConfig } from "./config.js";
import { ConfigSchema } from "./schema.js";
import { ConfigError, MissingSecretError } from "../engine/errors.js";

// =============================================================================
// Schema & merge
// =============================================================================

describe("ConfigSchema", () => {
  it("accepts the defaults", () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it("rejects unknown keys", () => {
    expect(ConfigSchema.safeParse({ ...DEFAULT_CONFIG, extra: 1 }).success).toBe(false);
  });
});

describe("deepMerge", () => {
  it("recurses into objects and replaces arrays and scalars", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, d: 2 })).toEqual({
      a: { b: 1, c: [3] },
      d: 2,
    });
  });

  it("keeps the base when the override is undefined", () => {
    expect(deepMerge({ a: 1 }, undefined)).toEqual({ a: 1 });
  });
});

describe("resolveConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("applies nested overrides", () => {
    const config = resolveConfig({ redact: { generic_dates: true }, verification: { weights: { PHONE: 5 } } });
    expect(config.redact).toEqual({ ...DEFAULT_CONFIG.redact, generic_dates: true });
    expect(config.verification.weights).toEqual({ PHONE: 5 });
  });

  it("does not mutate the defaults", () => {
    resolveConfig({ redact: { person_names: false } });
    expect(DEFAULT_CONFIG.redact.person_names).toBe(true);
  });

  it("reports the paths of invalid values", () => {
    try {
      resolveConfig({ verification: { min_confidence: 2 }, redact: { alias_labels: "drop" } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe("CONFIG_INVALID");
        expect([...err.issues].sort()).toEqual(["redact.alias_labels", "verification.min_confidence"]);
      }
    }
  });

  it("rejects unknown labels in precedence", () => {
    expect(() => resolveConfig({ precedence: ["PERSON", "SSN"] })).toThrow(ConfigError);
  });
});

// =============================================================================
// Files & secret
// =============================================================================

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("reads a JSON file", () => {
    dir = mkdtempSync(join(tmpdir(), "docredact-config-"));
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ detectors: { coref: { enabled: true, backend: "regex" } } }));
    expect(loadConfig(path).detectors.coref).toEqual({ enabled: true, backend: "regex", required: false });
  });

  it("wraps unreadable files in ConfigError", () => {
    dir = mkdtempSync(join(tmpdir(), "docredact-config-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(ConfigError);
    const missing = join(dir, "missing.json");
    expect(() => loadConfig(missing)).toThrow(ConfigError);
  });
});

describe("readSeedSecret", () => {
  it("reads the configured variable", () => {
    const config = resolveConfig({ pseudonyms: { seed: { secret_env: "MY_SECRET" } } });
    expect(readSeedSecret(config, { env: { MY_SECRET: "test-secret" } })).toBe("test-secret");
  });

  it("treats an empty value as absent and throws when required", () => {
    const config = resolveConfig();
    expect(readSeedSecret(config, { env: { REDACTOR_SEED_SECRET: "" } })).toBeUndefined();
    expect(() => readSeedSecret(config, { env: {}, require: true })).toThrow(MissingSecretError);
  });
});
