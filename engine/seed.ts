/**
 * Deterministic seeding
 *
 * Stable identifiers and reproducible random streams are derived from
 * `(secret, scope, kind, canonical key)` with HMAC-SHA256 under separate
 * namespaces. Without a secret the same constructions fall back to unkeyed
 * SHA-256: predictable, and reported as `seed_present: false`.
 */

import crypto from "node:crypto";
import { SeededRng } from "./rng.js";

// =============================================================================
// Namespaces
// =============================================================================

const NS_DOC = "docredact/v1/doc-seed";
const NS_ENTITY = "docredact/v1/entity";
const NS_RNG = "docredact/v1/rng";
const SEP = Buffer.from([0x1f]);

export const MIN_ID_LENGTH = 8;
export const MAX_ID_LENGTH = 52;

// =============================================================================
// Canonicalization & hashing
// =============================================================================

export function canonicalizeKey(key: string): string {
  return key.normalize("NFC").trim().replace(/\s+/g, " ").toLowerCase();
}

export function docHash(text: string): Buffer {
  return crypto.createHash("sha256").update(text, "utf8").digest();
}

const BASE32_ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";

/** RFC 4648 base32, lower-case, no padding. */
export function base32(bytes: Uint8Array): string {
  let out = "";
  let buffer = 0;
  let bits = 0;
  for (const byte of bytes) {
    buffer = (buffer << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      out += BASE32_ALPHABET[(buffer >>> (bits - 5)) & 31];
      bits -= 5;
    }
    buffer &= (1 << bits) - 1;
  }
  if (bits > 0) {
    out += BASE32_ALPHABET[(buffer << (5 - bits)) & 31];
  }
  return out;
}

export function docHashB32(text: string): string {
  return base32(docHash(text));
}

function digest(secret: string | undefined, parts: Array<string | Buffer>): Buffer {
  const chunks: Buffer[] = [];
  parts.forEach((part, i) => {
    if (i > 0) chunks.push(SEP);
    chunks.push(typeof part === "string" ? Buffer.from(part, "utf8") : part);
  });
  const data = Buffer.concat(chunks);
  if (secret) {
    return crypto.createHmac("sha256", secret).update(data).digest();
  }
  return crypto.createHash("sha256").update(data).digest();
}

// =============================================================================
// Scope
// =============================================================================

export type ScopeOptions = {
  secret?: string;
  crossDocConsistency: boolean;
};

/**
 * Per-document scope is keyed on the document digest; cross-document scope is
 * a fixed keyed constant so the same entity maps identically across files.
 */
export function docScope(options: ScopeOptions, text: string): Buffer {
  const { secret, crossDocConsistency } = options;
  if (crossDocConsistency) {
    return secret ? digest(secret, [NS_DOC, "GLOBAL"]) : Buffer.from("GLOBAL", "utf8");
  }
  const hash = docHash(text);
  return secret ? digest(secret, [NS_DOC, hash]) : hash;
}

// =============================================================================
// Derivation
// =============================================================================

export type DerivationOptions = {
  secret?: string;
  scope: Buffer;
};

export function stableId(
  kind: string,
  key: string,
  options: DerivationOptions & { length?: number },
): string {
  const length = options.length ?? 20;
  if (!Number.isInteger(length) || length < MIN_ID_LENGTH || length > MAX_ID_LENGTH) {
    throw new RangeError(`length must be between ${MIN_ID_LENGTH} and ${MAX_ID_LENGTH}`);
  }
  const bytes = digest(options.secret, [NS_ENTITY, kind, options.scope, canonicalizeKey(key)]);
  return base32(bytes).slice(0, length);
}

export function rngFor(kind: string, key: string, options: DerivationOptions): SeededRng {
  const bytes = digest(options.secret, [NS_RNG, kind, options.scope, canonicalizeKey(key)]);
  return new SeededRng(bytes);
}

// =============================================================================
// Seeder
// =============================================================================

/** What generators need from a seeder. */
export type SeedSource = {
  token(kind: string, key: string, length?: number): string;
  rng(kind: string, key: string): SeededRng;
};

/**
 * Binds a secret and a document scope so callers only supply `(kind, key)`.
 * The secret is held privately and is not enumerable on the instance.
 */
export class Seeder {
  readonly scope: Buffer;
  readonly seedPresent: boolean;
  #secret: string | undefined;

  constructor(options: { secret?: string; scope: Buffer }) {
    this.#secret = options.secret || undefined;
    this.scope = options.scope;
    this.seedPresent = Boolean(this.#secret);
  }

  static forDocument(options: ScopeOptions, text: string): Seeder {
    return new Seeder({ secret: options.secret, scope: docScope(options, text) });
  }

  token(kind: string, key: string, length = 20): string {
    return stableId(kind, key, { secret: this.#secret, scope: this.scope, length });
  }

  rng(kind: string, key: string): SeededRng {
    return rngFor(kind, key, { secret: this.#secret, scope: this.scope });
  }
}
