/**
 * PseudonymGenerator
 *
 * One entry point per surrogate kind. Every call is keyed, so the same
 * `(kind, key)` always yields the same value for a given seeder, and every
 * result is checked against its source: a collision is retried with the salted
 * keys `key:1` and `key:2` before the last candidate is accepted.
 */

import type { SeedSource } from "../engine/seed.js";
import type { SeededRng } from "../engine/rng.js";
import type { AccountSubtype, AddressLineKind } from "../engine/types.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { addressBlockLike, addressLineLike } from "./address.js";
import { emailLike, phoneLike } from "./contact.js";
import { dateLike } from "./dates.js";
import type { DateOptions } from "./dates.js";
import { bankOrgLike, orgLike, personLike, placeLike, surnameFor } from "./names.js";
import type { PersonOptions } from "./names.js";
import {
  bicLike,
  ccLike,
  einLike,
  genericDigitsLike,
  ibanLike,
  routingLike,
  ssnLike,
} from "./numbers.js";

export const MAX_ATTEMPTS = 3;

export type GeneratorKind =
  | "PERSON"
  | "SURNAME"
  | "ORG"
  | "BANK_ORG"
  | "PLACE"
  | "ADDRESS_LINE"
  | "ADDRESS_BLOCK"
  | "EMAIL"
  | "PHONE"
  | "ACCOUNT_ID"
  | "DATE";

function salted(key: string, attempt: number): string {
  return attempt === 0 ? key : `${key}:${attempt}`;
}

function normalized(text: string): string {
  return text.normalize("NFC");
}

export class PseudonymGenerator {
  private readonly seeds: SeedSource;
  private readonly logger: Logger;
  private exhaustedCount = 0;

  constructor(seeds: SeedSource, logger: Logger = silentLogger) {
    this.seeds = seeds;
    this.logger = logger;
  }

  /** Calls that ran out of attempts. */
  get exhausted(): number {
    return this.exhaustedCount;
  }

  token(kind: string, key: string, length?: number): string {
    return this.seeds.token(kind, key, length);
  }

  rng(kind: string, key: string): SeededRng {
    return this.seeds.rng(kind, key);
  }

  /**
   * Run `make` under `key`, then under salted keys while the candidate equals
   * the source. The last candidate is returned even when it still collides.
   */
  ensureDifferent(kind: GeneratorKind, source: string, key: string, make: (key: string) => string): string {
    let candidate = source;
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      candidate = make(salted(key, attempt));
      if (normalized(candidate) !== normalized(source)) return candidate;
    }
    this.exhaustedCount++;
    this.logger.warn(`generator exhausted kind=${kind} length=${source.length}`);
    return candidate;
  }

  // ===========================================================================
  // Names
  // ===========================================================================

  person(source: string, key: string, options: PersonOptions = {}): string {
    return this.ensureDifferent("PERSON", source, key, (k) => personLike(source, k, this.seeds, options));
  }

  /** The surrogate surname shared by every mention keyed by `key`, segmented like `shape`. */
  surname(key: string, source?: string, shape?: string): string {
    if (source === undefined) return surnameFor(key, this.seeds, shape);
    return this.ensureDifferent("SURNAME", source, key, (k) => surnameFor(k, this.seeds, shape));
  }

  org(source: string, key: string): string {
    return this.ensureDifferent("ORG", source, key, (k) => orgLike(source, k, this.seeds));
  }

  bank(source: string, key: string): string {
    return this.ensureDifferent("BANK_ORG", source, key, (k) => bankOrgLike(source, k, this.seeds));
  }

  place(source: string, key: string): string {
    return this.ensureDifferent("PLACE", source, key, (k) => placeLike(source, k, this.seeds));
  }

  // ===========================================================================
  // Addresses
  // ===========================================================================

  addressLine(source: string, key: string, kind?: AddressLineKind): string {
    return this.ensureDifferent("ADDRESS_LINE", source, key, (k) => addressLineLike(source, k, this.seeds, kind));
  }

  addressBlock(source: string, key: string, lineKinds: readonly AddressLineKind[] = []): string {
    return this.ensureDifferent("ADDRESS_BLOCK", source, key, (k) =>
      addressBlockLike(source, k, this.seeds, lineKinds),
    );
  }

  // ===========================================================================
  // Contact
  // ===========================================================================

  email(source: string, key: string): string {
    return this.ensureDifferent("EMAIL", source, key, (k) => emailLike(source, k, this.seeds));
  }

  phone(source: string, key: string): string {
    return this.ensureDifferent("PHONE", source, key, (k) => phoneLike(source, k, this.seeds));
  }

  // ===========================================================================
  // Numbers and dates
  // ===========================================================================

  account(source: string, key: string, subtype: AccountSubtype): string {
    return this.ensureDifferent("ACCOUNT_ID", source, key, (k) => {
      switch (subtype) {
        case "iban":
          return ibanLike(source, k, this.seeds);
        case "swift_bic":
          return bicLike(source, k, this.seeds);
        case "routing_aba":
          return routingLike(source, k, this.seeds);
        case "cc":
          return ccLike(source, k, this.seeds);
        case "ssn":
          return ssnLike(source, k, this.seeds);
        case "ein":
          return einLike(source, k, this.seeds);
        case "generic":
          return genericDigitsLike(source, k, this.seeds);
      }
    });
  }

  date(source: string, key: string, options: DateOptions = {}): string {
    return this.ensureDifferent("DATE", source, key, (k) => dateLike(source, k, this.seeds, options));
  }
}
