/**
 * Shared engine types
 */

// =============================================================================
// Labels
// =============================================================================

export const ENTITY_LABELS = [
  "PERSON",
  "ORG",
  "BANK_ORG",
  "EMAIL",
  "PHONE",
  "ACCOUNT_ID",
  "ADDRESS_BLOCK",
  "DOB",
  "DATE_GENERIC",
  "ALIAS_LABEL",
  "GPE",
  "LOC",
  "OTHER",
] as const;

export type EntityLabel = (typeof ENTITY_LABELS)[number];

export function isEntityLabel(value: string): value is EntityLabel {
  return ENTITY_LABELS.some((label) => label === value);
}

export const ACCOUNT_SUBTYPES = [
  "iban",
  "swift_bic",
  "routing_aba",
  "cc",
  "ssn",
  "ein",
  "generic",
] as const;

export type AccountSubtype = (typeof ACCOUNT_SUBTYPES)[number];

export function isAccountSubtype(value: unknown): value is AccountSubtype {
  return ACCOUNT_SUBTYPES.some((subtype) => subtype === value);
}

export type AddressLineKind = "street" | "unit" | "city_state_zip" | "po_box";

export function isAddressLineKind(value: unknown): value is AddressLineKind {
  return value === "street" || value === "unit" || value === "city_state_zip" || value === "po_box";
}

// =============================================================================
// Spans
// =============================================================================

export type SpanAttrs = Record<string, unknown>;

export type EntitySpan = {
  readonly start: number; // inclusive
  readonly end: number; // exclusive
  readonly text: string;
  readonly label: EntityLabel;
  readonly source: string; // producer identifier
  readonly confidence: number; // 0-1
  readonly attrs: Readonly<SpanAttrs>;
  readonly entityId?: string;
  readonly spanId?: string;
};

export type OffsetPair = [start: number, end: number];

// =============================================================================
// Detectors
// =============================================================================

export type DetectionContext = {
  docId?: string;
  locale?: string;
  lineStarts?: readonly number[];
};

export type Detector = {
  name(): string;
  detect(text: string, context?: DetectionContext): EntitySpan[];
};

// =============================================================================
// Alias clusters
// =============================================================================

export type AliasCluster = {
  clusterId: string;
  primarySurface: string;
  subjectLabel: EntityLabel | null;
  aliases: string[];
  roleAliases: string[];
  subjectSpans: OffsetPair[];
  aliasDefSpans: OffsetPair[];
  aliasMentionSpans: OffsetPair[];
};

export type ClusterArena = Map<string, AliasCluster>;

// =============================================================================
// Plans
// =============================================================================

export type PlanMeta = Record<string, unknown> & {
  source?: string;
  subtype?: string;
  cluster_id?: string;
  policy_flags?: string[];
  original_text?: string;
  confidence?: number;
  applied_index?: number;
  line_replacements?: string[];
  exhausted?: boolean;
};

export type PlanEntry = {
  readonly start: number;
  readonly end: number;
  readonly replacement: string;
  readonly label: EntityLabel;
  readonly entityId: string | null;
  readonly spanId: string | null;
  readonly meta: Readonly<PlanMeta>;
};

// =============================================================================
// Verification
// =============================================================================

export type IgnoredReason =
  | "replacement_match"
  | "replacement_match_block_line"
  | "in_address_block_replacement"
  | "inside_replacement"
  | "safe_email_domain"
  | "safe_phone"
  | "policy_keep_roles"
  | "policy_generic_dates";

export type VerificationFinding = {
  start: number;
  end: number;
  text: string;
  label: EntityLabel;
  confidence: number;
  attrs: Readonly<SpanAttrs>;
  ignoredReason?: IgnoredReason;
};

export type VerificationReport = {
  findings: VerificationFinding[];
  residual: VerificationFinding[];
  ignored: VerificationFinding[];
  countsByLabel: Partial<Record<EntityLabel, number>>;
  ignoredByLabel: Partial<Record<EntityLabel, number>>;
  residualCount: number;
  ignoredCount: number;
  totalFound: number;
  score: number;
  details: {
    weights: Record<EntityLabel, number>;
    min_confidence: number;
  };
};

// =============================================================================
// Optional backends
// =============================================================================

export type Availability<T> = { available: true; handle: T } | { available: false; reason: string };
