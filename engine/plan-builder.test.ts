import { describe, it, expect } from "vitest";
import { buildPlan, partyLetter } from "./plan-builder.js";
import { createSpan } from "./span.js";
import { Seeder } from "./seed.js";
import { OverlapError } from "./errors.js";
import type { AliasCluster, ClusterArena, EntityLabel, EntitySpan, SpanAttrs } from "./types.js";
import { PseudonymGenerator } from "../pseudo/generator.js";
import { isLuhnValid } from "../pseudo/checksums.js";
import { DEFAULT_CONFIG } from "../config/config.js";
import type { RedactPolicy } from "../config/schema.js";
import { createMemoryLogger } from "../logger.js";

const seeder = new Seeder({ secret: "test-secret", scope: Buffer.from("plan-test") });
const policy: RedactPolicy = DEFAULT_CONFIG.redact;

function generator(): PseudonymGenerator {
  return new PseudonymGenerator(seeder);
}

function at(
  text: string,
  surface: string,
  label: EntityLabel,
  extra: { attrs?: SpanAttrs; entityId?: string; from?: number } = {},
): EntitySpan {
  const start = text.indexOf(surface, extra.from ?? 0);
  return createSpan({
    start,
    end: start + surface.length,
    text: surface,
    label,
    source: "test",
    confidence: 0.9,
    attrs: extra.attrs ?? {},
    ...(extra.entityId ? { entityId: extra.entityId } : {}),
  });
}

function cluster(clusterId: string, subjectLabel: EntityLabel | null): AliasCluster {
  return {
    clusterId,
    primarySurface: clusterId,
    subjectLabel,
    aliases: [],
    roleAliases: [],
    subjectSpans: [],
    aliasDefSpans: [],
    aliasMentionSpans: [],
  };
}

// =============================================================================
// Structure
// =============================================================================

describe("buildPlan", () => {
  it("rejects overlapping spans", () => {
    const text = "Jane Roe Smith";
    const spans = [at(text, "Jane Roe", "PERSON"), at(text, "Roe Smith", "PERSON")];
    expect(() => buildPlan(text, spans, policy, { generator: generator() })).toThrow(OverlapError);
  });

  it("orders entries by start and fills meta", () => {
    const text = "Mail jane@corp.test or call 212-734-0000.";
    const spans = [at(text, "212-734-0000", "PHONE"), at(text, "jane@corp.test", "EMAIL")];
    const plan = buildPlan(text, spans, policy, { generator: generator() });

    expect(plan.map((e) => e.label)).toEqual(["EMAIL", "PHONE"]);
    expect(plan[0].meta).toEqual({
      source: "test",
      policy_flags: [],
      original_text: "jane@corp.test",
      confidence: 0.9,
    });
    expect(plan[0].replacement).toMatch(/^[a-z2-7]{4}@example\.org$/);
    expect(plan[1].replacement).toMatch(/^[2-9]\d\d-555-\d{4}$/);
    expect(plan.map((e) => [e.entityId, e.spanId])).toEqual([
      [null, null],
      [null, null],
    ]);
  });

  it("applies the skip policies", () => {
    const text = "On 3/4/2021 Jane Roe met Acme LLC. Seller agreed.";
    const spans = [
      at(text, "3/4/2021", "DATE_GENERIC"),
      at(text, "Jane Roe", "PERSON"),
      at(text, "Acme LLC", "OTHER"),
      at(text, "Seller", "ALIAS_LABEL", { attrs: { role_flag: true, skip_replacement: true } }),
    ];
    const gen = generator();
    expect(buildPlan(text, spans, policy, { generator: gen }).map((e) => e.label)).toEqual(["PERSON"]);
    expect(
      buildPlan(text, spans, { ...policy, generic_dates: true, person_names: false }, { generator: gen }).map(
        (e) => e.label,
      ),
    ).toEqual(["DATE_GENERIC"]);
  });

  it("flags an unchanged replacement as exhausted", () => {
    const text = "Ref ---- here";
    const logger = createMemoryLogger();
    const gen = new PseudonymGenerator(seeder, logger);
    const plan = buildPlan(text, [at(text, "----", "ACCOUNT_ID")], policy, { generator: gen });
    expect(plan[0].meta.exhausted).toBe(true);
    expect(plan[0].meta.subtype).toBe("generic");
    expect(gen.exhausted).toBe(1);
    expect(logger.lines).toEqual(["warn generator exhausted kind=ACCOUNT_ID length=4"]);
  });
});

// =============================================================================
// Clusters & aliases
// =============================================================================

describe("alias policy", () => {
  it("gives a nickname the cluster surname", () => {
    const text = 'John Doe, hereinafter "Morgan". Later Morgan met Buyer.';
    const nick = { alias_kind: "nickname", cluster_id: "cluster-1", role_flag: false };
    const spans = [
      at(text, "John Doe", "PERSON", { entityId: "cluster-1" }),
      at(text, "Morgan", "ALIAS_LABEL", { entityId: "cluster-1", attrs: { ...nick, is_definition: true } }),
      at(text, "Morgan", "ALIAS_LABEL", { entityId: "cluster-1", attrs: nick, from: 30 }),
    ];
    const clusters: ClusterArena = new Map([["cluster-1", cluster("cluster-1", "PERSON")]]);
    const plan = buildPlan(text, spans, policy, { generator: generator(), clusters });

    const surname = plan[0].replacement.split(" ").at(-1);
    expect(plan[0].replacement).not.toBe("John Doe");
    expect(plan[1].replacement).toBe(surname);
    expect(plan[2].replacement).toBe(surname);
    expect(plan[2].meta.cluster_id).toBe("cluster-1");
    expect(plan[2].meta.policy_flags).toEqual(["nickname", "cluster_surname"]);
  });

  it("assigns party letters by first appearance", () => {
    const text = 'Acme LLC (the "Seller") and Bolt LLC (the "Buyer"). The Seller pays the BUYER.';
    const role = (surface: string, id: string, from = 0) =>
      at(text, surface, "ALIAS_LABEL", { entityId: id, attrs: { role_flag: true, cluster_id: id }, from });
    const spans = [role("Seller", "c1"), role("Buyer", "c2"), role("Seller", "c1", 50), role("BUYER", "c2")];
    const plan = buildPlan(text, spans, policy, { generator: generator() });
    expect(plan.map((e) => e.replacement)).toEqual(["Party A", "Party B", "Party A", "PARTY B"]);
    expect(plan[0].meta.policy_flags).toEqual(["role_alias", "party_letter"]);
  });

  it("letters unclustered roles by their canonical text", () => {
    const text = "Lessor and Lessee. LESSOR signs.";
    const role = (surface: string) => at(text, surface, "ALIAS_LABEL", { attrs: { alias_kind: "role" } });
    const plan = buildPlan(text, [role("Lessor"), role("Lessee"), role("LESSOR")], policy, { generator: generator() });
    expect(plan.map((e) => e.replacement)).toEqual(["Party A", "Party B", "PARTY A"]);
  });

  it("keeps roles under keep_roles and surrogates them otherwise", () => {
    const text = 'Acme LLC (the "Seller") agrees.';
    const spans = [at(text, "Seller", "ALIAS_LABEL", { entityId: "c1", attrs: { role_flag: true, cluster_id: "c1" } })];
    const clusters: ClusterArena = new Map([["c1", cluster("c1", "ORG")]]);
    const gen = generator();

    expect(buildPlan(text, spans, { ...policy, alias_labels: "keep_roles" }, { generator: gen, clusters })).toEqual([]);

    const plan = buildPlan(text, spans, { ...policy, role_alias_style: "surrogate" }, { generator: gen, clusters });
    expect(plan[0].replacement).toBe(gen.org("Seller", "c1"));
    expect(plan[0].meta.policy_flags).toEqual(["role_alias", "surrogate"]);
  });

  it("letters past Z", () => {
    expect([0, 25, 26, 27, 701, 702].map(partyLetter)).toEqual(["A", "Z", "AA", "AB", "ZZ", "AAA"]);
  });
});

// =============================================================================
// Dispatch
// =============================================================================

describe("generator dispatch", () => {
  it("keeps card numbers valid and tags the subtype", () => {
    const text = "Card 4111 1111 1111 1111 on file.";
    const plan = buildPlan(text, [at(text, "4111 1111 1111 1111", "ACCOUNT_ID", { attrs: { subtype: "cc" } })], policy, {
      generator: generator(),
    });
    expect(plan[0].meta.subtype).toBe("cc");
    expect(plan[0].replacement).toMatch(/^4\d{3} \d{4} \d{4} \d{4}$/);
    expect(isLuhnValid(plan[0].replacement.replace(/ /g, ""))).toBe(true);
  });

  it("records per-line replacements for address blocks", () => {
    const text = "Ship to:\n123 Main St\nSpringfield, IL 62704\nThanks";
    const block = "123 Main St\nSpringfield, IL 62704";
    const span = at(text, block, "ADDRESS_BLOCK", {
      attrs: { line_kinds: ["street", "city_state_zip"], lines: [] },
    });
    const plan = buildPlan(text, [span], policy, { generator: generator() });
    expect(plan[0].meta.line_replacements).toEqual(plan[0].replacement.split("\n"));
    expect(plan[0].meta.policy_flags).toEqual(["address_block"]);
    expect(plan[0].replacement.split("\n")[1]).toMatch(/^[A-Z][A-Za-z .'-]*, [A-Z]{2} \d{5}$/);
  });

  it("replaces single address lines by their kind", () => {
    const text = "PO Box 4410";
    const plan = buildPlan(text, [at(text, text, "ADDRESS_BLOCK", { attrs: { line_kind: "po_box" } })], policy, {
      generator: generator(),
    });
    expect(plan[0].replacement).toMatch(/^PO Box \d{4}$/);
    expect(plan[0].meta.line_replacements).toEqual([plan[0].replacement]);
  });

  it("routes dates of birth through the DOB generator", () => {
    const text = "DOB: 04/17/1980";
    const plan = buildPlan(text, [at(text, "04/17/1980", "DOB")], policy, { generator: generator() });
    expect(plan[0].replacement).toMatch(/^\d{2}\/\d{2}\/19(7[7-9]|8[0-3])$/);
    expect(plan[0].meta.policy_flags).toEqual(["dob"]);
  });

  it("keys by entity id so mentions share a surrogate", () => {
    const text = "Acme Corp and ACME CORP";
    const spans = [
      at(text, "Acme Corp", "ORG", { entityId: "org-1" }),
      at(text, "ACME CORP", "ORG", { entityId: "org-1" }),
    ];
    const plan = buildPlan(text, spans, policy, { generator: generator() });
    expect(plan[1].replacement).toBe(plan[0].replacement.toUpperCase());
  });
});
