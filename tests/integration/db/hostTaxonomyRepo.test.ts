/**
 * Integration tests for the host taxonomy repository
 *
 * Real SQLite DB with real migrations (temp file per test).
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { HOST_TAXONOMY_NODES } from "../../helpers/hostTaxonomy";
import {
  getHostLineage,
  getTaxonByName,
  countTaxonNodes,
  upsertTaxonNodes,
  sqliteHostTaxonomyResolver,
} from "@/db";
import { resolveHostProfile } from "@/signal/host";

describe("hostTaxonomyRepo", () => {
  let harness: TestDbHarness;

  beforeEach(() => {
    harness = createTestDb();
    upsertTaxonNodes(HOST_TAXONOMY_NODES);
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("records the applied migration", () => {
    const rows = harness.db
      .prepare("SELECT version FROM schema_migrations")
      .all() as { version: string }[];
    expect(rows.map((r) => r.version)).toEqual(["0001_host_taxonomy.sql"]);
  });

  it("counts seeded nodes", () => {
    expect(countTaxonNodes()).toBe(HOST_TAXONOMY_NODES.length);
  });

  it("finds nodes by name case-insensitively", () => {
    expect(getTaxonByName("  aphididae ")?.tax_id).toBe(27482);
    expect(getTaxonByName("Nonexistent")).toBeUndefined();
  });

  it("walks the parent chain up to the self-parented root", () => {
    expect(getHostLineage("acyrthosiphon PISUM")).toEqual({
      order: "Hemiptera",
      family: "Aphididae",
      genus: "Acyrthosiphon",
      species: "Acyrthosiphon pisum",
    });
  });

  it("leaves ranks below the named node null", () => {
    expect(getHostLineage("Aphis")).toEqual({
      order: "Hemiptera",
      family: "Aphididae",
      genus: "Aphis",
      species: null,
    });
  });

  it("stops at a missing parent", () => {
    expect(getHostLineage("Orphanus testus")).toEqual({
      order: null,
      family: null,
      genus: null,
      species: "Orphanus testus",
    });
  });

  it("returns null for unknown names", () => {
    expect(getHostLineage("Imaginaria fictus")).toBeNull();
  });

  it("replaces nodes on upsert", () => {
    upsertTaxonNodes([
      { tax_id: 80765, parent_id: 27482, rank: "genus", name: "Aphis L." },
    ]);
    expect(getTaxonByName("Aphis")).toBeUndefined();
    expect(getTaxonByName("Aphis L.")?.tax_id).toBe(80765);
  });

  it("serves as the host resolver for profile resolution", () => {
    const { profile, warnings } = resolveHostProfile(
      "Acyrthosiphon pisum",
      sqliteHostTaxonomyResolver,
    );
    expect(warnings).toEqual([]);
    expect(profile?.family).toBe("Aphididae");
  });
});
