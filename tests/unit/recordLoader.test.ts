/**
 * Unit tests for record store validation and compilation
 *
 * Builds record store tables from in-memory TSV text and checks accepted,
 * rejected and defaulted rows plus the compiled species/genus index.
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  parseTsv,
  splitFunctionTags,
  isEvidenceLevel,
  RecordStoreValidationError,
} from "@/utils";
import { compileRecordStore } from "@/records";

const HEADER = [
  "Taxonomy",
  "Host Species",
  "function_tags",
  "host_order",
  "host_family",
  "genome_id",
  "journal",
  "description",
  "doi",
  "evidence_level",
].join("\t");

function tsv(...rows: string[][]): string {
  return [HEADER, ...rows.map((cells) => cells.join("\t"))].join("\n");
}

const STORE = tsv(
  [
    "g__Buchnera; s__aphidicola",
    "Acyrthosiphon pisum",
    "Nutrition, Amino acid synthesis",
    "Hemiptera",
    "Aphididae",
    "GCF_000009605",
    "Nature",
    "Essential amino acid provisioning",
    "10.1000/test.1",
    "5",
  ],
  ["g__Wolbachia", "General", "Reproductive manipulation", "", "", "none"],
  ["", "General", "Defense"],
  ["d__Bacteria", "General", "Defense"],
  ["g__Serratia; s__symbiotica", "General", "none"],
  [
    "g__Hamiltonella; s__defensa",
    "Acyrthosiphon pisum",
    "Defense",
    "Hemiptera",
    "",
    "",
    "",
    "",
    "",
    "9",
  ],
);

describe("compileRecordStore", () => {
  const result = compileRecordStore(parseTsv(STORE));

  it("splits function tags into one record per tag", () => {
    expect(result.index.records.map((r) => r.id)).toEqual([
      "rec_1#1",
      "rec_1#2",
      "rec_2",
      "rec_6",
    ]);
    expect(result.index.records.map((r) => r.function)).toEqual([
      "Nutrition",
      "Amino acid synthesis",
      "Reproductive manipulation",
      "Defense",
    ]);
  });

  it("maps aliased columns onto record fields", () => {
    const record = result.index.records[0];
    expect(record.host).toBe("Acyrthosiphon pisum");
    expect(record.hostOrder).toBe("Hemiptera");
    expect(record.hostFamily).toBe("Aphididae");
    expect(record.genomeId).toBe("GCF_000009605");
    expect(record.journal).toBe("Nature");
    expect(record.evidenceCitation).toBe("10.1000/test.1");
    expect(record.evidenceLevel).toBe(5);
    expect(record.recordType).toBe("Symbiont");
  });

  it("nulls empty optional values", () => {
    const wolbachia = result.index.records[2];
    expect(wolbachia.hostOrder).toBeNull();
    expect(wolbachia.hostFamily).toBeNull();
    expect(wolbachia.genomeId).toBeNull();
    expect(wolbachia.journal).toBeNull();
    expect(wolbachia.evidenceLevel).toBeNull();
  });

  it("rejects rows missing a field, a genus or a function tag", () => {
    expect(result.rejected.map((issue) => issue.row)).toEqual([3, 4, 5]);
    expect(result.rejected[0].message).toBe(
      "missing required field(s): taxon_label",
    );
  });

  it("defaults an out-of-range evidence level", () => {
    expect(result.defaulted.map((issue) => issue.row)).toEqual([6]);
    expect(result.index.records[3].evidenceLevel).toBeNull();
  });

  it("indexes records by species and genus key", () => {
    expect(result.index.bySpecies.get("buchnera aphidicola")?.length).toBe(2);
    expect(result.index.bySpecies.has("hamiltonella defensa")).toBe(true);
    expect([...result.index.byGenus.keys()]).toEqual([
      "buchnera",
      "wolbachia",
      "hamiltonella",
    ]);
  });

  it("throws when a required column is missing", () => {
    const table = parseTsv("taxonomy\thost\nBuchnera aphidicola\tGeneral\n");
    expect(() => compileRecordStore(table)).toThrow(RecordStoreValidationError);
  });
});

describe("splitFunctionTags", () => {
  it("trims, drops empties and de-duplicates", () => {
    expect(splitFunctionTags("Nutrition, Defense,Nutrition, ")).toEqual([
      "Nutrition",
      "Defense",
    ]);
  });
});

describe("isEvidenceLevel", () => {
  it("accepts integers 1 to 5 only", () => {
    expect(isEvidenceLevel(3)).toBe(true);
    expect(isEvidenceLevel(2.5)).toBe(false);
    expect(isEvidenceLevel(0)).toBe(false);
    expect(isEvidenceLevel(6)).toBe(false);
  });
});
