/**
 * Test builders for reference records and indexes
 */

import type { ReferenceIndex, ReferenceRecord } from "@/types";
import { parseTaxonLabel } from "@/utils";
import { buildReferenceIndex } from "@/records";

export type RecordOverrides = Partial<Omit<ReferenceRecord, "taxon">>;

/**
 * Build a record; the taxon ranks are parsed from taxonLabel.
 * Defaults describe a General-host Nutrition record with no evidence level.
 */
export function makeRecord(overrides: RecordOverrides = {}): ReferenceRecord {
  const taxonLabel =
    overrides.taxonLabel ?? "g__Buchnera; s__Buchnera aphidicola";
  const taxon = parseTaxonLabel(taxonLabel);
  if (!taxon) {
    throw new Error(`test record label does not parse: ${taxonLabel}`);
  }

  return {
    id: "rec_test",
    function: "Nutrition",
    host: "General",
    hostOrder: null,
    hostFamily: null,
    recordType: "Symbiont",
    genomeId: null,
    journal: null,
    description: "",
    evidenceCitation: "",
    evidenceLevel: null,
    ...overrides,
    taxonLabel,
    taxon,
  };
}

export function makeIndex(records: ReferenceRecord[]): ReferenceIndex {
  return buildReferenceIndex(records);
}
