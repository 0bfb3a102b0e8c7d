/**
 * Reference record store type definitions
 *
 * Two forms exist (same split as any loaded configuration in this project):
 * - ReferenceRecordRaw: one row as read from the record store file
 * - ReferenceRecord / ReferenceIndex: validated, compiled form used for matching
 */

import type { TaxonRanks } from "./taxonomy";
import type { EvidenceLevel } from "./evidence";

export type RecordType = "Symbiont" | "Other";

/**
 * One record store row, keyed by normalized column name.
 *
 * Values are untrimmed strings; absent columns are simply missing keys.
 */
export type ReferenceRecordRaw = Record<string, string | undefined>;

/**
 * A curated symbiont-function relationship.
 *
 * Immutable once loaded. Many records may share a function or a taxon.
 */
export type ReferenceRecord = {
  /** Stable identifier within a run ("rec_12", or "rec_12#2" for split function tags) */
  id: string;
  /** Taxon label exactly as stored */
  taxonLabel: string;
  /** Parsed taxon label */
  taxon: TaxonRanks;
  /** Function category tag (e.g., "Nutrition") */
  function: string;
  /** Declared host species, or the "General" sentinel */
  host: string;
  hostOrder: string | null;
  hostFamily: string | null;
  recordType: RecordType;
  genomeId: string | null;
  journal: string | null;
  description: string;
  evidenceCitation: string;
  /** Evidence level stored with the record, null when the store has none */
  evidenceLevel: EvidenceLevel | null;
};

/**
 * Compiled record store optimized for taxon lookups.
 *
 * Keys are normalized with taxonKey() (lowercase, single spaces).
 */
export type ReferenceIndex = {
  /** All accepted records, in store order */
  records: ReferenceRecord[];
  /** Full binomial key → records documented at species level */
  bySpecies: Map<string, ReferenceRecord[]>;
  /** Genus key → every record of that genus */
  byGenus: Map<string, ReferenceRecord[]>;
};

/**
 * Why a record store row was rejected or adjusted during loading.
 */
export type RecordLoadIssue = {
  /** 1-based data row number (header excluded) */
  row: number;
  message: string;
};

/**
 * Record store loading outcome.
 */
export type RecordLoadResult = {
  index: ReferenceIndex;
  /** Rows excluded from matching */
  rejected: RecordLoadIssue[];
  /** Rows kept with an unusable optional value replaced by its default */
  defaulted: RecordLoadIssue[];
};
