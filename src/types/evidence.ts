/**
 * Evidence classification type definitions
 */

/**
 * Literature/data-quality level backing a reference record (5 = strongest).
 */
export type EvidenceLevel = 1 | 2 | 3 | 4 | 5;

/**
 * How evidence levels are obtained for records.
 *
 * - stored: use the level carried by the record store (missing → default level)
 * - derived: compute from record type, genome accession and journal
 */
export type EvidenceMode = "stored" | "derived";

export type EvidenceAssessment = {
  level: EvidenceLevel;
  weight: number;
};
