/**
 * Evidence classifier
 *
 * Assigns each reference record an evidence level (1-5) and its weight.
 *
 * Derived level: 0, +1 for a Symbiont record, +2 for a genome accession,
 * +1 for a high-impact journal, clamped to [1, 5].
 */

import type {
  EvidenceAssessment,
  EvidenceLevel,
  EvidenceMode,
  ReferenceRecord,
} from "@/types";
import {
  EVIDENCE_LEVEL_WEIGHTS,
  EVIDENCE_POINTS,
  DEFAULT_EVIDENCE_LEVEL,
  MIN_EVIDENCE_LEVEL,
  MAX_EVIDENCE_LEVEL,
  EMPTY_GENOME_IDS,
  HIGH_IMPACT_JOURNALS,
} from "@/constants";
import { isEvidenceLevel } from "@/utils";

type EvidenceMetadata = Pick<
  ReferenceRecord,
  "recordType" | "genomeId" | "journal"
>;

/**
 * Whether a journal is on the high-impact allow-list
 * (case-insensitive exact or prefix match).
 */
export function isHighImpactJournal(journal: string | null): boolean {
  if (!journal) {
    return false;
  }
  const normalized = journal.trim().replace(/\s+/g, " ").toLowerCase();
  if (normalized.length === 0) {
    return false;
  }
  return HIGH_IMPACT_JOURNALS.some(
    (venue) => normalized === venue || normalized.startsWith(venue),
  );
}

function hasGenome(genomeId: string | null): boolean {
  return (
    genomeId !== null &&
    !EMPTY_GENOME_IDS.includes(genomeId.trim().toLowerCase())
  );
}

function clampLevel(score: number): EvidenceLevel {
  const clamped = Math.min(MAX_EVIDENCE_LEVEL, Math.max(MIN_EVIDENCE_LEVEL, score));
  return isEvidenceLevel(clamped) ? clamped : DEFAULT_EVIDENCE_LEVEL;
}

/**
 * Derives an evidence level from record metadata.
 */
export function deriveEvidenceLevel(record: EvidenceMetadata): EvidenceLevel {
  let score = 0;
  if (record.recordType === "Symbiont") {
    score += EVIDENCE_POINTS.symbiontRecord;
  }
  if (hasGenome(record.genomeId)) {
    score += EVIDENCE_POINTS.genomeAccession;
  }
  if (isHighImpactJournal(record.journal)) {
    score += EVIDENCE_POINTS.highImpactJournal;
  }
  return clampLevel(score);
}

/**
 * Weight for an evidence level.
 */
export function evidenceWeight(level: EvidenceLevel): number {
  return EVIDENCE_LEVEL_WEIGHTS[level];
}

/**
 * Classifies a record's evidence.
 *
 * - stored: the level carried by the record store, or the default level (2)
 *   when the store has none
 * - derived: computed from record type, genome accession and journal
 */
export function classifyEvidence(
  record: ReferenceRecord,
  mode: EvidenceMode = "stored",
): EvidenceAssessment {
  const level =
    mode === "derived"
      ? deriveEvidenceLevel(record)
      : (record.evidenceLevel ?? DEFAULT_EVIDENCE_LEVEL);
  return { level, weight: evidenceWeight(level) };
}
