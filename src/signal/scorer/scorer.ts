/**
 * Candidate scorer
 *
 * Converts a taxon match into a weighted, auditable score.
 *
 * Scoring rules:
 * - base = taxon match weight × log10(RA% + 1) × 100
 *   (zero abundance scores 0)
 * - final = base × host match weight × evidence weight
 * - Unmatched results are not scored
 */

import type {
  EvidenceMode,
  HostFamilyDeriver,
  HostProfile,
  MatchResult,
  ScoredCandidate,
} from "@/types";
import { SCORE_SCALING_FACTOR } from "@/constants";
import { matchHost } from "@/signal/host";
import { classifyEvidence } from "@/signal/evidence";

/**
 * Run-wide inputs shared by every candidate.
 */
export type ScoringContext = {
  hostProfile: HostProfile | null;
  deriveHostFamily: HostFamilyDeriver | null;
  evidenceMode: EvidenceMode;
};

/**
 * Base score from taxon match weight and relative abundance.
 *
 * @param taxonMatchWeight - 1.0 species, 0.6 genus
 * @param relativeAbundancePct - Row abundance as a percentage (0-100)
 */
export function computeBaseScore(
  taxonMatchWeight: number,
  relativeAbundancePct: number,
): number {
  return (
    taxonMatchWeight *
    Math.log10(relativeAbundancePct + 1) *
    SCORE_SCALING_FACTOR
  );
}

/**
 * Scores one match result.
 *
 * @returns The scored candidate, or null for an Unmatched result
 */
export function scoreCandidate(
  match: MatchResult,
  context: ScoringContext,
): ScoredCandidate | null {
  const record = match.record;
  if (!record || match.rankLevel === "Unmatched") {
    return null;
  }

  const baseScore = computeBaseScore(
    match.taxonMatchWeight,
    match.relativeAbundancePct,
  );
  const host = matchHost(record, context.hostProfile, context.deriveHostFamily);
  const evidence = classifyEvidence(record, context.evidenceMode);

  return {
    match,
    taxonLabel: match.row.taxonLabel,
    displayName: match.displayName,
    function: record.function,
    baseScore,
    hostMatchLevel: host.level,
    hostMatchWeight: host.weight,
    evidenceLevel: evidence.level,
    evidenceWeight: evidence.weight,
    finalScore: baseScore * host.weight * evidence.weight,
  };
}
