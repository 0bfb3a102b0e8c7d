/**
 * Function aggregation
 *
 * Pure in-memory rollup of scored candidates into one aggregate per function.
 * No I/O, no side effects - deterministic function only.
 *
 * Per function:
 * - finalScoreSum: sum of candidate final scores
 * - totalRelativeAbundancePct: each input row counted once, even when several
 *   of its records share the function (rows still count once per function)
 * - meanConfidence / meanHostMatch / meanEvidenceWeight: arithmetic means over candidates
 * - taxaCount: distinct taxon labels
 * - dominantContributor: label of the highest final score (first seen wins ties)
 */

import type { FunctionAggregate, ScoredCandidate } from "@/types";

type FunctionAccumulator = {
  finalScoreSum: number;
  abundancePct: number;
  confidenceSum: number;
  hostMatchSum: number;
  evidenceWeightSum: number;
  candidateCount: number;
  rowIndexes: Set<number>;
  taxonLabels: Set<string>;
  top: ScoredCandidate;
};

function newAccumulator(candidate: ScoredCandidate): FunctionAccumulator {
  return {
    finalScoreSum: 0,
    abundancePct: 0,
    confidenceSum: 0,
    hostMatchSum: 0,
    evidenceWeightSum: 0,
    candidateCount: 0,
    rowIndexes: new Set<number>(),
    taxonLabels: new Set<string>(),
    top: candidate,
  };
}

/**
 * Aggregates candidates by function.
 *
 * @param candidates - Scored candidates in any order
 * @returns One aggregate per function, in order of first appearance
 */
export function aggregateFunctions(
  candidates: readonly ScoredCandidate[],
): FunctionAggregate[] {
  const byFunction = new Map<string, FunctionAccumulator>();

  for (const candidate of candidates) {
    let acc = byFunction.get(candidate.function);
    if (!acc) {
      acc = newAccumulator(candidate);
      byFunction.set(candidate.function, acc);
    }

    acc.finalScoreSum += candidate.finalScore;
    acc.confidenceSum += candidate.match.taxonMatchWeight;
    acc.hostMatchSum += candidate.hostMatchWeight;
    acc.evidenceWeightSum += candidate.evidenceWeight;
    acc.candidateCount += 1;
    acc.taxonLabels.add(candidate.taxonLabel);

    if (!acc.rowIndexes.has(candidate.match.rowIndex)) {
      acc.rowIndexes.add(candidate.match.rowIndex);
      acc.abundancePct += candidate.match.relativeAbundancePct;
    }

    if (candidate.finalScore > acc.top.finalScore) {
      acc.top = candidate;
    }
  }

  const aggregates: FunctionAggregate[] = [];
  for (const [fn, acc] of byFunction) {
    aggregates.push({
      function: fn,
      finalScoreSum: acc.finalScoreSum,
      totalRelativeAbundancePct: acc.abundancePct,
      meanConfidence: acc.confidenceSum / acc.candidateCount,
      meanHostMatch: acc.hostMatchSum / acc.candidateCount,
      meanEvidenceWeight: acc.evidenceWeightSum / acc.candidateCount,
      taxaCount: acc.taxonLabels.size,
      dominantContributor: acc.top.taxonLabel,
    });
  }

  return aggregates;
}
