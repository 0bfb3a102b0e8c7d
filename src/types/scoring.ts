/**
 * Scoring type definitions
 *
 * Types for the candidate-level scores and the per-function rollups.
 */

import type { HostMatchLevel } from "./host";
import type { EvidenceLevel } from "./evidence";
import type { ReferenceRecord } from "./records";
import type { RankLevel } from "./taxonomy";

/**
 * One sample row as supplied by the caller.
 */
export type AbundanceRow = {
  /** Hierarchical taxon label */
  taxonLabel: string;
  /** Non-negative count */
  abundance: number;
};

/**
 * Result of comparing one abundance row against the record store.
 *
 * One per (row, matched record). Unmatched rows produce a single result
 * with record = null and are excluded from scoring.
 */
export type MatchResult = {
  row: AbundanceRow;
  /** Row position in the input (0-based), used to count a row once per function */
  rowIndex: number;
  /** Row abundance as a percentage of the sample total */
  relativeAbundancePct: number;
  record: ReferenceRecord | null;
  rankLevel: RankLevel;
  /** 1.0 species, 0.6 genus, 0 unmatched */
  taxonMatchWeight: number;
  /** Species binomial, "<Genus> (sp.)" for genus matches, or the raw label */
  displayName: string;
};

/**
 * A surviving match with all weights applied.
 *
 * Invariant: finalScore === baseScore * hostMatchWeight * evidenceWeight
 */
export type ScoredCandidate = {
  match: MatchResult;
  taxonLabel: string;
  displayName: string;
  function: string;
  baseScore: number;
  hostMatchLevel: HostMatchLevel;
  hostMatchWeight: number;
  evidenceLevel: EvidenceLevel;
  evidenceWeight: number;
  finalScore: number;
};

/**
 * Aggregated view of every candidate sharing a function tag.
 */
export type FunctionSummary = {
  function: string;
  finalScoreSum: number;
  /** Sum of contributing rows' relative abundance, each row counted once */
  totalRelativeAbundancePct: number;
  /** Mean taxon match weight over contributing candidates */
  meanConfidence: number;
  meanHostMatch: number;
  meanEvidenceWeight: number;
  /** Distinct taxon labels contributing */
  taxaCount: number;
  /** Estimated existence probability in [0, 1] */
  probability: number;
  /** Taxon label of the candidate with the highest final score */
  dominantContributor: string;
};

/**
 * Function rollup before probability estimation.
 */
export type FunctionAggregate = Omit<FunctionSummary, "probability">;
