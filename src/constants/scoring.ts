/**
 * Scoring configuration constants
 *
 * All scoring parameters are defined here to keep scoring logic
 * config-driven and avoid magic numbers. These tables are part of the
 * documented output contract and never vary per run.
 */

import type { EvidenceLevel, HostMatchLevel } from "@/types";

/**
 * Taxon match weights by rank.
 *
 * Species-level identity is trusted fully; a genus-level match only tells us
 * a relative of a documented symbiont is present.
 */
export const TAXON_MATCH_WEIGHTS = Object.freeze({
  Species: 1.0,
  Genus: 0.6,
} as const);

/**
 * Multiplier applied to log10(RA% + 1).
 *
 * Brings base scores into a readable 0-200 range.
 */
export const SCORE_SCALING_FACTOR = 100;

/**
 * Host-match tier weights.
 */
export const HOST_MATCH_WEIGHTS: Readonly<Record<HostMatchLevel, number>> =
  Object.freeze({
    Species: 1.5,
    Genus: 1.3,
    Family: 1.2,
    Order: 1.1,
    General: 1.0,
    Mismatch: 0.8,
  });

/**
 * Evidence level weights.
 *
 * 5: Symbiont + genome + top journal, 4: Symbiont + genome,
 * 3: Symbiont + top journal, 2: Symbiont only, 1: weakest.
 */
export const EVIDENCE_LEVEL_WEIGHTS: Readonly<Record<EvidenceLevel, number>> =
  Object.freeze({
    5: 1.5,
    4: 1.3,
    3: 1.15,
    2: 1.0,
    1: 0.8,
  });

/**
 * Level assumed for records whose store carries no evidence level.
 */
export const DEFAULT_EVIDENCE_LEVEL: EvidenceLevel = 2;

export const MIN_EVIDENCE_LEVEL: EvidenceLevel = 1;
export const MAX_EVIDENCE_LEVEL: EvidenceLevel = 5;

/**
 * Probability model parameters.
 *
 * Sigmoid on total relative abundance, multiplied by bounded factors for
 * match confidence, host match, evidence quality and taxa count.
 */
export const PROBABILITY_SIGMOID_STEEPNESS = 0.3;
export const PROBABILITY_SIGMOID_MIDPOINT_PCT = 5;

export const CONFIDENCE_FACTOR_BASE = 0.9;
export const CONFIDENCE_FACTOR_SLOPE = 0.2;

export const HOST_FACTOR_BASE = 0.95;
export const HOST_FACTOR_SLOPE = 0.1;

export const EVIDENCE_FACTOR_BASE = 0.95;
export const EVIDENCE_FACTOR_SLOPE = 0.1;

export const TAXA_FACTOR_SLOPE = 0.05;
