/**
 * Function existence probability
 *
 * Maps a function aggregate to a probability in [0, 1]:
 *
 *   base     = 1 / (1 + exp(-k × (RA% − x0)))        k = 0.3, x0 = 5
 *   conf     = 0.9 + meanConfidence × 0.2
 *   host     = 0.95 + (meanHostMatch − 1) × 0.1
 *   evidence = 0.95 + (meanEvidenceWeight − 1) × 0.1
 *   taxa     = 1 + log10(taxaCount + 1) × 0.05
 *   p        = clamp(base × conf × host × evidence × taxa, 0, 1)
 */

import type { FunctionAggregate } from "@/types";
import {
  PROBABILITY_SIGMOID_STEEPNESS,
  PROBABILITY_SIGMOID_MIDPOINT_PCT,
  CONFIDENCE_FACTOR_BASE,
  CONFIDENCE_FACTOR_SLOPE,
  HOST_FACTOR_BASE,
  HOST_FACTOR_SLOPE,
  EVIDENCE_FACTOR_BASE,
  EVIDENCE_FACTOR_SLOPE,
  TAXA_FACTOR_SLOPE,
} from "@/constants";

/**
 * Thrown when the model produces a non-finite value.
 *
 * Bounded inputs make this unreachable; seeing it means an internal defect.
 */
export class ProbabilityComputationError extends Error {
  constructor(
    message: string,
    public readonly fn: string,
  ) {
    super(`Probability computation failed for "${fn}": ${message}`);
    this.name = "ProbabilityComputationError";
  }
}

export type ProbabilityFactors = {
  base: number;
  confidence: number;
  host: number;
  evidence: number;
  taxa: number;
};

type ProbabilityInput = Pick<
  FunctionAggregate,
  | "function"
  | "totalRelativeAbundancePct"
  | "meanConfidence"
  | "meanHostMatch"
  | "meanEvidenceWeight"
  | "taxaCount"
>;

/**
 * Computes the individual model factors.
 */
export function computeProbabilityFactors(
  input: ProbabilityInput,
): ProbabilityFactors {
  return {
    base:
      1 /
      (1 +
        Math.exp(
          -PROBABILITY_SIGMOID_STEEPNESS *
            (input.totalRelativeAbundancePct - PROBABILITY_SIGMOID_MIDPOINT_PCT),
        )),
    confidence:
      CONFIDENCE_FACTOR_BASE + input.meanConfidence * CONFIDENCE_FACTOR_SLOPE,
    host: HOST_FACTOR_BASE + (input.meanHostMatch - 1.0) * HOST_FACTOR_SLOPE,
    evidence:
      EVIDENCE_FACTOR_BASE +
      (input.meanEvidenceWeight - 1.0) * EVIDENCE_FACTOR_SLOPE,
    taxa: 1.0 + Math.log10(input.taxaCount + 1) * TAXA_FACTOR_SLOPE,
  };
}

/**
 * Estimates the probability that a function is present in the sample.
 *
 * @throws {ProbabilityComputationError} If the raw product is not finite
 */
export function estimateProbability(input: ProbabilityInput): number {
  const factors = computeProbabilityFactors(input);
  const raw =
    factors.base *
    factors.confidence *
    factors.host *
    factors.evidence *
    factors.taxa;

  if (!Number.isFinite(raw)) {
    throw new ProbabilityComputationError(
      `non-finite result ${raw} (factors: ${JSON.stringify(factors)})`,
      input.function,
    );
  }

  return Math.min(1, Math.max(0, raw));
}
