/**
 * Unit tests for the probability estimator
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  computeProbabilityFactors,
  estimateProbability,
  ProbabilityComputationError,
} from "@/signal/probability";

function input(overrides: {
  totalRelativeAbundancePct?: number;
  meanConfidence?: number;
  meanHostMatch?: number;
  meanEvidenceWeight?: number;
  taxaCount?: number;
} = {}) {
  return {
    function: "Nutrition",
    totalRelativeAbundancePct: 5,
    meanConfidence: 1.0,
    meanHostMatch: 1.0,
    meanEvidenceWeight: 1.0,
    taxaCount: 1,
    ...overrides,
  };
}

describe("computeProbabilityFactors", () => {
  it("centres the sigmoid at 5% abundance", () => {
    const factors = computeProbabilityFactors(input());
    expect(factors.base).toBe(0.5);
    expect(factors.confidence).toBeCloseTo(1.1, 10);
    expect(factors.host).toBeCloseTo(0.95, 10);
    expect(factors.evidence).toBeCloseTo(0.95, 10);
    expect(factors.taxa).toBeCloseTo(1 + 0.05 * Math.log10(2), 10);
  });

  it("rewards strong host and evidence matches", () => {
    const factors = computeProbabilityFactors(
      input({ meanHostMatch: 1.5, meanEvidenceWeight: 1.5 }),
    );
    expect(factors.host).toBeCloseTo(1.0, 10);
    expect(factors.evidence).toBeCloseTo(1.0, 10);
  });
});

describe("estimateProbability", () => {
  it("multiplies the factors", () => {
    expect(estimateProbability(input())).toBeCloseTo(0.50385, 4);
  });

  it("clamps to 1", () => {
    const p = estimateProbability(
      input({
        totalRelativeAbundancePct: 100,
        meanHostMatch: 1.5,
        meanEvidenceWeight: 1.5,
        taxaCount: 10,
      }),
    );
    expect(p).toBe(1);
  });

  it("stays within [0, 1] for weak signals", () => {
    const p = estimateProbability(
      input({
        totalRelativeAbundancePct: 0,
        meanConfidence: 0.6,
        meanHostMatch: 0.8,
        meanEvidenceWeight: 0.8,
      }),
    );
    expect(p).toBeGreaterThan(0);
    expect(p).toBeLessThan(0.2);
  });

  it("grows with abundance", () => {
    const low = estimateProbability(input({ totalRelativeAbundancePct: 1 }));
    const mid = estimateProbability(input({ totalRelativeAbundancePct: 5 }));
    const high = estimateProbability(input({ totalRelativeAbundancePct: 10 }));
    expect(low).toBeLessThan(mid);
    expect(mid).toBeLessThan(high);
  });

  it("throws on a non-finite result", () => {
    expect(() => estimateProbability(input({ meanConfidence: NaN }))).toThrow(
      ProbabilityComputationError,
    );
  });
});
