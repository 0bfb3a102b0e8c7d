/**
 * Unit tests for function aggregation
 *
 * Pure rollup of hand-built candidates.
 *
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import { aggregateFunctions } from "@/signal/aggregation";
import { makeCandidate } from "../helpers/candidates";

const candidates = [
  makeCandidate({
    fn: "Nutrition",
    taxonLabel: "A",
    rowIndex: 0,
    relativeAbundancePct: 10,
    taxonMatchWeight: 1.0,
    hostMatchWeight: 1.5,
    evidenceWeight: 1.5,
    finalScore: 100,
  }),
  makeCandidate({
    fn: "Nutrition",
    taxonLabel: "A",
    rowIndex: 0,
    relativeAbundancePct: 10,
    taxonMatchWeight: 1.0,
    hostMatchWeight: 1.0,
    evidenceWeight: 1.0,
    finalScore: 50,
  }),
  makeCandidate({
    fn: "Nutrition",
    taxonLabel: "B",
    rowIndex: 1,
    relativeAbundancePct: 5,
    taxonMatchWeight: 0.6,
    hostMatchWeight: 0.8,
    evidenceWeight: 1.3,
    finalScore: 100,
  }),
  makeCandidate({
    fn: "Defense",
    taxonLabel: "C",
    rowIndex: 2,
    relativeAbundancePct: 20,
    taxonMatchWeight: 0.6,
    hostMatchWeight: 1.0,
    evidenceWeight: 1.0,
    finalScore: 30,
  }),
];

describe("aggregateFunctions", () => {
  const aggregates = aggregateFunctions(candidates);

  it("returns one aggregate per function in order of first appearance", () => {
    expect(aggregates.map((a) => a.function)).toEqual(["Nutrition", "Defense"]);
  });

  it("sums final scores over every candidate", () => {
    expect(aggregates[0].finalScoreSum).toBe(250);
    expect(aggregates[1].finalScoreSum).toBe(30);
  });

  it("counts each row's abundance once per function", () => {
    expect(aggregates[0].totalRelativeAbundancePct).toBe(15);
    expect(aggregates[1].totalRelativeAbundancePct).toBe(20);
  });

  it("averages weights over candidates", () => {
    expect(aggregates[0].meanConfidence).toBeCloseTo(2.6 / 3, 10);
    expect(aggregates[0].meanHostMatch).toBeCloseTo(1.1, 10);
    expect(aggregates[0].meanEvidenceWeight).toBeCloseTo(3.8 / 3, 10);
  });

  it("counts distinct taxon labels", () => {
    expect(aggregates[0].taxaCount).toBe(2);
    expect(aggregates[1].taxaCount).toBe(1);
  });

  it("keeps the first candidate on a top-score tie", () => {
    expect(aggregates[0].dominantContributor).toBe("A");
    expect(aggregates[1].dominantContributor).toBe("C");
  });

  it("returns nothing for no candidates", () => {
    expect(aggregateFunctions([])).toEqual([]);
  });
});
