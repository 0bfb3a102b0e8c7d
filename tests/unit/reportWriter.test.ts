/**
 * Unit tests for the report writer
 *
 * Row formatting is pure; writeReports writes into a temp directory.
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  functionRow,
  candidateRow,
  reportPaths,
  writeReports,
  FUNCTION_COLUMNS,
  CANDIDATE_COLUMNS,
} from "@/io";
import type { FunctionSummary, PredictionResult } from "@/types";
import { makeCandidate } from "../helpers/candidates";
import { makeRecord } from "../helpers/records";

const SUMMARY: FunctionSummary = {
  function: "Nutrition",
  finalScoreSum: 234.31335,
  totalRelativeAbundancePct: 12.5,
  meanConfidence: 1,
  meanHostMatch: 1.5,
  meanEvidenceWeight: 1.5,
  taxaCount: 1,
  probability: 0.6789,
  dominantContributor: "Buchnera aphidicola",
};

function buchneraCandidate() {
  const candidate = makeCandidate({
    fn: "Nutrition",
    taxonLabel: "Buchnera aphidicola",
    rowIndex: 0,
    relativeAbundancePct: 12.5,
    taxonMatchWeight: 1,
    hostMatchWeight: 1.5,
    evidenceWeight: 1.5,
    finalScore: 234.31335,
    hostMatchLevel: "Species",
    evidenceLevel: 5,
  });
  candidate.match.record = makeRecord({
    host: "Acyrthosiphon pisum",
    description: "x".repeat(120),
    evidenceCitation: "10.1000/test.2",
  });
  return candidate;
}

describe("functionRow", () => {
  it("rounds each column", () => {
    expect(functionRow(SUMMARY)).toEqual([
      "Nutrition",
      "234.3",
      "12.500",
      "1.00",
      "1.50",
      "1.50",
      "1",
      "0.679",
      "Buchnera aphidicola",
    ]);
  });
});

describe("candidateRow", () => {
  it("rounds scores and truncates the description", () => {
    expect(candidateRow(buchneraCandidate())).toEqual([
      "Buchnera aphidicola",
      "Nutrition",
      "234.3",
      "104.1",
      "1.50",
      "Species",
      "5",
      "1.50",
      "Species",
      "12.5000",
      "Acyrthosiphon pisum",
      `${"x".repeat(100)}...`,
      "10.1000/test.2",
    ]);
  });
});

describe("reportPaths", () => {
  it("appends both suffixes", () => {
    expect(reportPaths("out/s1")).toEqual({
      functionsPath: "out/s1_functions.tsv",
      candidatesPath: "out/s1_potential_symbionts.tsv",
    });
  });

  it("accepts a prefix that already names the functions file", () => {
    expect(reportPaths("out/s1_functions.tsv").functionsPath).toBe(
      "out/s1_functions.tsv",
    );
  });
});

describe("writeReports", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("writes both tables under a new directory", () => {
    dir = mkdtempSync(join(tmpdir(), "symbiont-reports-"));
    const result: PredictionResult = {
      functions: [SUMMARY],
      candidates: [buchneraCandidate()],
      warnings: [],
      stats: {
        totalAbundance: 8,
        rowCount: 1,
        matchedRowCount: 1,
        unmatchedRowCount: 0,
      },
    };

    const paths = writeReports(result, join(dir, "nested", "sample1"));

    const functions = readFileSync(paths.functionsPath, "utf-8").split("\n");
    expect(functions[0]).toBe(FUNCTION_COLUMNS.join("\t"));
    expect(functions[1]).toBe(
      "Nutrition\t234.3\t12.500\t1.00\t1.50\t1.50\t1\t0.679\tBuchnera aphidicola",
    );
    expect(functions[2]).toBe("");

    const candidates = readFileSync(paths.candidatesPath, "utf-8").split("\n");
    expect(candidates[0]).toBe(CANDIDATE_COLUMNS.join("\t"));
    expect(candidates).toHaveLength(3);
  });
});
