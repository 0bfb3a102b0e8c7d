/**
 * Prediction report writer
 *
 * Renders the two ranked tables as TSV:
 * - <prefix>_functions.tsv: one row per function
 * - <prefix>_potential_symbionts.tsv: one row per scored candidate
 */

import * as fs from "fs";
import { dirname } from "path";
import type {
  FunctionSummary,
  PredictionResult,
  ScoredCandidate,
} from "@/types";
import {
  FUNCTIONS_OUTPUT_SUFFIX,
  CANDIDATES_OUTPUT_SUFFIX,
  DESCRIPTION_PREVIEW_LENGTH,
} from "@/constants";
import { formatTsv } from "@/utils";
import * as logger from "@/logger";

export const FUNCTION_COLUMNS = [
  "Function",
  "Final_Score_Sum",
  "Total_RA_Pct",
  "Mean_Confidence",
  "Mean_Host_Match",
  "Mean_Evidence_Weight",
  "Taxa_Count",
  "Probability",
  "Dominant_Contributor",
] as const;

export const CANDIDATE_COLUMNS = [
  "Symbiont_Taxon",
  "Predicted_Function",
  "Final_Score",
  "Base_Score",
  "Host_Match_Weight",
  "Host_Match_Level",
  "Evidence_Level",
  "Evidence_Weight",
  "Match_Level",
  "Relative_Abundance_Pct",
  "DB_Host_Context",
  "DB_Description",
  "DB_Evidence",
] as const;

export type ReportPaths = {
  functionsPath: string;
  candidatesPath: string;
};

function preview(text: string): string {
  return text.length > DESCRIPTION_PREVIEW_LENGTH
    ? `${text.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`
    : text;
}

/**
 * Table row for a function summary.
 */
export function functionRow(summary: FunctionSummary): string[] {
  return [
    summary.function,
    summary.finalScoreSum.toFixed(1),
    summary.totalRelativeAbundancePct.toFixed(3),
    summary.meanConfidence.toFixed(2),
    summary.meanHostMatch.toFixed(2),
    summary.meanEvidenceWeight.toFixed(2),
    String(summary.taxaCount),
    summary.probability.toFixed(3),
    summary.dominantContributor,
  ];
}

/**
 * Table row for a scored candidate.
 */
export function candidateRow(candidate: ScoredCandidate): string[] {
  const record = candidate.match.record;
  return [
    candidate.displayName,
    candidate.function,
    candidate.finalScore.toFixed(1),
    candidate.baseScore.toFixed(1),
    candidate.hostMatchWeight.toFixed(2),
    candidate.hostMatchLevel,
    String(candidate.evidenceLevel),
    candidate.evidenceWeight.toFixed(2),
    candidate.match.rankLevel,
    candidate.match.relativeAbundancePct.toFixed(4),
    record?.host ?? "",
    preview(record?.description ?? ""),
    record?.evidenceCitation ?? "",
  ];
}

/**
 * Output paths for a prefix ("out/sample1" → "out/sample1_functions.tsv", ...).
 * A prefix already ending in "_functions" or ".tsv" is trimmed first.
 */
export function reportPaths(outputPrefix: string): ReportPaths {
  const base = outputPrefix.replace(/\.tsv$/, "").replace(/_functions$/, "");
  return {
    functionsPath: `${base}${FUNCTIONS_OUTPUT_SUFFIX}`,
    candidatesPath: `${base}${CANDIDATES_OUTPUT_SUFFIX}`,
  };
}

/**
 * Writes both report tables.
 *
 * @returns Paths of the files written
 */
export function writeReports(
  result: PredictionResult,
  outputPrefix: string,
): ReportPaths {
  const paths = reportPaths(outputPrefix);
  fs.mkdirSync(dirname(paths.functionsPath), { recursive: true });

  fs.writeFileSync(
    paths.functionsPath,
    formatTsv(FUNCTION_COLUMNS, result.functions.map(functionRow)),
  );
  fs.writeFileSync(
    paths.candidatesPath,
    formatTsv(CANDIDATE_COLUMNS, result.candidates.map(candidateRow)),
  );

  logger.info("Reports written", {
    ...paths,
    functions: result.functions.length,
    candidates: result.candidates.length,
  });
  return paths;
}
