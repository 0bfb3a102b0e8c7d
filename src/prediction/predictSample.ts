/**
 * Sample prediction engine
 *
 * Runs one sample end to end against a compiled reference index:
 * abundance rows → relative abundance → taxon matches → scored candidates
 * → function aggregates → probabilities → ranked tables.
 *
 * Synchronous and side-effect free apart from logging; identical inputs give
 * identical outputs. The reference index and host profile are only read.
 */

import type {
  AbundanceRow,
  FunctionSummary,
  PredictionOptions,
  PredictionResult,
  PredictionWarning,
  ReferenceIndex,
  ScoredCandidate,
} from "@/types";
import { matchTaxon } from "@/signal/matcher";
import { scoreCandidate, type ScoringContext } from "@/signal/scorer";
import { aggregateFunctions } from "@/signal/aggregation";
import { estimateProbability } from "@/signal/probability";
import { lowestNamedRank } from "@/utils";
import * as logger from "@/logger";

/**
 * Thrown when a sample row cannot be scored at all (negative or non-finite abundance).
 */
export class SampleInputError extends Error {
  constructor(
    message: string,
    public readonly rowIndex: number,
  ) {
    super(`Invalid sample row ${rowIndex + 1}: ${message}`);
    this.name = "SampleInputError";
  }
}

function validateRows(rows: readonly AbundanceRow[]): void {
  rows.forEach((row, rowIndex) => {
    if (!Number.isFinite(row.abundance)) {
      throw new SampleInputError(
        `abundance ${row.abundance} is not a finite number`,
        rowIndex,
      );
    }
    if (row.abundance < 0) {
      throw new SampleInputError(
        `abundance ${row.abundance} is negative`,
        rowIndex,
      );
    }
  });
}

function compareSummaries(a: FunctionSummary, b: FunctionSummary): number {
  if (b.finalScoreSum !== a.finalScoreSum) {
    return b.finalScoreSum - a.finalScoreSum;
  }
  if (a.function === b.function) return 0;
  return a.function < b.function ? -1 : 1;
}

/**
 * Orders detail rows by their function's rank, then final score and
 * relative abundance descending. Ties keep input order (stable sort).
 */
function sortCandidates(
  candidates: ScoredCandidate[],
  functions: readonly FunctionSummary[],
): ScoredCandidate[] {
  const functionRank = new Map(functions.map((f, rank) => [f.function, rank]));
  const rankOf = (c: ScoredCandidate) =>
    functionRank.get(c.function) ?? functions.length;

  return [...candidates].sort(
    (a, b) =>
      rankOf(a) - rankOf(b) ||
      b.finalScore - a.finalScore ||
      b.match.relativeAbundancePct - a.match.relativeAbundancePct,
  );
}

/**
 * Predicts symbiont functions for one sample.
 *
 * Rows with zero abundance are skipped. Rows whose label cannot be parsed
 * still count toward the total abundance but contribute to no function.
 *
 * @param rows - Sample abundance rows
 * @param index - Compiled reference index
 * @param options - Host profile, family derivation and evidence mode
 * @returns Ranked function summaries, ranked candidates and warnings
 * @throws {SampleInputError} If an abundance is negative or not finite
 * @throws {ProbabilityComputationError} On an internal numeric defect
 */
export function predictSample(
  rows: readonly AbundanceRow[],
  index: ReferenceIndex,
  options: PredictionOptions,
): PredictionResult {
  validateRows(rows);

  const warnings: PredictionWarning[] = [];
  const totalAbundance = rows.reduce((sum, row) => sum + row.abundance, 0);

  if (totalAbundance === 0) {
    const warning: PredictionWarning = {
      code: "EMPTY_SAMPLE",
      message: "Total sample abundance is zero; nothing to score",
    };
    logger.warn(warning.message, { rows: rows.length });
    return {
      functions: [],
      candidates: [],
      warnings: [warning],
      stats: {
        totalAbundance,
        rowCount: rows.length,
        matchedRowCount: 0,
        unmatchedRowCount: 0,
      },
    };
  }

  const context: ScoringContext = {
    hostProfile: options.hostProfile,
    deriveHostFamily: options.deriveHostFamily ?? null,
    evidenceMode: options.evidenceMode ?? "stored",
  };

  const candidates: ScoredCandidate[] = [];
  let matchedRowCount = 0;
  let unmatchedRowCount = 0;

  rows.forEach((row, rowIndex) => {
    if (row.abundance === 0) {
      return;
    }

    const relativeAbundancePct = (row.abundance / totalAbundance) * 100;
    const outcome = matchTaxon({ row, rowIndex, relativeAbundancePct }, index);

    if (!outcome.ranks) {
      const warning: PredictionWarning = {
        code: "UNPARSEABLE_TAXON",
        message: "Taxon label could not be parsed; row left unmatched",
        subject: row.taxonLabel,
      };
      warnings.push(warning);
      logger.warn(warning.message, { row: rowIndex + 1, taxon: row.taxonLabel });
    }

    let rowMatched = false;
    for (const match of outcome.matches) {
      const candidate = scoreCandidate(match, context);
      if (candidate) {
        candidates.push(candidate);
        rowMatched = true;
      }
    }

    if (rowMatched) {
      matchedRowCount++;
    } else {
      unmatchedRowCount++;
      if (outcome.ranks) {
        logger.debug("No reference record for taxon", {
          row: rowIndex + 1,
          lowestRank: lowestNamedRank(outcome.ranks),
        });
      }
    }
  });

  const functions = aggregateFunctions(candidates)
    .map((aggregate) => ({
      ...aggregate,
      probability: estimateProbability(aggregate),
    }))
    .sort(compareSummaries);

  logger.info("Sample scored", {
    rows: rows.length,
    matchedRows: matchedRowCount,
    unmatchedRows: unmatchedRowCount,
    candidates: candidates.length,
    functions: functions.length,
    hostContext: options.hostProfile !== null,
  });

  return {
    functions,
    candidates: sortCandidates(candidates, functions),
    warnings,
    stats: {
      totalAbundance,
      rowCount: rows.length,
      matchedRowCount,
      unmatchedRowCount,
    },
  };
}
