/**
 * Runner entrypoint: predicts symbiont functions for one sample
 *
 * Usage:
 *   INPUT_PATH=sample.tsv RECORD_DB_PATH=data/record_db.tsv npm start
 *   HOST="Acyrthosiphon pisum" INPUT_PATH=... RECORD_DB_PATH=... npm start
 *
 * Environment variables:
 *   - INPUT_PATH: Sample abundance table (TSV, required)
 *   - RECORD_DB_PATH: Reference record store (TSV, required)
 *   - OUTPUT_PREFIX: Output prefix (optional, defaults to results/prediction)
 *   - HOST: Host species name (optional)
 *   - HOST_DB_PATH: Host taxonomy SQLite database (optional, defaults to data/insect_taxonomy.db)
 *   - EVIDENCE_MODE: stored | derived (optional, defaults to stored)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { loadRunConfig, runOnce } from "./orchestration/runner";
import * as logger from "./logger";

function main(): void {
  try {
    const outcome = runOnce(loadRunConfig());

    logger.info("Run finished", {
      functions: outcome.result.functions.length,
      candidates: outcome.result.candidates.length,
      warnings: outcome.result.warnings.length,
      ...outcome.paths,
    });
    process.exit(0);
  } catch (error) {
    logger.error("Run failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

main();
