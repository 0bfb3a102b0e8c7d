/**
 * Runner core: executes one prediction run from configuration
 *
 * Key responsibilities:
 * - Read run settings from the environment
 * - Load the record store and the sample table
 * - Open the host taxonomy database when a host is given
 * - Run the prediction and write both report tables
 *
 * Host database problems never abort a run: it continues without host context.
 */

import { existsSync } from "fs";
import type {
  EvidenceMode,
  HostTaxonomyResolver,
  PredictionResult,
  PredictionWarning,
  RunConfig,
} from "@/types";
import { DEFAULT_HOST_DB_PATH, DEFAULT_OUTPUT_PREFIX } from "@/constants";
import { loadRecordStore } from "@/records";
import { readSampleTable, writeReports, type ReportPaths } from "@/io";
import { runPrediction } from "@/prediction";
import {
  openDb,
  closeDb,
  countTaxonNodes,
  sqliteHostTaxonomyResolver,
} from "@/db";
import * as logger from "@/logger";

/**
 * Error thrown when required run settings are missing or invalid
 */
export class RunConfigError extends Error {
  constructor(message: string) {
    super(`Invalid run configuration: ${message}`);
    this.name = "RunConfigError";
  }
}

export type RunOutcome = {
  result: PredictionResult;
  paths: ReportPaths;
};

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new RunConfigError(`${name} is required`);
  }
  return value;
}

function parseEvidenceMode(value: string | null): EvidenceMode {
  if (value === null) {
    return "stored";
  }
  const mode = value.toLowerCase();
  if (mode === "stored" || mode === "derived") {
    return mode;
  }
  throw new RunConfigError(
    `EVIDENCE_MODE must be "stored" or "derived", got "${value}"`,
  );
}

/**
 * Builds the run configuration from environment variables
 *
 * - INPUT_PATH (required): sample abundance table
 * - RECORD_DB_PATH (required): reference record store
 * - OUTPUT_PREFIX: output prefix (default results/prediction)
 * - HOST: host species name (optional)
 * - HOST_DB_PATH: host taxonomy SQLite database (default data/insect_taxonomy.db)
 * - EVIDENCE_MODE: stored | derived (default stored)
 *
 * @throws {RunConfigError} If a required variable is missing or invalid
 */
export function loadRunConfig(env: Env = process.env): RunConfig {
  const host = readEnv(env, "HOST");
  return {
    inputPath: requireEnv(env, "INPUT_PATH"),
    recordStorePath: requireEnv(env, "RECORD_DB_PATH"),
    outputPrefix: readEnv(env, "OUTPUT_PREFIX") ?? DEFAULT_OUTPUT_PREFIX,
    host,
    hostDbPath: host
      ? (readEnv(env, "HOST_DB_PATH") ?? DEFAULT_HOST_DB_PATH)
      : null,
    evidenceMode: parseEvidenceMode(readEnv(env, "EVIDENCE_MODE")),
  };
}

function openHostResolver(config: RunConfig): HostTaxonomyResolver | null {
  if (!config.host || !config.hostDbPath) {
    return null;
  }
  if (!existsSync(config.hostDbPath)) {
    logger.warn("Host taxonomy database not found; continuing without host context", {
      hostDbPath: config.hostDbPath,
    });
    return null;
  }

  try {
    openDb(config.hostDbPath, { readonly: true });
    const nodes = countTaxonNodes();
    logger.info("Host taxonomy database opened", {
      hostDbPath: config.hostDbPath,
      nodes,
    });
    return sqliteHostTaxonomyResolver;
  } catch (err) {
    closeDb();
    logger.warn("Host taxonomy database unusable; continuing without host context", {
      hostDbPath: config.hostDbPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Execute one prediction run
 *
 * @throws {Error} If the record store or sample table cannot be read
 */
export function runOnce(config: RunConfig): RunOutcome {
  const { index, rejected } = loadRecordStore(config.recordStorePath);
  const sample = readSampleTable(config.inputPath);

  const recordWarnings: PredictionWarning[] = rejected.map((issue) => ({
    code: "RECORD_REJECTED",
    message: issue.message,
    subject: `record row ${issue.row}`,
  }));

  const resolver = openHostResolver(config);
  try {
    const prediction = runPrediction({
      rows: sample.rows,
      index,
      hostName: config.host,
      resolver,
      evidenceMode: config.evidenceMode,
    });
    const result: PredictionResult = {
      ...prediction,
      warnings: [...recordWarnings, ...prediction.warnings],
    };

    const paths = writeReports(result, config.outputPrefix);
    return { result, paths };
  } finally {
    if (resolver) {
      closeDb();
    }
  }
}
