/**
 * Runner type definitions
 */

import type { EvidenceMode } from "./evidence";

/**
 * Settings for a single prediction run, read from the environment.
 */
export type RunConfig = {
  /** Abundance table (TSV) */
  inputPath: string;
  /** Reference record store (TSV) */
  recordStorePath: string;
  /** Output prefix; "_functions.tsv" and "_potential_symbionts.tsv" are appended */
  outputPrefix: string;
  /** Host species name, null for no host context */
  host: string | null;
  /** SQLite host taxonomy database, null to skip host lookups */
  hostDbPath: string | null;
  evidenceMode: EvidenceMode;
};
