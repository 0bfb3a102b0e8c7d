/**
 * Prediction run type definitions
 */

import type { HostFamilyDeriver, HostProfile } from "./host";
import type { EvidenceMode } from "./evidence";
import type { FunctionSummary, ScoredCandidate } from "./scoring";

export type PredictionWarningCode =
  | "UNPARSEABLE_TAXON"
  | "EMPTY_SAMPLE"
  | "HOST_NOT_FOUND"
  | "HOST_LOOKUP_FAILED"
  | "RECORD_REJECTED";

/**
 * Non-fatal problem surfaced to the caller.
 */
export type PredictionWarning = {
  code: PredictionWarningCode;
  message: string;
  /** Offending taxon label, host name or record reference */
  subject?: string;
};

export type PredictionOptions = {
  /** Resolved host context; null disables host weighting */
  hostProfile: HostProfile | null;
  /** Family derivation for records without host_family (null disables) */
  deriveHostFamily?: HostFamilyDeriver | null;
  evidenceMode?: EvidenceMode;
};

export type PredictionStats = {
  totalAbundance: number;
  rowCount: number;
  matchedRowCount: number;
  unmatchedRowCount: number;
};

/**
 * Both ranked output tables plus warnings.
 */
export type PredictionResult = {
  /** Sorted by finalScoreSum descending */
  functions: FunctionSummary[];
  /** Grouped by function rank, then finalScore descending */
  candidates: ScoredCandidate[];
  warnings: PredictionWarning[];
  stats: PredictionStats;
};
