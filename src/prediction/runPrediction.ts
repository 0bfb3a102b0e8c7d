/**
 * Prediction with host resolution
 *
 * Convenience entry that resolves the host name through a taxonomy store,
 * sets up family derivation, and runs predictSample. Host problems never
 * abort: they become warnings and the run continues without host context.
 */

import type {
  AbundanceRow,
  EvidenceMode,
  HostFamilyDeriver,
  HostTaxonomyResolver,
  PredictionResult,
  ReferenceIndex,
} from "@/types";
import {
  resolveHostProfile,
  createResolverFamilyDeriver,
} from "@/signal/host";
import * as logger from "@/logger";
import { predictSample } from "./predictSample";

export type RunPredictionInput = {
  rows: readonly AbundanceRow[];
  index: ReferenceIndex;
  /** Host species name; null or blank for no host context */
  hostName: string | null;
  /** Host taxonomy lookup; null when no store is available */
  resolver: HostTaxonomyResolver | null;
  /**
   * Family derivation for records without host_family.
   * Defaults to a secondary lookup through `resolver`; null disables it.
   */
  deriveHostFamily?: HostFamilyDeriver | null;
  evidenceMode?: EvidenceMode;
};

/**
 * Resolves host context and predicts one sample.
 */
export function runPrediction(input: RunPredictionInput): PredictionResult {
  const { profile, warnings: hostWarnings } = resolveHostProfile(
    input.hostName,
    input.resolver,
  );

  for (const warning of hostWarnings) {
    logger.warn(warning.message, { host: warning.subject, code: warning.code });
  }

  const deriveHostFamily =
    input.deriveHostFamily !== undefined
      ? input.deriveHostFamily
      : input.resolver
        ? createResolverFamilyDeriver(input.resolver)
        : null;

  const result = predictSample(input.rows, input.index, {
    hostProfile: profile,
    deriveHostFamily,
    evidenceMode: input.evidenceMode,
  });

  return { ...result, warnings: [...hostWarnings, ...result.warnings] };
}
