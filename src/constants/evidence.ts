/**
 * Evidence classification constants
 */

/**
 * Points added to the derived evidence score per signal.
 */
export const EVIDENCE_POINTS = Object.freeze({
  symbiontRecord: 1,
  genomeAccession: 2,
  highImpactJournal: 1,
} as const);

/**
 * Genome accession values that mean "no genome".
 */
export const EMPTY_GENOME_IDS: readonly string[] = [
  "",
  "none",
  "nan",
  "null",
  "na",
  "n/a",
];

/**
 * High-impact venues (lowercase). A journal qualifies when it equals an
 * entry or starts with one.
 */
export const HIGH_IMPACT_JOURNALS: readonly string[] = [
  "nature",
  "science",
  "cell",
  "pnas",
  "proceedings of the national academy of sciences",
  "nature communications",
  "nature microbiology",
  "nature biotechnology",
  "science advances",
  "cell host & microbe",
  "isme journal",
  "the isme journal",
  "microbiome",
  "mbio",
  "plos biology",
];
