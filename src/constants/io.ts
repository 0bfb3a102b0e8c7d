/**
 * Table I/O constants
 */

export const TSV_SEPARATOR = "\t";

/**
 * Output file suffixes appended to the run's output prefix.
 */
export const FUNCTIONS_OUTPUT_SUFFIX = "_functions.tsv";
export const CANDIDATES_OUTPUT_SUFFIX = "_potential_symbionts.tsv";

/**
 * Abundance table header names recognized for the two input columns.
 * Without them, the first column is the taxon and the second the abundance.
 */
export const ABUNDANCE_TAXON_COLUMNS: readonly string[] = [
  "taxon",
  "taxonomy",
  "taxon_label",
];
export const ABUNDANCE_VALUE_COLUMNS: readonly string[] = [
  "abundance",
  "count",
  "reads",
];

/**
 * Maximum description length written to the candidate table.
 */
export const DESCRIPTION_PREVIEW_LENGTH = 100;
