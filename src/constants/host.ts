/**
 * Host context constants
 */

/**
 * Record host value meaning "not specific to any host".
 */
export const GENERAL_HOST = "General";

/**
 * Host rank values that carry no name in the record store or the taxonomy DB.
 */
export const UNKNOWN_HOST_RANK_VALUES: readonly string[] = [
  "",
  "*",
  "n/a",
  "na",
  "none",
  "nan",
  "null",
  "unknown",
];
