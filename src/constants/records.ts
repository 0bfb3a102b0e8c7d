/**
 * Record store constants
 */

/**
 * Column name aliases accepted in the record store header.
 *
 * Header cells are lowercased and trimmed, spaces turned into underscores,
 * then mapped through this table.
 */
export const RECORD_COLUMN_ALIASES: Readonly<Record<string, string>> = {
  taxonomy: "taxon_label",
  taxon: "taxon_label",
  taxon_label: "taxon_label",
  host: "host",
  host_species: "host",
  function: "function",
  function_tag: "function",
  function_tags: "function",
  host_order: "host_order",
  host_family: "host_family",
  record_type: "record_type",
  genome_id: "genome_id",
  genomeid: "genome_id",
  journal: "journal",
  description: "description",
  function_desc: "description",
  evidence: "evidence_citation",
  doi: "evidence_citation",
  evidence_citation: "evidence_citation",
  evidence_level: "evidence_level",
};

/**
 * Columns every record must fill.
 */
export const REQUIRED_RECORD_FIELDS = ["taxon_label", "host", "function"] as const;

/**
 * Separator for records documenting several functions in one row.
 */
export const FUNCTION_TAG_SEPARATOR = ",";

/**
 * Function tag values that mean "no function".
 */
export const EMPTY_FUNCTION_TAGS: readonly string[] = ["", "none", "nan", "null"];

/**
 * record_type assumed when the store has no such column
 * (formatted stores only keep symbiont rows).
 */
export const DEFAULT_RECORD_TYPE = "Symbiont";
