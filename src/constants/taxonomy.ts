/**
 * Taxon label parsing constants
 */

import type { TaxonRank } from "@/types";

/**
 * Rank order of a hierarchical taxon label (also the TaxonRanks tuple order).
 */
export const TAXON_RANK_ORDER: readonly TaxonRank[] = [
  "domain",
  "phylum",
  "class",
  "order",
  "family",
  "genus",
  "species",
];

/**
 * Single-letter rank prefixes used by QIIME/SILVA/Greengenes labels
 * ("g__Buchnera"). Both "d" and "k" denote the top rank.
 */
export const RANK_PREFIXES: Readonly<Record<string, TaxonRank>> = {
  d: "domain",
  k: "domain",
  p: "phylum",
  c: "class",
  o: "order",
  f: "family",
  g: "genus",
  s: "species",
};

/**
 * Separator between rank segments.
 */
export const RANK_SEPARATOR = ";";

/**
 * Rank values that carry no name.
 */
export const PLACEHOLDER_RANK_VALUES: readonly string[] = [
  "",
  "*",
  "unknown",
  "none",
  "nan",
  "null",
  "na",
  "n/a",
];

/**
 * Prefixes marking an unnamed lineage ("uncultured bacterium", "unclassified_Rickettsiaceae").
 */
export const PLACEHOLDER_RANK_PREFIXES: readonly string[] = [
  "unclassified",
  "uncultured",
  "unidentified",
];

/**
 * Species epithets that only say "some species of this genus".
 */
export const GENUS_ONLY_EPITHETS: readonly string[] = ["sp", "sp.", "spp", "spp."];

/**
 * Display suffix for genus-level matches ("Wolbachia (sp.)").
 */
export const GENUS_DISPLAY_SUFFIX = "(sp.)";
