/**
 * Taxonomy type definitions
 *
 * A taxon label ("d__Bacteria; p__Proteobacteria; ...; g__Buchnera; s__Buchnera aphidicola")
 * is parsed into a fixed ordered tuple of optional rank names so that rank
 * comparisons are exhaustive instead of relying on string slicing.
 */

/**
 * Ranks carried by a hierarchical taxon label, in label order.
 */
export type TaxonRank =
  | "domain"
  | "phylum"
  | "class"
  | "order"
  | "family"
  | "genus"
  | "species";

/**
 * Parsed taxon label.
 *
 * Positions follow TAXON_RANK_ORDER. A null entry means the rank is missing,
 * a placeholder ("*", "unclassified", ...) or was truncated from the label.
 * Species, when present, is always the full binomial ("Buchnera aphidicola").
 */
export type TaxonRanks = readonly [
  domain: string | null,
  phylum: string | null,
  klass: string | null,
  order: string | null,
  family: string | null,
  genus: string | null,
  species: string | null,
];

/**
 * Rank at which an abundance row matched reference records.
 *
 * Family and Order are part of the vocabulary shared with host matching but
 * are never produced by the taxon matcher.
 */
export type RankLevel = "Species" | "Genus" | "Family" | "Order" | "Unmatched";
