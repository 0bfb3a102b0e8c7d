/**
 * Host taxonomy repository
 *
 * Data access layer for the taxonomy table (one row per NCBI-style node:
 * tax_id, parent_id, rank, name). Name lookups are case-insensitive.
 */

import type { HostLineage, HostTaxonomyResolver } from "@/types";
import { UNKNOWN_HOST_RANK_VALUES } from "@/constants";
import { getDb } from "../connection";

/**
 * A taxonomy node row.
 */
export type TaxonNode = {
  tax_id: number;
  parent_id: number;
  rank: string;
  name: string;
};

const LINEAGE_RANKS = ["order", "family", "genus", "species"] as const;
type LineageRank = (typeof LINEAGE_RANKS)[number];

function isLineageRank(rank: string): rank is LineageRank {
  return (LINEAGE_RANKS as readonly string[]).includes(rank);
}

function knownName(name: string): string | null {
  const trimmed = name.trim();
  return UNKNOWN_HOST_RANK_VALUES.includes(trimmed.toLowerCase())
    ? null
    : trimmed;
}

/**
 * Find a node by scientific name
 */
export function getTaxonByName(name: string): TaxonNode | undefined {
  return getDb()
    .prepare(
      "SELECT tax_id, parent_id, rank, name FROM taxonomy WHERE name = ? COLLATE NOCASE ORDER BY tax_id LIMIT 1",
    )
    .get(name.trim()) as TaxonNode | undefined;
}

/**
 * Find a node by id
 */
export function getTaxonById(taxId: number): TaxonNode | undefined {
  return getDb()
    .prepare(
      "SELECT tax_id, parent_id, rank, name FROM taxonomy WHERE tax_id = ?",
    )
    .get(taxId) as TaxonNode | undefined;
}

/**
 * Number of taxonomy nodes
 *
 * @throws {Error} If the file is not a SQLite database or has no taxonomy table
 */
export function countTaxonNodes(): number {
  const row = getDb().prepare("SELECT COUNT(*) AS count FROM taxonomy").get() as
    | { count: number }
    | undefined;
  return row?.count ?? 0;
}

/**
 * Insert or replace taxonomy nodes in one transaction
 */
export function upsertTaxonNodes(nodes: readonly TaxonNode[]): void {
  const db = getDb();
  const stmt = db.prepare(
    "INSERT OR REPLACE INTO taxonomy (tax_id, parent_id, rank, name) VALUES (?, ?, ?, ?)",
  );
  const insertAll = db.transaction((rows: readonly TaxonNode[]) => {
    for (const row of rows) {
      stmt.run(row.tax_id, row.parent_id, row.rank, row.name);
    }
  });
  insertAll(nodes);
}

/**
 * Walk from a named node up to the root, collecting order/family/genus/species
 *
 * Stops at tax_id 0, at a missing parent, or on a cycle (the root node of an
 * NCBI dump is its own parent).
 *
 * @returns Lineage, or null if the name is not in the table
 */
export function getHostLineage(name: string): HostLineage | null {
  const start = getTaxonByName(name);
  if (!start) {
    return null;
  }

  const lineage: HostLineage = {
    order: null,
    family: null,
    genus: null,
    species: null,
  };
  const visited = new Set<number>();
  let current: TaxonNode | undefined = start;

  while (current && current.tax_id !== 0 && !visited.has(current.tax_id)) {
    visited.add(current.tax_id);

    const rank = current.rank.trim().toLowerCase();
    if (isLineageRank(rank) && lineage[rank] === null) {
      lineage[rank] = knownName(current.name);
    }

    current = getTaxonById(current.parent_id);
  }

  return lineage;
}

/**
 * HostTaxonomyResolver backed by the open SQLite database
 */
export const sqliteHostTaxonomyResolver: HostTaxonomyResolver = {
  resolve: getHostLineage,
};
