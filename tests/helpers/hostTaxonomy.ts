/**
 * Small host taxonomy tree for DB-backed tests
 *
 * root ─ Hemiptera (order) ─ Aphididae (family) ┬ Acyrthosiphon ─ Acyrthosiphon pisum
 *                                               └ Aphis
 * Orphanus testus points at a parent that does not exist.
 */

import type { TaxonNode } from "@/db";

export const HOST_TAXONOMY_NODES: readonly TaxonNode[] = [
  { tax_id: 1, parent_id: 1, rank: "no rank", name: "root" },
  { tax_id: 7524, parent_id: 1, rank: "order", name: "Hemiptera" },
  { tax_id: 27482, parent_id: 7524, rank: "family", name: "Aphididae" },
  { tax_id: 7028, parent_id: 27482, rank: "genus", name: "Acyrthosiphon" },
  { tax_id: 7029, parent_id: 7028, rank: "species", name: "Acyrthosiphon pisum" },
  { tax_id: 80765, parent_id: 27482, rank: "genus", name: "Aphis" },
  { tax_id: 9999, parent_id: 123456, rank: "species", name: "Orphanus testus" },
];
