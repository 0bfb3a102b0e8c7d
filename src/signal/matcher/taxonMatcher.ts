/**
 * Taxon matcher
 *
 * Matches a sample row's taxon label against the compiled reference index.
 *
 * Matching rules:
 * - Species binomial found in the species index → every record under it, weight 1.0
 * - Otherwise genus found in the genus index → every record of the genus, weight 0.6
 * - Otherwise Unmatched (single result, record = null)
 *
 * Only the best rank is used: a row that matches at species level does not
 * additionally pick up genus-only records. Family and order are never used
 * for taxon matching.
 */

import type {
  AbundanceRow,
  MatchResult,
  RankLevel,
  ReferenceIndex,
  ReferenceRecord,
  TaxonRanks,
} from "@/types";
import { TAXON_MATCH_WEIGHTS, GENUS_DISPLAY_SUFFIX } from "@/constants";
import { parseTaxonLabel, getRank, taxonKey } from "@/utils";

/**
 * Row being matched, with its position and share of the sample.
 */
export type MatchInput = {
  row: AbundanceRow;
  rowIndex: number;
  relativeAbundancePct: number;
};

/**
 * Matcher output for one row.
 *
 * ranks is null when the label could not be parsed. matches always holds at
 * least one entry; an Unmatched row holds exactly one with record = null.
 */
export type TaxonMatchOutcome = {
  ranks: TaxonRanks | null;
  matches: MatchResult[];
};

function toMatchResults(
  input: MatchInput,
  records: readonly ReferenceRecord[],
  rankLevel: RankLevel,
  taxonMatchWeight: number,
  displayName: string,
): MatchResult[] {
  return records.map((record) => ({
    row: input.row,
    rowIndex: input.rowIndex,
    relativeAbundancePct: input.relativeAbundancePct,
    record,
    rankLevel,
    taxonMatchWeight,
    displayName,
  }));
}

function unmatched(input: MatchInput): MatchResult {
  return {
    row: input.row,
    rowIndex: input.rowIndex,
    relativeAbundancePct: input.relativeAbundancePct,
    record: null,
    rankLevel: "Unmatched",
    taxonMatchWeight: 0,
    displayName: input.row.taxonLabel.trim(),
  };
}

/**
 * Matches one abundance row against the reference index.
 *
 * @param input - Row with its index and relative abundance
 * @param index - Compiled reference index
 * @returns Parsed ranks and one MatchResult per matched record
 */
export function matchTaxon(
  input: MatchInput,
  index: ReferenceIndex,
): TaxonMatchOutcome {
  const ranks = parseTaxonLabel(input.row.taxonLabel);
  if (!ranks) {
    return { ranks: null, matches: [unmatched(input)] };
  }

  const species = getRank(ranks, "species");
  if (species) {
    const speciesRecords = index.bySpecies.get(taxonKey(species));
    if (speciesRecords && speciesRecords.length > 0) {
      return {
        ranks,
        matches: toMatchResults(
          input,
          speciesRecords,
          "Species",
          TAXON_MATCH_WEIGHTS.Species,
          species,
        ),
      };
    }
  }

  const genus = getRank(ranks, "genus");
  if (genus) {
    const genusRecords = index.byGenus.get(taxonKey(genus));
    if (genusRecords && genusRecords.length > 0) {
      return {
        ranks,
        matches: toMatchResults(
          input,
          genusRecords,
          "Genus",
          TAXON_MATCH_WEIGHTS.Genus,
          `${genus} ${GENUS_DISPLAY_SUFFIX}`,
        ),
      };
    }
  }

  return { ranks, matches: [unmatched(input)] };
}
