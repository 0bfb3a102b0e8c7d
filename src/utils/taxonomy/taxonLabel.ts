/**
 * Taxon label parsing
 *
 * Turns hierarchical taxonomy strings into TaxonRanks tuples.
 *
 * Supported label shapes:
 * - Prefixed (QIIME 2 / SILVA / Greengenes): "d__Bacteria; p__Proteobacteria; ...; g__Buchnera; s__aphidicola"
 * - Positional: "Bacteria;Proteobacteria;Gammaproteobacteria;Enterobacterales;Erwiniaceae;Buchnera;Buchnera aphidicola"
 * - Bare organism name: "Buchnera aphidicola", "Wolbachia sp."
 *
 * Missing trailing ranks and placeholder values become null.
 */

import type { TaxonRank, TaxonRanks } from "@/types";
import {
  TAXON_RANK_ORDER,
  RANK_PREFIXES,
  RANK_SEPARATOR,
  PLACEHOLDER_RANK_VALUES,
  PLACEHOLDER_RANK_PREFIXES,
  GENUS_ONLY_EPITHETS,
} from "@/constants";

const PREFIXED_SEGMENT = /^([a-zA-Z])__(.*)$/;

/**
 * Normalizes a name for use as a lookup key.
 *
 * Lowercases and collapses whitespace so "Buchnera  Aphidicola" and
 * "buchnera aphidicola" share a key.
 */
export function taxonKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Cleans a single rank value.
 *
 * @returns The trimmed name, or null for placeholders ("*", "unknown", "uncultured bacterium", ...)
 */
export function cleanRankValue(value: string): string | null {
  const trimmed = value.replace(/_/g, " ").replace(/\s+/g, " ").trim();
  const lower = trimmed.toLowerCase();

  if (PLACEHOLDER_RANK_VALUES.includes(lower)) {
    return null;
  }
  if (PLACEHOLDER_RANK_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    return null;
  }
  return trimmed;
}

/**
 * Builds the full species binomial from a genus and a species segment.
 *
 * - "sp." style epithets (alone or trailing) mean genus-only → null
 * - A segment that already holds a binomial is kept as is
 * - A single word repeating the genus is genus-only → null
 * - A bare epithet is prefixed with the genus
 */
export function normalizeSpecies(
  genus: string | null,
  speciesSegment: string | null,
): string | null {
  if (!speciesSegment) {
    return null;
  }

  const words = speciesSegment.split(" ");
  const lastWord = words[words.length - 1].toLowerCase();
  if (GENUS_ONLY_EPITHETS.includes(lastWord)) {
    return null;
  }

  if (words.length > 1) {
    return speciesSegment;
  }
  if (!genus || taxonKey(speciesSegment) === taxonKey(genus)) {
    return null;
  }
  return `${genus} ${speciesSegment}`;
}

function parsePrefixed(segments: string[]): (string | null)[] {
  const values: (string | null)[] = TAXON_RANK_ORDER.map(() => null);

  for (const segment of segments) {
    const match = PREFIXED_SEGMENT.exec(segment);
    if (!match) {
      continue;
    }
    const rank = RANK_PREFIXES[match[1].toLowerCase()];
    if (!rank) {
      continue;
    }
    values[TAXON_RANK_ORDER.indexOf(rank)] = cleanRankValue(match[2]);
  }

  return values;
}

/**
 * A label without separators or prefixes is read as an organism name:
 * "Buchnera aphidicola" → genus + species, "Wolbachia" → genus.
 */
function parseBareName(name: string): (string | null)[] {
  const values: (string | null)[] = TAXON_RANK_ORDER.map(() => null);
  const cleaned = cleanRankValue(name);
  if (cleaned) {
    const words = cleaned.split(" ");
    values[TAXON_RANK_ORDER.indexOf("genus")] = words[0];
    if (words.length > 1) {
      values[TAXON_RANK_ORDER.indexOf("species")] = cleaned;
    }
  }
  return values;
}

function parsePositional(segments: string[]): (string | null)[] {
  return TAXON_RANK_ORDER.map((_, position) =>
    position < segments.length ? cleanRankValue(segments[position]) : null,
  );
}

/**
 * Parses a hierarchical taxon label.
 *
 * @param label - Raw label from an abundance table or the record store
 * @returns Parsed ranks, or null when no rank could be read (empty or malformed label)
 *
 * @example
 * parseTaxonLabel("g__Buchnera; s__aphidicola");
 * // [null, null, null, null, null, "Buchnera", "Buchnera aphidicola"]
 */
export function parseTaxonLabel(label: string): TaxonRanks | null {
  const segments = label
    .split(RANK_SEPARATOR)
    .map((segment) => segment.trim());

  const isPrefixed = segments.some((segment) =>
    PREFIXED_SEGMENT.test(segment),
  );
  let values: (string | null)[];
  if (isPrefixed) {
    values = parsePrefixed(segments);
  } else if (segments.length === 1) {
    values = parseBareName(segments[0]);
  } else {
    values = parsePositional(segments);
  }

  const genusIndex = TAXON_RANK_ORDER.indexOf("genus");
  const speciesIndex = TAXON_RANK_ORDER.indexOf("species");
  values[speciesIndex] = normalizeSpecies(
    values[genusIndex],
    values[speciesIndex],
  );

  if (values.every((value) => value === null)) {
    return null;
  }

  const [domain, phylum, klass, order, family, genus, species] = values;
  return [domain, phylum, klass, order, family, genus, species];
}

/**
 * Reads one rank from a parsed label.
 */
export function getRank(ranks: TaxonRanks, rank: TaxonRank): string | null {
  return ranks[TAXON_RANK_ORDER.indexOf(rank)];
}

/**
 * Lowest named rank of a parsed label, for log output.
 */
export function lowestNamedRank(ranks: TaxonRanks): string | null {
  for (let i = ranks.length - 1; i >= 0; i--) {
    const value = ranks[i];
    if (value !== null) {
      return value;
    }
  }
  return null;
}
