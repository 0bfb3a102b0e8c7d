/**
 * Host context resolution and host-match tiers
 *
 * Resolves the sample's host into a HostProfile once per run, then rates each
 * reference record by how closely its declared host relates to it.
 *
 * Tier order (first hit wins):
 * 1. No profile, or record host "General" → General (1.0)
 * 2. Same species → Species (1.5)
 * 3. Same genus → Genus (1.3)
 * 4. Same family (record host_family, else derived family) → Family (1.2)
 * 5. Same order (record host_order) → Order (1.1)
 * 6. Otherwise → Mismatch (0.8)
 */

import type {
  HostFamilyDeriver,
  HostMatch,
  HostMatchLevel,
  HostProfile,
  HostTaxonomyResolver,
  PredictionWarning,
  ReferenceRecord,
} from "@/types";
import { HOST_MATCH_WEIGHTS, GENERAL_HOST } from "@/constants";
import { taxonKey } from "@/utils";
import * as logger from "@/logger";

export type HostProfileResolution = {
  profile: HostProfile | null;
  warnings: PredictionWarning[];
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function firstWord(name: string): string {
  return taxonKey(name).split(" ")[0];
}

function sameName(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && taxonKey(a) === taxonKey(b);
}

/**
 * Resolves the sample host into a profile.
 *
 * Never throws: an unknown host, a missing store or a store failure all
 * degrade to no host context (null profile) with a warning.
 *
 * @param hostName - Host name supplied by the caller (null/blank = no host)
 * @param resolver - Host taxonomy lookup, null when no store is available
 */
export function resolveHostProfile(
  hostName: string | null,
  resolver: HostTaxonomyResolver | null,
): HostProfileResolution {
  const inputName = hostName?.trim() ?? "";
  if (inputName.length === 0) {
    return { profile: null, warnings: [] };
  }

  if (!resolver) {
    return {
      profile: null,
      warnings: [
        {
          code: "HOST_LOOKUP_FAILED",
          message: "No host taxonomy store available; host weighting disabled",
          subject: inputName,
        },
      ],
    };
  }

  try {
    const lineage = resolver.resolve(inputName);
    if (!lineage) {
      return {
        profile: null,
        warnings: [
          {
            code: "HOST_NOT_FOUND",
            message: "Host not found in taxonomy store; host weighting disabled",
            subject: inputName,
          },
        ],
      };
    }

    const profile: HostProfile = {
      inputName,
      order: lineage.order,
      family: lineage.family,
      genus: lineage.genus,
      species: lineage.species ?? inputName,
    };
    logger.info("Host context resolved", { ...profile });
    return { profile, warnings: [] };
  } catch (err) {
    return {
      profile: null,
      warnings: [
        {
          code: "HOST_LOOKUP_FAILED",
          message: `Host taxonomy lookup failed (${errorMessage(err)}); host weighting disabled`,
          subject: inputName,
        },
      ],
    };
  }
}

/**
 * Family derivation through a secondary taxonomy lookup.
 *
 * Looks up the record host name, then its genus (first word). Results are
 * memoised for the lifetime of the deriver; lookup failures count as unknown.
 */
export function createResolverFamilyDeriver(
  resolver: HostTaxonomyResolver,
): HostFamilyDeriver {
  const cache = new Map<string, string | null>();

  const lookupFamily = (name: string): string | null => {
    try {
      return resolver.resolve(name)?.family ?? null;
    } catch (err) {
      logger.debug("Host family derivation failed", {
        host: name,
        error: errorMessage(err),
      });
      return null;
    }
  };

  return (recordHost: string): string | null => {
    const key = taxonKey(recordHost);
    const cached = cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const name = recordHost.trim();
    const genus = name.split(/\s+/)[0];
    let family = lookupFamily(name);
    if (family === null && genus !== name) {
      family = lookupFamily(genus);
    }

    cache.set(key, family);
    return family;
  };
}

function tier(level: HostMatchLevel): HostMatch {
  return { level, weight: HOST_MATCH_WEIGHTS[level] };
}

/**
 * Rates a record's declared host against the sample host.
 *
 * @param record - Reference record
 * @param profile - Sample host profile, null for no host context
 * @param deriveFamily - Family fallback for records without host_family
 */
export function matchHost(
  record: ReferenceRecord,
  profile: HostProfile | null,
  deriveFamily: HostFamilyDeriver | null = null,
): HostMatch {
  if (!profile || taxonKey(record.host) === taxonKey(GENERAL_HOST)) {
    return tier("General");
  }

  const profileSpecies = profile.species ?? profile.inputName;
  if (sameName(record.host, profileSpecies)) {
    return tier("Species");
  }

  const profileGenus = profile.genus ?? firstWord(profileSpecies);
  if (sameName(firstWord(record.host), profileGenus)) {
    return tier("Genus");
  }

  const recordFamily =
    record.hostFamily ?? (deriveFamily ? deriveFamily(record.host) : null);
  if (sameName(recordFamily, profile.family)) {
    return tier("Family");
  }

  if (sameName(record.hostOrder, profile.order)) {
    return tier("Order");
  }

  return tier("Mismatch");
}
