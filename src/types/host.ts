/**
 * Host context type definitions
 */

/**
 * Host lineage returned by a host taxonomy lookup.
 *
 * Unknown ranks are null.
 */
export type HostLineage = {
  order: string | null;
  family: string | null;
  genus: string | null;
  species: string | null;
};

/**
 * Resolved context for the host the sample was taken from.
 *
 * Derived once per run; read-only afterwards.
 */
export type HostProfile = HostLineage & {
  /** Host name as supplied by the caller */
  inputName: string;
};

/**
 * Read-only host taxonomy lookup.
 *
 * Returns null when the name is unknown. Implementations may throw on
 * store failures; callers degrade to no-host mode.
 */
export interface HostTaxonomyResolver {
  resolve(name: string): HostLineage | null;
}

/**
 * Derives a family for a record's declared host when the record carries none.
 */
export type HostFamilyDeriver = (recordHost: string) => string | null;

export type HostMatchLevel =
  | "Species"
  | "Genus"
  | "Family"
  | "Order"
  | "General"
  | "Mismatch";

export type HostMatch = {
  level: HostMatchLevel;
  weight: number;
};
