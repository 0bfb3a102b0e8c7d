/**
 * Runner constants
 */

/**
 * Default SQLite host taxonomy database, relative to the working directory.
 */
export const DEFAULT_HOST_DB_PATH = "data/insect_taxonomy.db";

/**
 * Default output prefix when OUTPUT_PREFIX is unset.
 */
export const DEFAULT_OUTPUT_PREFIX = "results/prediction";
