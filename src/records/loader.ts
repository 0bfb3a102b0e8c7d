/**
 * Reference record store loading and compilation
 *
 * Loads the record store TSV, validates each row, and compiles the accepted
 * records into a runtime index keyed by species and genus.
 *
 * Rejected rows are logged and reported; they never abort the load.
 */

import * as fs from "fs";
import type {
  RecordLoadIssue,
  RecordLoadResult,
  ReferenceIndex,
  ReferenceRecord,
} from "@/types";
import {
  parseTsv,
  resolveRecordColumns,
  toRawRecord,
  validateRecordRow,
  taxonKey,
  getRank,
  type TsvTable,
} from "@/utils";
import * as logger from "@/logger";

function addToIndex(
  map: Map<string, ReferenceRecord[]>,
  key: string,
  record: ReferenceRecord,
): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(record);
  } else {
    map.set(key, [record]);
  }
}

/**
 * Builds the species and genus lookups for a set of records.
 *
 * Records without a genus are skipped (they can never match).
 * Bucket order follows record order.
 */
export function buildReferenceIndex(
  records: readonly ReferenceRecord[],
): ReferenceIndex {
  const bySpecies = new Map<string, ReferenceRecord[]>();
  const byGenus = new Map<string, ReferenceRecord[]>();
  const indexed: ReferenceRecord[] = [];

  for (const record of records) {
    const genus = getRank(record.taxon, "genus");
    if (!genus) {
      continue;
    }
    indexed.push(record);
    addToIndex(byGenus, taxonKey(genus), record);

    const species = getRank(record.taxon, "species");
    if (species) {
      addToIndex(bySpecies, taxonKey(species), record);
    }
  }

  return { records: indexed, bySpecies, byGenus };
}

/**
 * Compiles a parsed record store table.
 *
 * Steps:
 * 1. Resolve header aliases (throws if a required column is missing)
 * 2. Validate each row, collecting rejected and defaulted rows
 * 3. Index accepted records
 *
 * @throws {RecordStoreValidationError} If a required column is missing
 */
export function compileRecordStore(table: TsvTable): RecordLoadResult {
  const columns = resolveRecordColumns(table.header);

  const records: ReferenceRecord[] = [];
  const rejected: RecordLoadIssue[] = [];
  const defaulted: RecordLoadIssue[] = [];

  table.rows.forEach((cells, index) => {
    const result = validateRecordRow(toRawRecord(columns, cells), index + 1);
    if (!result.ok) {
      rejected.push(result.issue);
      return;
    }
    records.push(...result.records);
    defaulted.push(...result.defaulted);
  });

  return { index: buildReferenceIndex(records), rejected, defaulted };
}

/**
 * Loads and compiles the record store at the given path.
 *
 * @throws {Error} If the file cannot be read
 * @throws {RecordStoreValidationError} If a required column is missing
 *
 * @example
 * const { index } = loadRecordStore("data/record_db.tsv");
 * console.log(`Loaded ${index.records.length} records`);
 */
export function loadRecordStore(filePath: string): RecordLoadResult {
  const log = logger.withContext({ recordStore: filePath });
  const result = compileRecordStore(parseTsv(fs.readFileSync(filePath, "utf-8")));

  for (const issue of result.rejected) {
    log.warn("Reference record rejected", { ...issue });
  }
  for (const issue of result.defaulted) {
    log.debug("Reference record value defaulted", { ...issue });
  }

  log.info("Record store loaded", {
    records: result.index.records.length,
    speciesKeys: result.index.bySpecies.size,
    genusKeys: result.index.byGenus.size,
    rejected: result.rejected.length,
  });

  return result;
}
