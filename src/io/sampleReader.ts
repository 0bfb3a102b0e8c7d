/**
 * Sample abundance table reader
 *
 * Reads a TSV abundance table (header row, one taxon per line) into
 * AbundanceRows. Columns are found by header name ("Taxon", "Abundance", ...);
 * without recognizable names the first column is the taxon label and the
 * second the abundance.
 *
 * Rows with an unusable abundance are skipped and reported, never fatal.
 */

import * as fs from "fs";
import type { AbundanceRow } from "@/types";
import {
  ABUNDANCE_TAXON_COLUMNS,
  ABUNDANCE_VALUE_COLUMNS,
} from "@/constants";
import { parseTsv, normalizeHeaderCell, type TsvTable } from "@/utils";
import * as logger from "@/logger";

/**
 * Error thrown when the table layout itself is unusable.
 */
export class SampleTableError extends Error {
  constructor(message: string) {
    super(`Sample table unreadable: ${message}`);
    this.name = "SampleTableError";
  }
}

export type SampleRowIssue = {
  /** 1-based data row number */
  row: number;
  message: string;
};

export type SampleTable = {
  rows: AbundanceRow[];
  skipped: SampleRowIssue[];
};

function findColumn(
  header: string[],
  names: readonly string[],
  fallback: number,
): number {
  const normalized = header.map(normalizeHeaderCell);
  const found = normalized.findIndex((cell) => names.includes(cell));
  return found >= 0 ? found : fallback;
}

/**
 * Converts a parsed TSV table into abundance rows.
 *
 * @throws {SampleTableError} If the table has fewer than two columns
 */
export function toAbundanceRows(table: TsvTable): SampleTable {
  if (table.header.length < 2) {
    throw new SampleTableError(
      "expected a taxon column and an abundance column",
    );
  }

  const taxonColumn = findColumn(table.header, ABUNDANCE_TAXON_COLUMNS, 0);
  const fallbackValueColumn = taxonColumn === 1 ? 0 : 1;
  const valueColumn = findColumn(
    table.header,
    ABUNDANCE_VALUE_COLUMNS,
    fallbackValueColumn,
  );

  const rows: AbundanceRow[] = [];
  const skipped: SampleRowIssue[] = [];

  table.rows.forEach((cells, index) => {
    const taxonLabel = cells[taxonColumn].trim();
    const rawValue = cells[valueColumn].trim();
    const abundance = rawValue.length > 0 ? Number(rawValue) : NaN;

    if (!Number.isFinite(abundance) || abundance < 0) {
      skipped.push({
        row: index + 1,
        message: `abundance "${rawValue}" is not a non-negative number`,
      });
      return;
    }

    rows.push({ taxonLabel, abundance });
  });

  return { rows, skipped };
}

/**
 * Reads a sample abundance table from disk.
 *
 * @throws {Error} If the file cannot be read
 * @throws {SampleTableError} If the table layout is unusable
 */
export function readSampleTable(filePath: string): SampleTable {
  const table = toAbundanceRows(parseTsv(fs.readFileSync(filePath, "utf-8")));

  for (const issue of table.skipped) {
    logger.warn("Sample row skipped", { file: filePath, ...issue });
  }
  logger.info("Sample table loaded", {
    file: filePath,
    rows: table.rows.length,
    skipped: table.skipped.length,
  });

  return table;
}
