/**
 * Tab-separated table helpers
 *
 * Pure functions shared by the record store loader, the sample reader and
 * the report writer. No quoting: cells never contain tabs or newlines.
 */

import { TSV_SEPARATOR } from "@/constants";

export type TsvTable = {
  header: string[];
  /** Data rows, each padded or truncated to the header width */
  rows: string[][];
};

/**
 * Parses TSV content with a header row.
 *
 * - Blank lines are skipped
 * - Leading "#" comment lines without a tab (BIOM exports) are skipped
 * - A leading "#" on the header itself ("#OTU ID") is dropped
 * - Rows wider than the header are truncated, shorter rows padded with ""
 */
export function parseTsv(content: string): TsvTable {
  const lines = content
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  let headerIndex = 0;
  while (
    headerIndex < lines.length &&
    lines[headerIndex].startsWith("#") &&
    !lines[headerIndex].includes(TSV_SEPARATOR)
  ) {
    headerIndex++;
  }

  if (headerIndex >= lines.length) {
    return { header: [], rows: [] };
  }

  const header = lines[headerIndex]
    .replace(/^#/, "")
    .split(TSV_SEPARATOR)
    .map((cell) => cell.trim());

  const rows = lines.slice(headerIndex + 1).map((line) => {
    const cells = line.split(TSV_SEPARATOR);
    if (cells.length > header.length) {
      return cells.slice(0, header.length);
    }
    while (cells.length < header.length) {
      cells.push("");
    }
    return cells;
  });

  return { header, rows };
}

/**
 * Normalizes a header cell for alias lookup ("Host Order" → "host_order").
 */
export function normalizeHeaderCell(cell: string): string {
  return cell.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/**
 * Formats a table as TSV (trailing newline included).
 */
export function formatTsv(
  header: readonly string[],
  rows: readonly (readonly (string | number)[])[],
): string {
  const lines = [header.join(TSV_SEPARATOR)];
  for (const row of rows) {
    lines.push(row.map((cell) => String(cell)).join(TSV_SEPARATOR));
  }
  return lines.join("\n") + "\n";
}
