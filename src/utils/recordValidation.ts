/**
 * Record store validation module
 *
 * Validates record store rows and turns them into ReferenceRecords.
 *
 * Unlike structural problems (missing required column), row problems never
 * abort loading: a bad row is rejected and reported, optional values that
 * cannot be used fall back to their defaults.
 */

import type {
  EvidenceLevel,
  RecordLoadIssue,
  RecordType,
  ReferenceRecord,
  ReferenceRecordRaw,
} from "@/types";
import {
  REQUIRED_RECORD_FIELDS,
  RECORD_COLUMN_ALIASES,
  FUNCTION_TAG_SEPARATOR,
  EMPTY_FUNCTION_TAGS,
  DEFAULT_RECORD_TYPE,
  UNKNOWN_HOST_RANK_VALUES,
  EMPTY_GENOME_IDS,
  MIN_EVIDENCE_LEVEL,
  MAX_EVIDENCE_LEVEL,
} from "@/constants";
import { parseTaxonLabel, getRank } from "./taxonomy";
import { normalizeHeaderCell } from "./tsv";

/**
 * Error thrown when the record store as a whole is unusable.
 */
export class RecordStoreValidationError extends Error {
  constructor(message: string) {
    super(`Record store validation failed: ${message}`);
    this.name = "RecordStoreValidationError";
  }
}

/**
 * Outcome of validating one record store row.
 */
export type RecordRowValidation =
  | { ok: true; records: ReferenceRecord[]; defaulted: RecordLoadIssue[] }
  | { ok: false; issue: RecordLoadIssue };

/**
 * Maps header cells to canonical field names.
 *
 * Unknown columns map to null and are ignored.
 *
 * @throws {RecordStoreValidationError} If a required column is missing
 */
export function resolveRecordColumns(header: string[]): (string | null)[] {
  const columns = header.map(
    (cell) => RECORD_COLUMN_ALIASES[normalizeHeaderCell(cell)] ?? null,
  );

  const missing = REQUIRED_RECORD_FIELDS.filter(
    (field) => !columns.includes(field),
  );
  if (missing.length > 0) {
    throw new RecordStoreValidationError(
      `missing required column(s): ${missing.join(", ")}`,
    );
  }

  return columns;
}

/**
 * Builds a raw record from a row, keyed by canonical field name.
 * First column wins when two header cells alias the same field.
 */
export function toRawRecord(
  columns: (string | null)[],
  cells: string[],
): ReferenceRecordRaw {
  const raw: ReferenceRecordRaw = {};
  columns.forEach((field, index) => {
    if (field && raw[field] === undefined) {
      raw[field] = cells[index];
    }
  });
  return raw;
}

function cleanOptional(
  value: string | undefined,
  emptyValues: readonly string[],
): string | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return emptyValues.includes(trimmed.toLowerCase()) ? null : trimmed;
}

function parseRecordType(value: string | undefined): RecordType {
  const recordType = (value ?? DEFAULT_RECORD_TYPE).trim().toLowerCase();
  return recordType === "symbiont" ? "Symbiont" : "Other";
}

/**
 * Type guard for evidence levels.
 */
export function isEvidenceLevel(value: number): value is EvidenceLevel {
  return (
    Number.isInteger(value) &&
    value >= MIN_EVIDENCE_LEVEL &&
    value <= MAX_EVIDENCE_LEVEL
  );
}

/**
 * Parses the stored evidence level.
 *
 * @returns The level, null when absent, or "invalid" for unusable values
 */
function parseStoredEvidenceLevel(
  value: string | undefined,
): EvidenceLevel | null | "invalid" {
  if (value === undefined || value.trim().length === 0) {
    return null;
  }
  const parsed = Number(value.trim());
  return isEvidenceLevel(parsed) ? parsed : "invalid";
}

/**
 * Splits a function cell into distinct tags ("Nutrition, Defense").
 */
export function splitFunctionTags(value: string): string[] {
  const tags: string[] = [];
  for (const part of value.split(FUNCTION_TAG_SEPARATOR)) {
    const tag = part.trim();
    if (!EMPTY_FUNCTION_TAGS.includes(tag.toLowerCase()) && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

/**
 * Validates one record store row.
 *
 * Validation steps:
 * 1. Required fields (taxon_label, host, function) are non-empty
 * 2. The taxon label parses and names a genus
 * 3. At least one usable function tag remains after splitting
 * 4. Optional fields are cleaned; an invalid evidence_level is defaulted and reported
 *
 * @param raw - Row keyed by canonical field names
 * @param row - 1-based data row number, used in ids and issues
 */
export function validateRecordRow(
  raw: ReferenceRecordRaw,
  row: number,
): RecordRowValidation {
  const missing = REQUIRED_RECORD_FIELDS.filter(
    (field) => (raw[field] ?? "").trim().length === 0,
  );
  if (missing.length > 0) {
    return {
      ok: false,
      issue: {
        row,
        message: `missing required field(s): ${missing.join(", ")}`,
      },
    };
  }

  const taxonLabel = (raw.taxon_label ?? "").trim();
  const taxon = parseTaxonLabel(taxonLabel);
  if (!taxon || !getRank(taxon, "genus")) {
    return {
      ok: false,
      issue: { row, message: `taxon label "${taxonLabel}" names no genus` },
    };
  }

  const functions = splitFunctionTags(raw.function ?? "");
  if (functions.length === 0) {
    return {
      ok: false,
      issue: { row, message: `function "${raw.function ?? ""}" has no usable tag` },
    };
  }

  const defaulted: RecordLoadIssue[] = [];
  const storedLevel = parseStoredEvidenceLevel(raw.evidence_level);
  if (storedLevel === "invalid") {
    defaulted.push({
      row,
      message: `evidence_level "${raw.evidence_level ?? ""}" is not an integer in [${MIN_EVIDENCE_LEVEL}, ${MAX_EVIDENCE_LEVEL}]; using default`,
    });
  }

  const base = {
    taxonLabel,
    taxon,
    host: (raw.host ?? "").trim(),
    hostOrder: cleanOptional(raw.host_order, UNKNOWN_HOST_RANK_VALUES),
    hostFamily: cleanOptional(raw.host_family, UNKNOWN_HOST_RANK_VALUES),
    recordType: parseRecordType(raw.record_type),
    genomeId: cleanOptional(raw.genome_id, EMPTY_GENOME_IDS),
    journal: cleanOptional(raw.journal, [""]),
    description: (raw.description ?? "").trim(),
    evidenceCitation: (raw.evidence_citation ?? "").trim(),
    evidenceLevel: storedLevel === "invalid" ? null : storedLevel,
  };

  const records: ReferenceRecord[] = functions.map((tag, tagIndex) => ({
    id: functions.length > 1 ? `rec_${row}#${tagIndex + 1}` : `rec_${row}`,
    function: tag,
    ...base,
  }));

  return { ok: true, records, defaulted };
}
