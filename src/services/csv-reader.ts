/**
 * csv-reader.ts — CSV export → lazy sequence of validated records.
 *
 * The whole file is read up front; validation and duplicate detection run
 * lazily, row by row, in file order. The sequence is not restartable:
 * iterate again by reading the file again.
 */

import { readFileSync } from "node:fs";
import Papa from "papaparse";
import { ErrorCode, PipelineError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { ORDER_FIELDS, type OrderField, type RawOrderRow, type ValidatedRecord } from "../types/order-types.js";
import { createDuplicateDetector } from "./duplicate-detector.js";
import { validateRow } from "./row-validator.js";

export interface ParsedOrderCsv {
  /** Normalized header names, in file order */
  headers: string[];
  rows: RawOrderRow[];
  /** Canonical columns the header row does not provide */
  missingColumns: OrderField[];
}

/** "Unit Price " → "unit_price" */
export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, "").trim().toLowerCase().replace(/ /g, "_");
}

function toRawRow(cells: Record<string, unknown>): RawOrderRow {
  const row: RawOrderRow = {};
  for (const field of ORDER_FIELDS) {
    const cell = cells[field];
    if (typeof cell === "string") row[field] = cell;
  }
  return row;
}

export function parseOrderCsv(text: string): ParsedOrderCsv {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: normalizeHeader,
  });

  const headers = (parsed.meta.fields ?? []).filter((h) => h.length > 0);
  if (headers.length === 0) {
    throw new PipelineError(ErrorCode.INPUT_NO_HEADER, "CSV input has no header row");
  }

  const missingColumns = ORDER_FIELDS.filter((field) => !headers.includes(field));
  return {
    headers,
    rows: parsed.data.map(toRawRow),
    missingColumns,
  };
}

/**
 * Validate rows and flag in-batch duplicates, yielding one record per row.
 * Row numbers are 1-based positions in the input sequence.
 */
export function* validateOrderRows(rows: Iterable<RawOrderRow>): Generator<ValidatedRecord> {
  const detector = createDuplicateDetector();
  let rowNumber = 0;
  for (const row of rows) {
    rowNumber++;
    const record = detector.check(validateRow(row, rowNumber));
    if (!record.isValid) {
      log.ingest.debug({ rowNumber, error: record.errorMessage }, "row:invalid");
    }
    yield record;
  }
}

export function readOrderCsv(csvPath: string): ParsedOrderCsv {
  let text: string;
  try {
    text = readFileSync(csvPath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err && err.code === "ENOENT"
      ? ErrorCode.INPUT_NOT_FOUND
      : ErrorCode.INPUT_UNREADABLE;
    const message = code === ErrorCode.INPUT_NOT_FOUND
      ? `${csvPath} not found`
      : `cannot read ${csvPath}: ${errorMessage(err)}`;
    throw new PipelineError(code, message, { cause: err, detail: { csvPath } });
  }

  const parsed = parseOrderCsv(text);
  if (parsed.missingColumns.length) {
    log.ingest.warn({ csvPath, missingColumns: parsed.missingColumns }, "csv:missing-columns");
  }
  log.ingest.info({ csvPath, rows: parsed.rows.length, headers: parsed.headers }, "csv:read");
  return parsed;
}

/** Lazy validated-row sequence for one CSV file. */
export function readValidatedRows(csvPath: string): Generator<ValidatedRecord> {
  return validateOrderRows(readOrderCsv(csvPath).rows);
}
