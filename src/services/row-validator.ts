/**
 * row-validator.ts — Normalize and validate one raw CSV row.
 *
 * Errors accumulate rather than short-circuit: a row missing both its
 * item and its date reports both. Nothing here throws on bad input.
 */

import { format, isValid, parse } from "date-fns";
import type { RawOrderRow, ValidatedRecord } from "../types/order-types.js";

const MONTH_NAMES = "January|February|March|April|May|June|July|August|September|October|November|December";

/**
 * Tried in order; the first format that parses wins. date-fns accepts
 * short years and abbreviated months, so each pattern is gated by a
 * shape that requires four-digit years and full month names.
 */
export const DATE_FORMATS = [
  { pattern: "yyyy-MM-dd", shape: /^\d{4}-\d{1,2}-\d{1,2}$/ },
  { pattern: "dd/MM/yyyy", shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/ },
  { pattern: "yyyy/MM/dd", shape: /^\d{4}\/\d{1,2}\/\d{1,2}$/ },
  { pattern: "MMMM d yyyy", shape: new RegExp(`^(?:${MONTH_NAMES}) \\d{1,2} \\d{4}$`, "i") },
] as const;

const ISO_DATE = "yyyy-MM-dd";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// Anchors parse() for every format; all formats carry a full date.
const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseStringField(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}

export function parseIntegerField(value: string | null | undefined): number | null {
  const trimmed = parseStringField(value);
  if (trimmed === null || !INTEGER_PATTERN.test(trimmed)) return null;
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseDecimalField(value: string | null | undefined): number | null {
  const trimmed = parseStringField(value);
  if (trimmed === null || !DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a date against DATE_FORMATS.
 * @returns ISO calendar date (YYYY-MM-DD) or null when no format matches
 */
export function parseDateField(value: string | null | undefined): string | null {
  const trimmed = parseStringField(value);
  if (trimmed === null) return null;

  const candidate = trimmed.replace(/\s+/g, " ");
  for (const { pattern, shape } of DATE_FORMATS) {
    if (!shape.test(candidate)) continue;
    const parsed = parse(candidate, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, ISO_DATE);
    }
  }
  return null;
}

function missing(field: string): string {
  return `Invalid or missing ${field}`;
}

export function validateRow(row: RawOrderRow, rowNumber = 0): ValidatedRecord {
  const errors: string[] = [];

  const customerId = parseStringField(row.customer_id);
  if (customerId === null) errors.push(missing("customer_id"));

  const orderId = parseStringField(row.order_id);
  if (orderId === null) errors.push(missing("order_id"));

  const item = parseStringField(row.item);
  if (item === null) errors.push(missing("item"));

  const quantity = parseIntegerField(row.quantity);
  if (quantity === null) errors.push(missing("quantity"));

  const unitPrice = parseDecimalField(row.unit_price);
  if (unitPrice === null) errors.push(missing("unit_price"));

  const date = parseDateField(row.date);
  if (date === null) errors.push(missing("date"));

  return {
    rowNumber,
    customerId,
    orderId,
    item,
    quantity,
    unitPrice,
    date,
    isValid: errors.length === 0,
    errorMessage: errors.length ? errors.join("; ") : null,
  };
}

/** Render a record back into raw CSV cells (null fields become empty cells). */
export function toRawOrderRow(record: ValidatedRecord): RawOrderRow {
  return {
    customer_id: record.customerId ?? "",
    order_id: record.orderId ?? "",
    item: record.item ?? "",
    quantity: record.quantity === null ? "" : String(record.quantity),
    unit_price: record.unitPrice === null ? "" : String(record.unitPrice),
    date: record.date ?? "",
  };
}
