/**
 * order-types.ts — Shared record shapes for ingestion, sync and export.
 */

/** Canonical CSV columns after header normalization. */
export const ORDER_FIELDS = ["customer_id", "order_id", "item", "quantity", "unit_price", "date"] as const;

export type OrderField = (typeof ORDER_FIELDS)[number];

/** One CSV row keyed by normalized header. Absent columns are undefined. */
export type RawOrderRow = Partial<Record<OrderField, string | null>>;

/** Stands in for a missing item name so (order_id, item) stays non-null. */
export const BLANK_ITEM = "__BLANK_ITEM__";

export const DUPLICATE_KEY_MESSAGE = "Duplicate order_id and item";

/**
 * A normalized CSV row.
 *
 * isValid is true iff every field is non-null; errorMessage is null iff isValid.
 */
export interface ValidatedRecord {
  /** 1-based index among the file's data rows (0 when not read from a file) */
  rowNumber: number;
  customerId: string | null;
  orderId: string | null;
  item: string | null;
  quantity: number | null;
  unitPrice: number | null;
  /** ISO calendar date, YYYY-MM-DD */
  date: string | null;
  isValid: boolean;
  errorMessage: string | null;
}

/** A record whose order_id is present and can be keyed. */
export type KeyedRecord = ValidatedRecord & { orderId: string };

export interface ItemKey {
  orderId: string;
  item: string;
}

// ─── Persisted shapes ───────────────────────────────────────────

export interface OrderUpsert {
  orderId: string;
  customerId: string | null;
  orderDate: string | null;
}

export interface OrderItemUpsert {
  orderId: string;
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  isValid: boolean;
  errorMessage: string | null;
}

/** A batch row that did not get its own (order_id, item) slot. */
export interface RejectedRow {
  rowNumber: number;
  customerId: string | null;
  orderId: string | null;
  item: string | null;
  quantity: number | null;
  unitPrice: number | null;
  date: string | null;
  errorMessage: string;
}

export interface InvalidItem {
  orderId: string;
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  errorMessage: string | null;
}

export interface ActiveOrderItem {
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  isValid: boolean;
  errorMessage: string | null;
}

export interface ActiveOrder {
  orderId: string;
  customerId: string | null;
  orderDate: string | null;
  items: ActiveOrderItem[];
}

// ─── Aggregation results ────────────────────────────────────────

export interface OrderTotal {
  orderId: string;
  customerId: string | null;
  total: number;
}

export interface CustomerSpend {
  customerId: string | null;
  total: number;
}

export interface OrderItemCount {
  orderId: string;
  uniqueItems: number;
}
