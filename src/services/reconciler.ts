/**
 * reconciler.ts — Make the order store match one validated batch.
 *
 * The batch is the complete desired state, not a diff. Incremental sync:
 *   1. stage the batch keyed by (order_id, item)
 *   2. upsert every staged record's order and item
 *   3. delete items whose key is not staged
 *   4. delete orders left without items
 *   5. drop the staging map
 * All five steps run in one store transaction: a failure anywhere leaves
 * the store exactly as it was before the call.
 *
 * Staging precedence: last write wins, except that a staged valid record
 * is never displaced. Whatever loses its key slot is kept as a rejected
 * row so it can still be reviewed.
 */

import type { SyncMode } from "../config.js";
import { ErrorCode, PipelineError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { OrderStore } from "../stores/order-store.js";
import {
  BLANK_ITEM,
  DUPLICATE_KEY_MESSAGE,
  type ItemKey,
  type KeyedRecord,
  type RejectedRow,
  type ValidatedRecord,
} from "../types/order-types.js";
import { naturalKey } from "./duplicate-detector.js";

// ─── Types ──────────────────────────────────────────────────

export interface SyncSummary {
  mode: SyncMode;
  /** Distinct (order_id, item) keys in the batch */
  staged: number;
  itemsInserted: number;
  itemsUpdated: number;
  itemsDeleted: number;
  ordersDeleted: number;
  /** Rows persisted to rejected_rows */
  rejected: number;
}

export interface StagedItem extends ItemKey {
  record: ValidatedRecord;
}

export interface StagedBatch {
  /** Insertion-ordered; a replaced record keeps its key's original position */
  staged: Map<string, StagedItem>;
  rejected: RejectedRow[];
}

export interface ReconcileOptions {
  /** Rows diverted before reconciliation (e.g. no order_id), persisted with the rejected rows */
  rejected?: readonly RejectedRow[];
}

// ─── Staging ────────────────────────────────────────────────

export function isKeyed(record: ValidatedRecord): record is KeyedRecord {
  return record.orderId !== null && record.orderId.length > 0;
}

export function toRejectedRow(record: ValidatedRecord, fallbackMessage = DUPLICATE_KEY_MESSAGE): RejectedRow {
  return {
    rowNumber: record.rowNumber,
    customerId: record.customerId,
    orderId: record.orderId,
    item: record.item,
    quantity: record.quantity,
    unitPrice: record.unitPrice,
    date: record.date,
    errorMessage: record.errorMessage ?? fallbackMessage,
  };
}

/** Split a batch into records that can be keyed and rejected rows that cannot. */
export function partitionKeyed(records: Iterable<ValidatedRecord>): { keyed: KeyedRecord[]; unkeyed: RejectedRow[] } {
  const keyed: KeyedRecord[] = [];
  const unkeyed: RejectedRow[] = [];
  for (const record of records) {
    if (isKeyed(record)) {
      keyed.push(record);
    } else {
      unkeyed.push(toRejectedRow(record, "Invalid or missing order_id"));
    }
  }
  return { keyed, unkeyed };
}

export function stageBatch(batch: Iterable<ValidatedRecord>): StagedBatch {
  const staged = new Map<string, StagedItem>();
  const rejected: RejectedRow[] = [];

  for (const record of batch) {
    if (!isKeyed(record)) {
      throw new PipelineError(
        ErrorCode.MALFORMED_RECORD,
        `record at row ${record.rowNumber} has no order_id and cannot be reconciled`,
        { detail: { rowNumber: record.rowNumber } },
      );
    }

    const item = record.item ?? BLANK_ITEM;
    const key = naturalKey(record.orderId, item);
    const existing = staged.get(key);

    if (!existing) {
      staged.set(key, { orderId: record.orderId, item, record });
    } else if (existing.record.isValid) {
      rejected.push(toRejectedRow(record));
    } else {
      rejected.push(toRejectedRow(existing.record));
      staged.set(key, { orderId: record.orderId, item, record });
    }
  }

  return { staged, rejected };
}

function applyStaged(store: OrderStore, staged: Map<string, StagedItem>, existingKeys: Set<string>): { inserted: number; updated: number } {
  let inserted = 0;
  let updated = 0;
  for (const [key, { orderId, item, record }] of staged) {
    store.upsertOrder({ orderId, customerId: record.customerId, orderDate: record.date });
    store.upsertOrderItem({
      orderId,
      item,
      quantity: record.quantity,
      unitPrice: record.unitPrice,
      isValid: record.isValid,
      errorMessage: record.errorMessage,
    });
    if (existingKeys.has(key)) {
      updated++;
    } else {
      inserted++;
    }
  }
  return { inserted, updated };
}

// ─── Modes ──────────────────────────────────────────────────

/** Delete everything, then load the batch onto an empty store. */
export function fullReplace(store: OrderStore, batch: Iterable<ValidatedRecord>, options: ReconcileOptions = {}): SyncSummary {
  return store.transaction(() => {
    const before = store.counts();
    store.clearAll();

    const { staged, rejected } = stageBatch(batch);
    const { inserted } = applyStaged(store, staged, new Set());
    const allRejected = [...(options.rejected ?? []), ...rejected];
    store.replaceRejectedRows(allRejected);

    const summary: SyncSummary = {
      mode: "overwrite",
      staged: staged.size,
      itemsInserted: inserted,
      itemsUpdated: 0,
      itemsDeleted: before.items,
      ordersDeleted: before.orders,
      rejected: allRejected.length,
    };
    staged.clear();
    return summary;
  });
}

/** Upsert the batch, then delete items and orders the batch no longer mentions. */
export function incrementalSync(store: OrderStore, batch: Iterable<ValidatedRecord>, options: ReconcileOptions = {}): SyncSummary {
  return store.transaction(() => {
    // 1. stage
    const { staged, rejected } = stageBatch(batch);

    // 2. upsert orders + items
    const existingKeys = new Set(store.listItemKeys().map((k) => naturalKey(k.orderId, k.item)));
    const { inserted, updated } = applyStaged(store, staged, existingKeys);

    // 3. delete items missing from the batch
    const itemsDeleted = store.deleteItemsNotIn(staged.values());

    // 4. cascade to orders with no items left
    const ordersDeleted = store.deleteOrphanOrders();

    const allRejected = [...(options.rejected ?? []), ...rejected];
    store.replaceRejectedRows(allRejected);

    const summary: SyncSummary = {
      mode: "sync",
      staged: staged.size,
      itemsInserted: inserted,
      itemsUpdated: updated,
      itemsDeleted,
      ordersDeleted,
      rejected: allRejected.length,
    };

    // 5. release staging
    staged.clear();
    return summary;
  });
}

/**
 * Reconcile the store against a batch in the given mode.
 * Any failure rolls the whole sync back; store errors surface as SYNC_FAILED.
 */
export function reconcile(
  store: OrderStore,
  batch: Iterable<ValidatedRecord>,
  mode: SyncMode = "sync",
  options: ReconcileOptions = {},
): SyncSummary {
  log.sync.info({ mode, dbPath: store.getDbPath() }, "sync:start");
  try {
    const summary = mode === "overwrite"
      ? fullReplace(store, batch, options)
      : incrementalSync(store, batch, options);
    log.sync.info({ ...summary }, "sync:complete");
    return summary;
  } catch (err) {
    log.sync.error({ err, mode }, "sync:failed");
    if (err instanceof PipelineError) throw err;
    throw new PipelineError(ErrorCode.SYNC_FAILED, `sync failed: ${errorMessage(err)}`, { cause: err });
  }
}
