/**
 * reconciler.test.ts — Staging precedence, incremental sync, full replace, rollback.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ErrorCode, PipelineError } from "../src/errors.js";
import { validateOrderRows } from "../src/services/csv-reader.js";
import {
  fullReplace,
  incrementalSync,
  partitionKeyed,
  reconcile,
  stageBatch,
} from "../src/services/reconciler.js";
import { createOrderStore, type OrderStore } from "../src/stores/order-store.js";
import { BLANK_ITEM, DUPLICATE_KEY_MESSAGE } from "../src/types/order-types.js";
import { captureError, makeRecord } from "./helpers/fixtures.js";

function keysOf(store: OrderStore): string[] {
  return store.listItemKeys().map((k) => `${k.orderId}/${k.item}`).sort();
}

const BATCH_ONE = [
  makeRecord({ rowNumber: 1, orderId: "1", item: "Widget" }),
  makeRecord({ rowNumber: 2, orderId: "1", item: "Gadget", quantity: 1, unitPrice: 5 }),
  makeRecord({ rowNumber: 3, orderId: "2", customerId: "C2", item: "Bolt", quantity: 10, unitPrice: 0.5 }),
];

const BATCH_TWO = [
  makeRecord({ rowNumber: 1, orderId: "1", item: "Widget", quantity: 5 }),
  makeRecord({ rowNumber: 2, orderId: "3", customerId: "C3", item: "Nut", quantity: 4, unitPrice: 0.25 }),
];

// ─── Staging ────────────────────────────────────────────────

describe("stageBatch", () => {
  it("never displaces a staged valid record", () => {
    const first = makeRecord({ rowNumber: 1, quantity: 3 });
    const second = makeRecord({ rowNumber: 2, quantity: 4 });
    const { staged, rejected } = stageBatch([first, second]);

    expect([...staged.values()].map((s) => s.record)).toEqual([first]);
    expect(rejected).toEqual([{
      rowNumber: 2, customerId: "C1", orderId: "1", item: "Widget", quantity: 4, unitPrice: 9.99,
      date: "2025-06-01", errorMessage: DUPLICATE_KEY_MESSAGE,
    }]);
  });

  it("lets a later record displace an invalid one", () => {
    const invalid = makeRecord({ rowNumber: 1, unitPrice: null, isValid: false, errorMessage: "Invalid or missing unit_price" });
    const valid = makeRecord({ rowNumber: 2 });
    const { staged, rejected } = stageBatch([invalid, valid]);

    expect([...staged.values()].map((s) => s.record)).toEqual([valid]);
    expect(rejected.map((r) => [r.rowNumber, r.errorMessage])).toEqual([[1, "Invalid or missing unit_price"]]);
  });

  it("keys a missing item by the placeholder", () => {
    const blank = makeRecord({ item: null, isValid: false, errorMessage: "Invalid or missing item" });
    const { staged } = stageBatch([blank]);
    expect([...staged.values()].map((s) => s.item)).toEqual([BLANK_ITEM]);
  });

  it("rejects a record without an order_id", () => {
    const err = captureError(() => stageBatch([makeRecord({ rowNumber: 7, orderId: null, isValid: false })]));
    expect(err).toBeInstanceOf(PipelineError);
    if (err instanceof PipelineError) {
      expect(err.code).toBe(ErrorCode.MALFORMED_RECORD);
      expect(err.message).toBe("record at row 7 has no order_id and cannot be reconciled");
    }
  });
});

describe("partitionKeyed", () => {
  it("diverts rows without an order_id", () => {
    const keyed = makeRecord({ rowNumber: 1 });
    const unkeyed = makeRecord({ rowNumber: 2, orderId: null, isValid: false, errorMessage: null });
    const result = partitionKeyed([keyed, unkeyed]);

    expect(result.keyed).toEqual([keyed]);
    expect(result.unkeyed.map((r) => [r.rowNumber, r.errorMessage])).toEqual([[2, "Invalid or missing order_id"]]);
  });
});

// ─── Incremental sync ───────────────────────────────────────

describe("incrementalSync", () => {
  let store: OrderStore;

  beforeEach(() => {
    store = createOrderStore();
  });

  afterEach(() => {
    store.close();
  });

  it("loads an empty store", () => {
    expect(incrementalSync(store, BATCH_ONE)).toEqual({
      mode: "sync",
      staged: 3,
      itemsInserted: 3,
      itemsUpdated: 0,
      itemsDeleted: 0,
      ordersDeleted: 0,
      rejected: 0,
    });
    expect(keysOf(store)).toEqual(["1/Gadget", "1/Widget", "2/Bolt"]);
  });

  it("leaves exactly the batch's keys and cascades to orphaned orders", () => {
    incrementalSync(store, BATCH_ONE);
    const summary = incrementalSync(store, BATCH_TWO);

    expect(keysOf(store)).toEqual(["1/Widget", "3/Nut"]);
    expect(summary).toMatchObject({ itemsInserted: 1, itemsUpdated: 1, itemsDeleted: 2, ordersDeleted: 1 });
    expect(store.counts().orders).toBe(2);
    expect(store.activeOrdersWithItems()[0]?.items[0]?.quantity).toBe(5);
  });

  it("is idempotent", () => {
    incrementalSync(store, BATCH_ONE);
    const before = store.activeOrdersWithItems();
    const summary = incrementalSync(store, BATCH_ONE);

    expect(summary).toMatchObject({ itemsInserted: 0, itemsUpdated: 3, itemsDeleted: 0, ordersDeleted: 0 });
    expect(store.activeOrdersWithItems()).toEqual(before);
  });

  it("updates the parent order from the batch", () => {
    incrementalSync(store, BATCH_ONE);
    incrementalSync(store, [makeRecord({ customerId: "C7", date: "2025-08-09" })]);

    const [order] = store.activeOrdersWithItems();
    expect(order?.customerId).toBe("C7");
    expect(order?.orderDate).toBe("2025-08-09");
  });

  it("stores a missing item under the placeholder and removes it when absent", () => {
    incrementalSync(store, [
      makeRecord({ orderId: "5", item: null, isValid: false, errorMessage: "Invalid or missing item" }),
    ]);
    expect(store.invalidItems()).toEqual([
      { orderId: "5", item: BLANK_ITEM, quantity: 2, unitPrice: 9.99, errorMessage: "Invalid or missing item" },
    ]);

    const summary = incrementalSync(store, [makeRecord({ orderId: "6" })]);
    expect(summary).toMatchObject({ itemsDeleted: 1, ordersDeleted: 1 });
    expect(keysOf(store)).toEqual(["6/Widget"]);
  });

  it("empties the store for an empty batch", () => {
    incrementalSync(store, BATCH_ONE);
    expect(incrementalSync(store, [])).toMatchObject({ itemsDeleted: 3, ordersDeleted: 2 });
    expect(store.counts()).toEqual({ orders: 0, items: 0, invalidItems: 0, rejectedRows: 0 });
  });

  it("keeps the first of two rows sharing a key", () => {
    const base = { customer_id: "C1", order_id: "1", unit_price: "1.50", date: "2025-06-01" };
    const records = [...validateOrderRows([
      { ...base, item: "Bolt", quantity: "3" },
      { ...base, item: "Bolt", quantity: "4" },
    ])];
    const summary = incrementalSync(store, records);

    expect(summary.rejected).toBe(1);
    expect(store.activeOrdersWithItems()[0]?.items).toEqual([
      { item: "Bolt", quantity: 3, unitPrice: 1.5, isValid: true, errorMessage: null },
    ]);
    expect(store.listRejectedRows()).toEqual([{
      rowNumber: 2, customerId: "C1", orderId: "1", item: "Bolt", quantity: 4, unitPrice: 1.5,
      date: "2025-06-01", errorMessage: DUPLICATE_KEY_MESSAGE,
    }]);
  });

  it("replaces rejected rows on every sync", () => {
    const diverted = {
      rowNumber: 9, customerId: "C4", orderId: null, item: "Nut", quantity: 1, unitPrice: 1,
      date: "2025-06-01", errorMessage: "Invalid or missing order_id",
    };
    incrementalSync(store, BATCH_ONE, { rejected: [diverted] });
    expect(store.listRejectedRows()).toEqual([diverted]);

    incrementalSync(store, BATCH_ONE);
    expect(store.listRejectedRows()).toEqual([]);
  });
});

// ─── Full replace ───────────────────────────────────────────

describe("fullReplace", () => {
  let store: OrderStore;

  beforeEach(() => {
    store = createOrderStore();
  });

  afterEach(() => {
    store.close();
  });

  it("clears the store before loading the batch", () => {
    incrementalSync(store, BATCH_ONE);
    expect(fullReplace(store, BATCH_TWO)).toEqual({
      mode: "overwrite",
      staged: 2,
      itemsInserted: 2,
      itemsUpdated: 0,
      itemsDeleted: 3,
      ordersDeleted: 2,
      rejected: 0,
    });
    expect(keysOf(store)).toEqual(["1/Widget", "3/Nut"]);
  });
});

// ─── reconcile ──────────────────────────────────────────────

describe("reconcile", () => {
  let store: OrderStore;

  beforeEach(() => {
    store = createOrderStore();
    incrementalSync(store, BATCH_ONE);
  });

  afterEach(() => {
    store.close();
  });

  it("dispatches on mode", () => {
    expect(reconcile(store, BATCH_TWO).mode).toBe("sync");
    expect(reconcile(store, BATCH_TWO, "overwrite").mode).toBe("overwrite");
  });

  it("rolls the whole sync back when a step fails", () => {
    const before = store.activeOrdersWithItems();
    const failing: OrderStore = {
      ...store,
      deleteOrphanOrders(): number {
        throw new Error("disk I/O error");
      },
    };

    const err = captureError(() => reconcile(failing, BATCH_TWO));
    expect(err).toBeInstanceOf(PipelineError);
    if (err instanceof PipelineError) {
      expect(err.code).toBe(ErrorCode.SYNC_FAILED);
      expect(err.message).toBe("sync failed: disk I/O error");
    }
    expect(store.activeOrdersWithItems()).toEqual(before);
  });

  it("passes a malformed record through unchanged and leaves the store intact", () => {
    const err = captureError(() => reconcile(store, [
      makeRecord({ orderId: "9" }),
      makeRecord({ rowNumber: 4, orderId: null, isValid: false }),
    ]));
    expect(err instanceof PipelineError && err.code).toBe(ErrorCode.MALFORMED_RECORD);
    expect(keysOf(store)).toEqual(["1/Gadget", "1/Widget", "2/Bolt"]);
  });
});
