/**
 * order-store.ts — Orders & Order Items (SQLite)
 *
 * The persisted store is the single source of truth between runs:
 *   orders        — one row per order_id (parent)
 *   order_items   — one row per (order_id, item) (child), FK → orders
 *   rejected_rows — batch rows that could not take a key slot, replaced
 *                   wholesale on every sync
 *
 * The store is handed to the reconciler and the read-side services
 * explicitly; nothing here is process-global.
 */

import type Database from "better-sqlite3";
import { MEMORY_DB, initSchema, openDatabase, withTransaction } from "../db.js";
import { log } from "../logger.js";
import {
  BLANK_ITEM,
  type ActiveOrder,
  type CustomerSpend,
  type InvalidItem,
  type ItemKey,
  type OrderItemCount,
  type OrderItemUpsert,
  type OrderTotal,
  type OrderUpsert,
  type RejectedRow,
} from "../types/order-types.js";

// ─── Store Interface ────────────────────────────────────────

export interface OrderStoreCounts {
  orders: number;
  items: number;
  invalidItems: number;
  rejectedRows: number;
}

export interface OrderStore {
  /** Run fn in one write transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T;

  // ── Writes ────────────────────────────────────────────
  upsertOrder(order: OrderUpsert): void;
  upsertOrderItem(item: OrderItemUpsert): void;
  /** Delete every item whose key is absent from keys. Returns rows deleted. */
  deleteItemsNotIn(keys: Iterable<ItemKey>): number;
  /** Delete orders with no remaining items. Returns rows deleted. */
  deleteOrphanOrders(): number;
  /** Delete all items, orders and rejected rows. */
  clearAll(): void;
  replaceRejectedRows(rows: readonly RejectedRow[]): void;

  // ── Reads ─────────────────────────────────────────────
  listItemKeys(): ItemKey[];
  totalsByOrder(): OrderTotal[];
  topCustomer(): CustomerSpend | null;
  distinctItemCountsByOrder(): OrderItemCount[];
  invalidItems(): InvalidItem[];
  countInvalidItems(): number;
  listRejectedRows(): RejectedRow[];
  /** Orders that have at least one item, with all of their items. */
  activeOrdersWithItems(): ActiveOrder[];

  // ── Diagnostics ───────────────────────────────────────
  counts(): OrderStoreCounts;
  getDbPath(): string;
  close(): void;
}

// ─── Schema ─────────────────────────────────────────────────

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS orders (
    order_id    TEXT NOT NULL PRIMARY KEY,
    customer_id TEXT,
    order_date  TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS order_items (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    order_id      TEXT NOT NULL REFERENCES orders(order_id),
    item          TEXT NOT NULL,
    quantity      INTEGER,
    unit_price    REAL,
    is_valid      INTEGER NOT NULL,
    error_message TEXT,
    UNIQUE(order_id, item)
  )`,
  `CREATE TABLE IF NOT EXISTS rejected_rows (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    row_number    INTEGER NOT NULL,
    customer_id   TEXT,
    order_id      TEXT,
    item          TEXT,
    quantity      INTEGER,
    unit_price    REAL,
    order_date    TEXT,
    error_message TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_order_items_invalid ON order_items(is_valid)`,
  // Per-connection scratch space for set-difference deletes.
  `CREATE TEMP TABLE IF NOT EXISTS staging_keys (
    order_id TEXT NOT NULL,
    item     TEXT NOT NULL,
    PRIMARY KEY(order_id, item)
  )`,
];

// ─── Row shapes ─────────────────────────────────────────────

interface OrderItemParams {
  orderId: string;
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  isValid: 0 | 1;
  errorMessage: string | null;
}

interface InvalidItemRow {
  orderId: string;
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  errorMessage: string | null;
}

interface ActiveOrderRow {
  orderId: string;
  customerId: string | null;
  orderDate: string | null;
  item: string;
  quantity: number | null;
  unitPrice: number | null;
  isValid: number;
  errorMessage: string | null;
}

interface CountRow {
  count: number;
}

// ─── Implementation ─────────────────────────────────────────

export function createOrderStore(dbPath: string = MEMORY_DB): OrderStore {
  const db: Database.Database = openDatabase(dbPath);
  initSchema(db, SCHEMA_STATEMENTS);
  log.store.debug({ dbPath }, "store:open");

  // ── Prepared Statements ─────────────────────────────────

  const stmts = {
    upsertOrder: db.prepare<OrderUpsert>(`
      INSERT INTO orders (order_id, customer_id, order_date)
      VALUES (@orderId, @customerId, @orderDate)
      ON CONFLICT(order_id) DO UPDATE SET
        customer_id = excluded.customer_id,
        order_date = excluded.order_date
    `),

    upsertOrderItem: db.prepare<OrderItemParams>(`
      INSERT INTO order_items (order_id, item, quantity, unit_price, is_valid, error_message)
      VALUES (@orderId, @item, @quantity, @unitPrice, @isValid, @errorMessage)
      ON CONFLICT(order_id, item) DO UPDATE SET
        quantity = excluded.quantity,
        unit_price = excluded.unit_price,
        is_valid = excluded.is_valid,
        error_message = excluded.error_message
    `),

    clearStagingKeys: db.prepare(`DELETE FROM staging_keys`),

    stageKey: db.prepare<[string, string]>(`
      INSERT OR IGNORE INTO staging_keys (order_id, item) VALUES (?, ?)
    `),

    deleteUnstagedItems: db.prepare(`
      DELETE FROM order_items
      WHERE NOT EXISTS (
        SELECT 1 FROM staging_keys s
        WHERE s.order_id = order_items.order_id AND s.item = order_items.item
      )
    `),

    deleteOrphanOrders: db.prepare(`
      DELETE FROM orders
      WHERE NOT EXISTS (SELECT 1 FROM order_items i WHERE i.order_id = orders.order_id)
    `),

    deleteAllItems: db.prepare(`DELETE FROM order_items`),
    deleteAllOrders: db.prepare(`DELETE FROM orders`),
    deleteAllRejected: db.prepare(`DELETE FROM rejected_rows`),

    insertRejected: db.prepare<RejectedRow>(`
      INSERT INTO rejected_rows (row_number, customer_id, order_id, item, quantity, unit_price, order_date, error_message)
      VALUES (@rowNumber, @customerId, @orderId, @item, @quantity, @unitPrice, @date, @errorMessage)
    `),

    listItemKeys: db.prepare<[], ItemKey>(`
      SELECT order_id AS orderId, item FROM order_items ORDER BY id
    `),

    totalsByOrder: db.prepare<{ blank: string }, OrderTotal>(`
      SELECT o.order_id AS orderId, o.customer_id AS customerId,
             SUM(i.quantity * i.unit_price) AS total
      FROM orders o
      JOIN order_items i ON i.order_id = o.order_id
      WHERE i.item <> @blank AND i.quantity IS NOT NULL AND i.unit_price IS NOT NULL
      GROUP BY o.order_id
      ORDER BY o.rowid
    `),

    // Ties: lowest customer_id wins, named customers ahead of a missing one.
    topCustomer: db.prepare<[], CustomerSpend>(`
      SELECT o.customer_id AS customerId, SUM(i.quantity * i.unit_price) AS total
      FROM orders o
      JOIN order_items i ON i.order_id = o.order_id
      WHERE i.quantity IS NOT NULL AND i.unit_price IS NOT NULL
      GROUP BY o.customer_id
      ORDER BY total DESC, o.customer_id IS NULL, o.customer_id ASC
      LIMIT 1
    `),

    distinctItemCounts: db.prepare<[], OrderItemCount>(`
      SELECT o.order_id AS orderId, COUNT(DISTINCT i.item) AS uniqueItems
      FROM orders o
      JOIN order_items i ON i.order_id = o.order_id
      WHERE i.quantity IS NOT NULL
      GROUP BY o.order_id
      ORDER BY o.rowid
    `),

    invalidItems: db.prepare<[], InvalidItemRow>(`
      SELECT order_id AS orderId, item, quantity, unit_price AS unitPrice, error_message AS errorMessage
      FROM order_items
      WHERE is_valid = 0
      ORDER BY id
    `),

    countInvalid: db.prepare<[], CountRow>(`
      SELECT COUNT(*) AS count FROM order_items WHERE is_valid = 0
    `),

    listRejected: db.prepare<[], RejectedRow>(`
      SELECT row_number AS rowNumber, customer_id AS customerId, order_id AS orderId, item,
             quantity, unit_price AS unitPrice, order_date AS date, error_message AS errorMessage
      FROM rejected_rows
      ORDER BY row_number, id
    `),

    activeOrders: db.prepare<[], ActiveOrderRow>(`
      SELECT o.order_id AS orderId, o.customer_id AS customerId, o.order_date AS orderDate,
             i.item, i.quantity, i.unit_price AS unitPrice,
             i.is_valid AS isValid, i.error_message AS errorMessage
      FROM orders o
      JOIN order_items i ON i.order_id = o.order_id
      ORDER BY o.rowid, i.id
    `),

    countOrders: db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM orders`),
    countItems: db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM order_items`),
    countRejected: db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM rejected_rows`),
  };

  function count(stmt: Database.Statement<[], CountRow>): number {
    return stmt.get()?.count ?? 0;
  }

  // ── Store Implementation ────────────────────────────────

  const store: OrderStore = {
    transaction<T>(fn: () => T): T {
      return withTransaction(db, fn);
    },

    upsertOrder(order: OrderUpsert): void {
      stmts.upsertOrder.run({
        orderId: order.orderId,
        customerId: order.customerId,
        orderDate: order.orderDate,
      });
    },

    upsertOrderItem(item: OrderItemUpsert): void {
      stmts.upsertOrderItem.run({
        orderId: item.orderId,
        item: item.item,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        isValid: item.isValid ? 1 : 0,
        errorMessage: item.errorMessage,
      });
    },

    deleteItemsNotIn(keys: Iterable<ItemKey>): number {
      return withTransaction(db, () => {
        stmts.clearStagingKeys.run();
        for (const key of keys) {
          stmts.stageKey.run(key.orderId, key.item);
        }
        const deleted = stmts.deleteUnstagedItems.run().changes;
        stmts.clearStagingKeys.run();
        return deleted;
      });
    },

    deleteOrphanOrders(): number {
      return stmts.deleteOrphanOrders.run().changes;
    },

    clearAll(): void {
      withTransaction(db, () => {
        stmts.deleteAllItems.run();
        stmts.deleteAllOrders.run();
        stmts.deleteAllRejected.run();
      });
    },

    replaceRejectedRows(rows: readonly RejectedRow[]): void {
      withTransaction(db, () => {
        stmts.deleteAllRejected.run();
        for (const row of rows) {
          stmts.insertRejected.run({
            rowNumber: row.rowNumber,
            customerId: row.customerId,
            orderId: row.orderId,
            item: row.item,
            quantity: row.quantity,
            unitPrice: row.unitPrice,
            date: row.date,
            errorMessage: row.errorMessage,
          });
        }
      });
    },

    listItemKeys(): ItemKey[] {
      return stmts.listItemKeys.all();
    },

    totalsByOrder(): OrderTotal[] {
      return stmts.totalsByOrder.all({ blank: BLANK_ITEM });
    },

    topCustomer(): CustomerSpend | null {
      return stmts.topCustomer.get() ?? null;
    },

    distinctItemCountsByOrder(): OrderItemCount[] {
      return stmts.distinctItemCounts.all();
    },

    invalidItems(): InvalidItem[] {
      return stmts.invalidItems.all();
    },

    countInvalidItems(): number {
      return count(stmts.countInvalid);
    },

    listRejectedRows(): RejectedRow[] {
      return stmts.listRejected.all();
    },

    activeOrdersWithItems(): ActiveOrder[] {
      const orders: ActiveOrder[] = [];
      let current: ActiveOrder | undefined;
      for (const row of stmts.activeOrders.all()) {
        if (!current || current.orderId !== row.orderId) {
          current = {
            orderId: row.orderId,
            customerId: row.customerId,
            orderDate: row.orderDate,
            items: [],
          };
          orders.push(current);
        }
        current.items.push({
          item: row.item,
          quantity: row.quantity,
          unitPrice: row.unitPrice,
          isValid: row.isValid === 1,
          errorMessage: row.errorMessage,
        });
      }
      return orders;
    },

    counts(): OrderStoreCounts {
      return {
        orders: count(stmts.countOrders),
        items: count(stmts.countItems),
        invalidItems: count(stmts.countInvalid),
        rejectedRows: count(stmts.countRejected),
      };
    },

    getDbPath(): string {
      return dbPath;
    },

    close(): void {
      db.close();
      log.store.debug({ dbPath }, "store:close");
    },
  };

  return store;
}
