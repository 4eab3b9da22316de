/**
 * order-export.ts — JSON snapshot of every order that still has items.
 *
 * Items are listed whether valid or not, so invalid rows can be reviewed
 * from the snapshot. total_price only sums fully-priced, non-placeholder
 * items.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { ErrorCode, PipelineError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { OrderStore } from "../stores/order-store.js";
import { BLANK_ITEM, type ActiveOrder, type ActiveOrderItem } from "../types/order-types.js";

export interface ExportedItem {
  item: string;
  quantity: number | null;
  unit_price: number | null;
  is_valid: boolean;
  error_message: string | null;
}

export interface ExportedOrder {
  order_id: string;
  customer_id: string | null;
  date: string | null;
  total_price: number;
  items: ExportedItem[];
}

/** Round half away from zero to cents. */
export function roundCurrency(value: number): number {
  return Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100;
}

export function orderTotal(items: readonly ActiveOrderItem[]): number {
  let total = 0;
  for (const item of items) {
    if (item.item === BLANK_ITEM || item.quantity === null || item.unitPrice === null) continue;
    total += item.quantity * item.unitPrice;
  }
  return roundCurrency(total);
}

export function toExportedOrder(order: ActiveOrder): ExportedOrder {
  return {
    order_id: order.orderId,
    customer_id: order.customerId,
    date: order.orderDate,
    total_price: orderTotal(order.items),
    items: order.items.map((item) => ({
      item: item.item,
      quantity: item.quantity,
      unit_price: item.unitPrice,
      is_valid: item.isValid,
      error_message: item.errorMessage,
    })),
  };
}

export function buildOrderExport(store: OrderStore): ExportedOrder[] {
  return store.activeOrdersWithItems()
    .filter((order) => order.items.length > 0)
    .map(toExportedOrder);
}

export function serializeOrderExport(orders: readonly ExportedOrder[]): string {
  return JSON.stringify(orders, null, 2);
}

export function writeOrderExport(exportPath: string, json: string): void {
  try {
    mkdirSync(dirname(exportPath), { recursive: true });
    writeFileSync(exportPath, json + "\n", "utf8");
  } catch (err) {
    throw new PipelineError(ErrorCode.EXPORT_FAILED, `cannot write ${exportPath}: ${errorMessage(err)}`, {
      cause: err,
      detail: { exportPath },
    });
  }
  log.report.info({ exportPath, bytes: Buffer.byteLength(json) }, "export:written");
}
