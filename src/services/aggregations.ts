/**
 * aggregations.ts — Read-only order analytics over the persisted store.
 *
 * - orderTotals:  Σ quantity × unit_price per order, placeholder items excluded
 * - topCustomer:  highest Σ quantity × unit_price per customer, placeholder items included
 * - itemCounts:   distinct items per order among items with a quantity
 */

import type { OrderStore } from "../stores/order-store.js";
import type { CustomerSpend, OrderItemCount, OrderTotal } from "../types/order-types.js";

export interface OrderAggregations {
  orderTotals: OrderTotal[];
  topCustomer: CustomerSpend | null;
  itemCounts: OrderItemCount[];
}

export function runAggregations(store: OrderStore): OrderAggregations {
  return {
    orderTotals: store.totalsByOrder(),
    topCustomer: store.topCustomer(),
    itemCounts: store.distinctItemCountsByOrder(),
  };
}
