/**
 * report.ts — Human-readable run summary for the CLI.
 */

import type { PipelineReport } from "./pipeline.js";

export function formatMoney(value: number): string {
  return `$${value.toFixed(2)}`;
}

function show(value: string | number | null): string {
  return value === null ? "-" : String(value);
}

export function formatReport(report: PipelineReport): string[] {
  const { validation, sync, invalidItems, rejectedRows, aggregations, exported } = report;
  const lines: string[] = [];

  lines.push("=== Order Sync Pipeline ===");
  lines.push(`Source: ${report.options.csvPath}`);
  lines.push(
    `Rows processed: ${validation.rowsProcessed} ` +
    `(valid ${validation.validRows}, invalid ${validation.invalidRows}, duplicates ${validation.duplicateRows})`,
  );
  if (validation.missingColumns.length) {
    lines.push(`Missing columns: ${validation.missingColumns.join(", ")}`);
  }

  lines.push("");
  lines.push(`Database updated at ${report.options.dbPath} (${sync.mode} mode)`);
  lines.push(
    `Items: ${sync.itemsInserted} inserted, ${sync.itemsUpdated} updated, ${sync.itemsDeleted} deleted; ` +
    `orders removed: ${sync.ordersDeleted}`,
  );

  const reviewCount = invalidItems.length + rejectedRows.length;
  lines.push("");
  lines.push(`Invalid rows needing review: ${reviewCount}`);
  for (const item of invalidItems) {
    lines.push(
      `- Order ID: ${item.orderId}, Item: ${item.item}, Quantity: ${show(item.quantity)}, ` +
      `Unit Price: ${show(item.unitPrice)}, Error: ${show(item.errorMessage)}`,
    );
  }
  for (const row of rejectedRows) {
    lines.push(
      `- Row ${row.rowNumber} (not stored as an item): Order ID: ${show(row.orderId)}, Item: ${show(row.item)}, ` +
      `Quantity: ${show(row.quantity)}, Unit Price: ${show(row.unitPrice)}, Error: ${row.errorMessage}`,
    );
  }

  lines.push("");
  lines.push("Total Value Per Order:");
  for (const order of aggregations.orderTotals) {
    lines.push(`- Order ID: ${order.orderId}, Customer ID: ${show(order.customerId)}, Total Value: ${formatMoney(order.total)}`);
  }

  if (aggregations.topCustomer) {
    lines.push("");
    lines.push(
      `Top Customer: ${show(aggregations.topCustomer.customerId)} ` +
      `with Total Spend: ${formatMoney(aggregations.topCustomer.total)}`,
    );
  }

  lines.push("");
  lines.push("Unique Items Per Order:");
  for (const count of aggregations.itemCounts) {
    lines.push(`- Order ID: ${count.orderId}, Unique Items: ${count.uniqueItems}`);
  }

  lines.push("");
  lines.push("Exported JSON (valid & active orders):");
  lines.push(...exported.json.split("\n"));
  lines.push(`Exported ${exported.orders} orders to ${exported.path}`);
  return lines;
}
