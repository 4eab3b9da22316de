/**
 * pipeline.ts — One ingestion run, end to end.
 *
 *   CSV → validated records → reconcile (one transaction) → reads → JSON export
 *
 * The store is opened once per run and closed on every exit path. Input
 * errors surface before it is opened; a failed sync skips aggregation and
 * export.
 */

import type { PipelineConfig } from "./config.js";
import { log } from "./logger.js";
import { runAggregations, type OrderAggregations } from "./services/aggregations.js";
import { readOrderCsv, validateOrderRows } from "./services/csv-reader.js";
import { buildOrderExport, serializeOrderExport, writeOrderExport } from "./services/order-export.js";
import { partitionKeyed, reconcile, type SyncSummary } from "./services/reconciler.js";
import { createOrderStore, type OrderStore } from "./stores/order-store.js";
import {
  DUPLICATE_KEY_MESSAGE,
  type InvalidItem,
  type OrderField,
  type RejectedRow,
  type ValidatedRecord,
} from "./types/order-types.js";

export type PipelineOptions = Pick<PipelineConfig, "csvPath" | "dbPath" | "exportPath" | "mode">;

export interface PipelineDeps {
  /** Store factory; tests swap in instrumented stores. */
  openStore?: (dbPath: string) => OrderStore;
}

export interface ValidationSummary {
  rowsProcessed: number;
  validRows: number;
  invalidRows: number;
  duplicateRows: number;
  /** Rows without an order_id, kept out of the order tables */
  unkeyedRows: number;
  missingColumns: OrderField[];
}

export interface PipelineReport {
  options: PipelineOptions;
  validation: ValidationSummary;
  sync: SyncSummary;
  invalidItems: InvalidItem[];
  rejectedRows: RejectedRow[];
  aggregations: OrderAggregations;
  exported: {
    path: string;
    orders: number;
    /** The JSON written to path, without its trailing newline */
    json: string;
  };
}

export function summarizeValidation(
  records: readonly ValidatedRecord[],
  unkeyedRows: number,
  missingColumns: OrderField[] = [],
): ValidationSummary {
  const validRows = records.filter((r) => r.isValid).length;
  return {
    rowsProcessed: records.length,
    validRows,
    invalidRows: records.length - validRows,
    duplicateRows: records.filter((r) => r.errorMessage === DUPLICATE_KEY_MESSAGE).length,
    unkeyedRows,
    missingColumns,
  };
}

export function runPipeline(options: PipelineOptions, deps: PipelineDeps = {}): PipelineReport {
  const parsed = readOrderCsv(options.csvPath);
  const openStore = deps.openStore ?? createOrderStore;
  const store = openStore(options.dbPath);

  try {
    const records = [...validateOrderRows(parsed.rows)];
    const { keyed, unkeyed } = partitionKeyed(records);
    const validation = summarizeValidation(records, unkeyed.length, parsed.missingColumns);
    if (unkeyed.length) {
      log.ingest.warn({ rows: unkeyed.map((r) => r.rowNumber) }, "rows without order_id kept as rejected rows");
    }
    log.ingest.info({ ...validation }, "validation:complete");

    const sync = reconcile(store, keyed, options.mode, { rejected: unkeyed });

    const invalidItems = store.invalidItems();
    const rejectedRows = store.listRejectedRows();
    const aggregations = runAggregations(store);

    const orders = buildOrderExport(store);
    const json = serializeOrderExport(orders);
    writeOrderExport(options.exportPath, json);

    return {
      options,
      validation,
      sync,
      invalidItems,
      rejectedRows,
      aggregations,
      exported: { path: options.exportPath, orders: orders.length, json },
    };
  } finally {
    store.close();
  }
}
