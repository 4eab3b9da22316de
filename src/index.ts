export { resolveConfig, type PipelineConfig, type SyncMode } from "./config.js";
export { ErrorCode, PipelineError, isPipelineError, type ErrorCodeValue } from "./errors.js";
export { runPipeline, type PipelineReport, type PipelineOptions } from "./pipeline.js";
export { formatReport } from "./report.js";
export { createOrderStore, type OrderStore } from "./stores/order-store.js";
export { validateRow, toRawOrderRow } from "./services/row-validator.js";
export { createDuplicateDetector, markDuplicate } from "./services/duplicate-detector.js";
export { parseOrderCsv, readValidatedRows, validateOrderRows } from "./services/csv-reader.js";
export { reconcile, fullReplace, incrementalSync, type SyncSummary } from "./services/reconciler.js";
export { runAggregations, type OrderAggregations } from "./services/aggregations.js";
export { buildOrderExport, serializeOrderExport, type ExportedOrder } from "./services/order-export.js";
export * from "./types/order-types.js";
