#!/usr/bin/env tsx
/**
 * order-sync.ts — CLI entry point.
 *
 * Usage:
 *   npx tsx scripts/order-sync.ts run [--csv path] [--db path] [--out path] [--overwrite]
 *   npm run sync -- --csv orders.csv
 *
 * Commands:
 *   run    Validate the CSV, sync it into the database, print the report,
 *          write the JSON export (default command)
 *   help   Show this message
 *
 * Exit codes: 0 on success, 1 on any failure.
 */

import { resolveConfig } from "../src/config.js";
import { ErrorCode, errorMessage, isPipelineError } from "../src/errors.js";
import { log } from "../src/logger.js";
import { runPipeline } from "../src/pipeline.js";
import { formatReport } from "../src/report.js";

const USAGE = [
  "Usage: order-sync run [--csv path] [--db path] [--out path] [--overwrite]",
  "",
  "  --csv        CSV export to ingest       (env ORDER_SYNC_CSV_PATH, default user_data.csv)",
  "  --db         SQLite database file       (env ORDER_SYNC_DB_PATH, default data/orders.db)",
  "  --out        JSON export destination    (env ORDER_SYNC_EXPORT_PATH, default exported_orders.json)",
  "  --overwrite  Clear the database and reload instead of syncing (env ORDER_SYNC_MODE)",
];

function run(args: string[]): number {
  const config = resolveConfig(args);
  log.boot.info({ csvPath: config.csvPath, dbPath: config.dbPath, mode: config.mode }, "run:start");
  const report = runPipeline(config);
  console.log(formatReport(report).join("\n"));
  log.boot.info({ exported: report.exported.orders }, "run:complete");
  return 0;
}

function main(argv: string[]): number {
  const [first, ...rest] = argv;
  const command = first && !first.startsWith("--") ? first : "run";
  const args = command === first ? rest : argv;

  switch (command) {
    case "run":
      return run(args);
    case "help":
      console.log(USAGE.join("\n"));
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      console.error(USAGE.join("\n"));
      return 1;
  }
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err) {
  const code = isPipelineError(err) ? err.code : ErrorCode.INTERNAL_ERROR;
  log.boot.error({ err, code }, "run:failed");
  console.error(`error [${code}]: ${errorMessage(err)}`);
  process.exitCode = 1;
}
