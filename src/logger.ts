/**
 * logger.ts — Structured Logging for order-sync
 *
 * Built on pino. Log lines go to stderr so the CLI report on stdout
 * stays machine-readable.
 *
 * Configuration:
 *   ORDER_SYNC_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   ORDER_SYNC_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   ORDER_SYNC_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.ingest.info({ rows: 120 }, "csv:read");
 *   log.sync.error({ err }, "sync:failed");
 *
 * Subsystem loggers:
 *   log.boot, log.ingest, log.sync, log.store, log.report
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const IS_DEV = process.env.NODE_ENV !== "production" && !IS_TEST;

/** Resolve log level from environment */
export function resolveLogLevel(isTest: boolean = IS_TEST, isDev: boolean = IS_DEV): string {
  if (process.env.ORDER_SYNC_LOG_LEVEL) {
    return process.env.ORDER_SYNC_LOG_LEVEL;
  }
  const debugEnv = (process.env.ORDER_SYNC_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

/** Whether log lines should go through pino-pretty. */
export function resolveLogPretty(isTest: boolean = IS_TEST, isDev: boolean = IS_DEV): boolean {
  if (isTest) return false;
  return (
    process.env.ORDER_SYNC_LOG_PRETTY === "true" ||
    (process.env.ORDER_SYNC_LOG_PRETTY !== "false" && isDev)
  );
}

function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!resolveLogPretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
      destination: 2,
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const level = resolveLogLevel();
const transport = resolveTransport();

const options: pino.LoggerOptions = {
  level,
  base: { service: "order-sync" },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const rootLogger: Logger = transport
  ? pino({ ...options, transport })
  : pino(options, pino.destination(2));

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.sync.info("sync:start")
 *   → { level: 30, subsystem: "sync", msg: "sync:start", ... }
 */
export const log = {
  /** CLI startup and shutdown */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** CSV reading, row validation, duplicate detection */
  ingest: rootLogger.child({ subsystem: "ingest" }),
  /** Reconciliation against the order store */
  sync: rootLogger.child({ subsystem: "sync" }),
  /** SQLite store lifecycle */
  store: rootLogger.child({ subsystem: "store" }),
  /** Aggregations and JSON export */
  report: rootLogger.child({ subsystem: "report" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
