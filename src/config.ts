/**
 * config.ts — Unified Configuration Resolution
 *
 * Single source of truth for run configuration. Priority chain:
 *   1. CLI flag                ← highest
 *   2. Environment variable
 *   3. Default                 ← lowest
 *
 * Rules:
 * - No `process.env` reads outside this file (except logger bootstrap,
 *   which reads ORDER_SYNC_LOG_* / NODE_ENV once at import)
 * - Config object is fully typed
 */

import { ErrorCode, PipelineError } from "./errors.js";

// ─── Configuration Interface ────────────────────────────────────

export type SyncMode = "sync" | "overwrite";

export const SYNC_MODES: readonly SyncMode[] = ["sync", "overwrite"];

export interface PipelineConfig {
  // ── Paths ───────────────────────────────────────────────────
  /** CSV export to ingest */
  csvPath: string;
  /** SQLite database file (":memory:" for a throwaway store) */
  dbPath: string;
  /** Where the JSON snapshot is written */
  exportPath: string;

  // ── Behaviour ───────────────────────────────────────────────
  /** "sync" reconciles incrementally, "overwrite" reloads from a clean slate */
  mode: SyncMode;
}

export const DEFAULT_CSV_PATH = "user_data.csv";
export const DEFAULT_DB_PATH = "data/orders.db";
export const DEFAULT_EXPORT_PATH = "exported_orders.json";

// ─── Arg helpers ────────────────────────────────────────────────

/** Extract a --name=value or --name value flag from args. */
export function getFlag(args: string[], name: string): string | undefined {
  const flag = args.find((a) => a.startsWith(`--${name}=`));
  if (flag) return flag.split("=").slice(1).join("=");

  const exactIndex = args.findIndex((a) => a === `--${name}`);
  if (exactIndex >= 0) {
    const next = args[exactIndex + 1];
    if (next && !next.startsWith("--")) return next;
  }

  return undefined;
}

/** Check for a boolean --name flag in args. */
export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function resolveMode(args: string[], env: NodeJS.ProcessEnv): SyncMode {
  if (hasFlag(args, "overwrite")) return "overwrite";
  const raw = (env.ORDER_SYNC_MODE || "").trim().toLowerCase();
  if (!raw) return "sync";
  const mode = SYNC_MODES.find((m) => m === raw);
  if (!mode) {
    throw new PipelineError(
      ErrorCode.INVALID_CONFIG,
      `ORDER_SYNC_MODE must be one of ${SYNC_MODES.map((m) => `"${m}"`).join(", ")}`,
      { detail: { value: raw } },
    );
  }
  return mode;
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve the complete run configuration.
 *
 * @param args - CLI arguments after the command name
 * @param env  - Environment (defaults to process.env)
 */
export function resolveConfig(args: string[] = [], env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    csvPath: getFlag(args, "csv") || env.ORDER_SYNC_CSV_PATH || DEFAULT_CSV_PATH,
    dbPath: getFlag(args, "db") || env.ORDER_SYNC_DB_PATH || DEFAULT_DB_PATH,
    exportPath: getFlag(args, "out") || env.ORDER_SYNC_EXPORT_PATH || DEFAULT_EXPORT_PATH,
    mode: resolveMode(args, env),
  };
}
