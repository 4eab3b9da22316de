/**
 * errors.ts — Pipeline error taxonomy.
 *
 * Field-level validation problems are data (ValidatedRecord.errorMessage)
 * and never reach this module. Only failures that stop a run are raised
 * as PipelineError.
 */

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  // input source — raised before the store is opened
  INPUT_NOT_FOUND: "INPUT_NOT_FOUND",
  INPUT_UNREADABLE: "INPUT_UNREADABLE",
  INPUT_NO_HEADER: "INPUT_NO_HEADER",
  // reconciliation contract / transaction
  MALFORMED_RECORD: "MALFORMED_RECORD",
  SYNC_FAILED: "SYNC_FAILED",
  // output
  EXPORT_FAILED: "EXPORT_FAILED",
  // configuration
  INVALID_CONFIG: "INVALID_CONFIG",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PipelineError extends Error {
  readonly code: ErrorCodeValue;
  readonly detail?: unknown;

  constructor(code: ErrorCodeValue, message: string, options?: { detail?: unknown; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "PipelineError";
    this.code = code;
    this.detail = options?.detail;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
