/**
 * fixtures.ts — Record builders and temp-dir helpers shared by the suites.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ValidatedRecord } from "../../src/types/order-types.js";

/** A valid record for order "1" / "Widget"; override any field. */
export function makeRecord(overrides: Partial<ValidatedRecord> = {}): ValidatedRecord {
  return {
    rowNumber: 1,
    customerId: "C1",
    orderId: "1",
    item: "Widget",
    quantity: 2,
    unitPrice: 9.99,
    date: "2025-06-01",
    isValid: true,
    errorMessage: null,
    ...overrides,
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "order-sync-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeCsv(dir: string, name: string, lines: string[]): string {
  const file = join(dir, name);
  writeFileSync(file, lines.join("\n") + "\n", "utf8");
  return file;
}

/** Run fn and return what it threw. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
