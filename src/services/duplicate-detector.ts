/**
 * duplicate-detector.ts — Flag repeated (order_id, item) keys within one batch.
 *
 * Only valid records take part: the first valid occurrence of a key is
 * canonical and every later valid record with the same key is marked
 * invalid. Records must be fed in file order.
 */

import { log } from "../logger.js";
import { DUPLICATE_KEY_MESSAGE, type ValidatedRecord } from "../types/order-types.js";

export interface DuplicateDetector {
  /** Returns the record unchanged, or an invalid copy when its key was already seen. */
  check(record: ValidatedRecord): ValidatedRecord;
  /** Number of records flagged so far. */
  readonly flagged: number;
}

/** Key for a (order_id, item) pair. JSON keeps embedded separators unambiguous. */
export function naturalKey(orderId: string, item: string): string {
  return JSON.stringify([orderId, item]);
}

export function markDuplicate(record: ValidatedRecord, seen: Set<string>): ValidatedRecord {
  if (!record.isValid || record.orderId === null || record.item === null) {
    return record;
  }
  const key = naturalKey(record.orderId, record.item);
  if (!seen.has(key)) {
    seen.add(key);
    return record;
  }
  return { ...record, isValid: false, errorMessage: DUPLICATE_KEY_MESSAGE };
}

/** Detector scoped to one batch. */
export function createDuplicateDetector(): DuplicateDetector {
  const seen = new Set<string>();
  let flagged = 0;

  return {
    check(record: ValidatedRecord): ValidatedRecord {
      const result = markDuplicate(record, seen);
      if (result !== record) {
        flagged++;
        log.ingest.debug(
          { rowNumber: record.rowNumber, orderId: record.orderId, item: record.item },
          "row:duplicate",
        );
      }
      return result;
    },

    get flagged(): number {
      return flagged;
    },
  };
}
