/**
 * duplicate-detector.test.ts — In-batch (order_id, item) duplicate flagging.
 */

import { describe, it, expect } from "vitest";
import { createDuplicateDetector, markDuplicate, naturalKey } from "../src/services/duplicate-detector.js";
import { DUPLICATE_KEY_MESSAGE } from "../src/types/order-types.js";
import { makeRecord } from "./helpers/fixtures.js";

describe("createDuplicateDetector", () => {
  it("keeps the first valid occurrence and flags later ones", () => {
    const detector = createDuplicateDetector();
    const first = makeRecord({ rowNumber: 1, quantity: 3 });
    const second = makeRecord({ rowNumber: 2, quantity: 4 });

    expect(detector.check(first)).toBe(first);
    expect(detector.check(second)).toEqual({
      ...second,
      isValid: false,
      errorMessage: DUPLICATE_KEY_MESSAGE,
    });
    expect(detector.flagged).toBe(1);
  });

  it("ignores invalid records when tracking keys", () => {
    const detector = createDuplicateDetector();
    const invalid = makeRecord({ rowNumber: 1, date: null, isValid: false, errorMessage: "Invalid or missing date" });
    const valid = makeRecord({ rowNumber: 2 });

    expect(detector.check(invalid)).toBe(invalid);
    expect(detector.check(valid)).toBe(valid);
    expect(detector.flagged).toBe(0);
  });

  it("treats different items on one order as distinct", () => {
    const detector = createDuplicateDetector();
    detector.check(makeRecord({ item: "Widget" }));
    const gadget = detector.check(makeRecord({ item: "Gadget" }));
    expect(gadget.isValid).toBe(true);
  });

  it("scopes keys to one detector", () => {
    const record = makeRecord();
    createDuplicateDetector().check(record);
    expect(createDuplicateDetector().check(record).isValid).toBe(true);
  });
});

describe("markDuplicate", () => {
  it("records the key in the seen set", () => {
    const seen = new Set<string>();
    markDuplicate(makeRecord({ orderId: "9", item: "Bolt" }), seen);
    expect(seen.has(naturalKey("9", "Bolt"))).toBe(true);
  });

  it("keeps keys with embedded separators apart", () => {
    expect(naturalKey("1|2", "3")).not.toBe(naturalKey("1", "2|3"));
  });
});
