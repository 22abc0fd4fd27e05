import { describe, expect, test } from "vitest";

import { ManualClock, monotonicClock } from "../src/budget/clock.js";
import { BudgetingConfig, validateBudgetingOptions } from "../src/budget/config.js";
import { BudgetError } from "../src/utils/errors.js";

const base = { budgetingWindowMs: 10_000, bucketWidthMs: 5_000, backoffMs: 1_000, allowedBudget: 100 };

describe("BudgetingConfig", () => {
  test("derives numBuckets from window / width, rounded up", () => {
    expect(new BudgetingConfig(base).numBuckets).toBe(2);
    expect(new BudgetingConfig({ ...base, bucketWidthMs: 3_000 }).numBuckets).toBe(4);
    expect(new BudgetingConfig({ ...base, bucketWidthMs: 60_000 }).numBuckets).toBe(1);
    expect(new BudgetingConfig({ ...base, numBuckets: 7 }).numBuckets).toBe(7);
  });

  test("defaults to the monotonic clock", () => {
    expect(new BudgetingConfig(base).clock).toBe(monotonicClock);
  });

  test("truncates instants onto the bucket grid", () => {
    const clock = new ManualClock(101_500);
    const config = new BudgetingConfig({ ...base, clock });

    expect(config.truncate(100_000)).toBe(100_000);
    expect(config.truncate(104_999)).toBe(100_000);
    expect(config.truncate(105_000)).toBe(105_000);
    expect(config.truncate(-1)).toBe(-5_000);
    expect(config.truncatedNow()).toBe(100_000);
    expect(config.now()).toBe(101_500);
  });

  test("is frozen", () => {
    const config = new BudgetingConfig(base);
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe("validateBudgetingOptions", () => {
  test.each([
    ["zero bucket width", { ...base, bucketWidthMs: 0 }],
    ["negative bucket width", { ...base, bucketWidthMs: -5 }],
    ["infinite bucket width", { ...base, bucketWidthMs: Number.POSITIVE_INFINITY }],
    ["zero window", { ...base, budgetingWindowMs: 0 }],
    ["negative backoff", { ...base, backoffMs: -1 }],
    ["NaN allowed budget", { ...base, allowedBudget: Number.NaN }],
    ["negative allowed budget", { ...base, allowedBudget: -1 }],
    ["zero buckets", { ...base, numBuckets: 0 }],
    ["fractional buckets", { ...base, numBuckets: 1.5 }],
  ])("rejects %s", (_name, options) => {
    expect(() => validateBudgetingOptions(options)).toThrow(BudgetError);
    expect(() => new BudgetingConfig(options)).toThrowError(/^CONFIG_INVALID: /);
  });

  test("accepts zero backoff and zero allowed budget", () => {
    expect(() => validateBudgetingOptions({ ...base, backoffMs: 0, allowedBudget: 0 })).not.toThrow();
  });

  test("reports the offending value in details", () => {
    try {
      validateBudgetingOptions({ ...base, bucketWidthMs: 0 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(BudgetError);
      expect(e).toMatchObject({ code: "CONFIG_INVALID", details: { bucketWidthMs: 0 } });
    }
  });
});
