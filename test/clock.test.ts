import { describe, expect, test } from "vitest";

import { ManualClock, monotonicClock } from "../src/budget/clock.js";

describe("ManualClock", () => {
  test("only moves when advanced or set", () => {
    const clock = new ManualClock(1_000);
    expect(clock.now()).toBe(1_000);

    clock.advance(250);
    expect(clock.now()).toBe(1_250);

    clock.set(500);
    expect(clock.now()).toBe(500);
  });

  test("rejects negative and non-finite steps", () => {
    const clock = new ManualClock();

    expect(() => clock.advance(-1)).toThrow(/^CLOCK_INVALID: /);
    expect(() => clock.advance(Number.NaN)).toThrow(/^CLOCK_INVALID: /);
    expect(() => clock.set(Number.POSITIVE_INFINITY)).toThrow(/^CLOCK_INVALID: /);
    expect(clock.now()).toBe(0);
  });
});

test("monotonicClock never goes backwards", () => {
  const a = monotonicClock.now();
  const b = monotonicClock.now();
  expect(b).toBeGreaterThanOrEqual(a);
});
