import { BudgetError } from "../utils/errors.js";

/**
 * Source of "now", in milliseconds.
 *
 * Trackers never read wall-clock time directly; every time-dependent decision goes
 * through a Clock so tests can move time deterministically.
 */
export interface Clock {
  now(): number;
}

/** Monotonic production clock. Unaffected by wall-clock adjustments (NTP, DST, manual changes). */
export const monotonicClock: Clock = { now: () => performance.now() };

/**
 * ManualClock only moves when told to.
 *
 * `set` may move time backwards, which is how clock regressions are exercised.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new BudgetError("CLOCK_INVALID", "ManualClock can only advance by a finite, non-negative amount.", {
        ms,
      });
    }
    this.current += ms;
  }

  set(ms: number): void {
    if (!Number.isFinite(ms)) {
      throw new BudgetError("CLOCK_INVALID", "ManualClock time must be finite.", { ms });
    }
    this.current = ms;
  }
}
