import { BudgetError } from "../utils/errors.js";
import { monotonicClock, type Clock } from "./clock.js";

/**
 * Budgeting parameters are small and explicit:
 * - durations are milliseconds on the injected clock's timeline
 * - `allowedBudget` is in whatever unit callers spend in (tokens, cents, CPU-ms)
 */
export type BudgetingOptions = {
  /** Rolling window over which spend is summed. */
  budgetingWindowMs: number;
  /** Grid spacing that spend timestamps are truncated onto. */
  bucketWidthMs: number;
  /** Minimum time a state (over/under budget) holds after a flip. */
  backoffMs: number;
  /** Spend within the window strictly above this exceeds the budget. */
  allowedBudget: number;
  /** Bucket capacity; defaults to `ceil(budgetingWindowMs / bucketWidthMs)`. */
  numBuckets?: number;
  clock?: Clock;
};

/**
 * Validates budgeting options up front so trackers never see a degenerate grid.
 * Fail-closed: bad configuration throws at construction instead of misbehaving later.
 */
export function validateBudgetingOptions(options: BudgetingOptions): void {
  if (!(Number.isFinite(options.bucketWidthMs) && options.bucketWidthMs > 0)) {
    throw new BudgetError("CONFIG_INVALID", "bucketWidthMs must be a finite number > 0.", {
      bucketWidthMs: options.bucketWidthMs,
    });
  }
  if (!(Number.isFinite(options.budgetingWindowMs) && options.budgetingWindowMs > 0)) {
    throw new BudgetError("CONFIG_INVALID", "budgetingWindowMs must be a finite number > 0.", {
      budgetingWindowMs: options.budgetingWindowMs,
    });
  }
  if (!(Number.isFinite(options.backoffMs) && options.backoffMs >= 0)) {
    throw new BudgetError("CONFIG_INVALID", "backoffMs must be a finite number >= 0.", {
      backoffMs: options.backoffMs,
    });
  }
  if (!(Number.isFinite(options.allowedBudget) && options.allowedBudget >= 0)) {
    throw new BudgetError("CONFIG_INVALID", "allowedBudget must be a finite number >= 0.", {
      allowedBudget: options.allowedBudget,
    });
  }
  if (options.numBuckets !== undefined && !(Number.isInteger(options.numBuckets) && options.numBuckets >= 1)) {
    throw new BudgetError("CONFIG_INVALID", "numBuckets must be an integer >= 1.", {
      numBuckets: options.numBuckets,
    });
  }
}

/**
 * Immutable budgeting configuration, shared by reference between every tracker built from it.
 */
export class BudgetingConfig {
  readonly budgetingWindowMs: number;
  readonly bucketWidthMs: number;
  readonly backoffMs: number;
  readonly allowedBudget: number;
  readonly numBuckets: number;
  readonly clock: Clock;

  constructor(options: BudgetingOptions) {
    validateBudgetingOptions(options);

    this.budgetingWindowMs = options.budgetingWindowMs;
    this.bucketWidthMs = options.bucketWidthMs;
    this.backoffMs = options.backoffMs;
    this.allowedBudget = options.allowedBudget;
    // A positive window over a positive width always needs at least one bucket.
    this.numBuckets = options.numBuckets ?? Math.max(1, Math.ceil(options.budgetingWindowMs / options.bucketWidthMs));
    this.clock = options.clock ?? monotonicClock;
    Object.freeze(this);
  }

  now(): number {
    return this.clock.now();
  }

  /** Floors `instant` onto the bucket grid. */
  truncate(instant: number): number {
    const offset = ((instant % this.bucketWidthMs) + this.bucketWidthMs) % this.bucketWidthMs;
    return instant - offset;
  }

  truncatedNow(): number {
    return this.truncate(this.now());
  }
}
