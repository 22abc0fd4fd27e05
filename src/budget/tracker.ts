import type { BudgetingConfig } from "./config.js";

export type Bucket = {
  /** Grid-aligned timestamp (see `BudgetingConfig.truncate`). */
  timestamp: number;
  spent: number;
};

export type TrackerSnapshot = {
  exceedsBudget: boolean;
  backoffDeadline?: number;
  /** Newest first. */
  buckets: Bucket[];
};

/**
 * BudgetTracker records spend for one entity and reports whether the spend inside
 * the rolling `budgetingWindowMs` exceeds `allowedBudget`.
 *
 * Spend is accumulated into grid buckets (`bucketWidthMs` wide, newest first, at most
 * `numBuckets` of them), so memory stays bounded however often spend is recorded.
 *
 * Every state flip arms a backoff deadline. Until it passes, the previous answer is
 * returned as-is and nothing is recomputed, so bursty or near-threshold spend cannot
 * make the state oscillate faster than `backoffMs`.
 *
 * Single-writer: callers serialize access per tracker. Nothing here does I/O or throws.
 */
export class BudgetTracker {
  readonly config: BudgetingConfig;
  private exceeds = false;
  private deadline?: number;
  private evaluatedAt?: number;
  private buckets: Bucket[] = [];

  constructor(config: BudgetingConfig) {
    this.config = config;
  }

  /** Last computed state, without re-aggregating. */
  get exceedsBudget(): boolean {
    return this.exceeds;
  }

  get backoffDeadline(): number | undefined {
    return this.deadline;
  }

  /** Instant of the last `recordSpend` or `check`, on the config's clock. */
  get lastEvaluatedAt(): number | undefined {
    return this.evaluatedAt;
  }

  get bucketCount(): number {
    return this.buckets.length;
  }

  /**
   * Adds `amount` to the bucket for "now" and re-evaluates the budget.
   *
   * `amount` must be non-negative; that is the caller's contract and is not checked here.
   */
  recordSpend(amount: number): boolean {
    const now = this.config.now();
    const nowBucket = this.config.truncate(now);

    const newest = this.buckets[0];
    // `>=` rather than `===`: if the clock steps backwards, spend lands in the newest
    // bucket instead of breaking the newest-first ordering.
    if (newest && newest.timestamp >= nowBucket) {
      newest.spent += amount;
    } else {
      this.buckets.unshift({ timestamp: nowBucket, spent: amount });
      if (this.buckets.length > this.config.numBuckets) this.buckets.pop();
    }

    return this.updateAggregatedState(now);
  }

  /** Re-evaluates the budget at "now" without recording spend. */
  check(): boolean {
    return this.updateAggregatedState(this.config.now());
  }

  /**
   * True when this tracker holds nothing that can influence a future answer:
   * no backoff deadline still ahead of `now`, and no bucket inside the window ending at `now`.
   * A registry may drop stale trackers; a fresh tracker would answer identically.
   */
  isStale(now = this.config.now()): boolean {
    if (this.deadline !== undefined && this.deadline > now) return false;

    const windowStart = now - this.config.budgetingWindowMs;
    return this.buckets.every((b) => b.timestamp < windowStart);
  }

  /** Spend inside the window ending at `now`. Ignores backoff and mutates nothing. */
  totalSpent(now = this.config.now()): number {
    const windowStart = now - this.config.budgetingWindowMs;
    let total = 0;
    for (const b of this.buckets) {
      if (b.timestamp >= windowStart) total += b.spent;
    }
    return total;
  }

  snapshot(): TrackerSnapshot {
    return {
      exceedsBudget: this.exceeds,
      backoffDeadline: this.deadline,
      buckets: this.buckets.map((b) => ({ ...b })),
    };
  }

  private updateAggregatedState(now: number): boolean {
    this.evaluatedAt = now;
    if (this.deadline !== undefined) {
      if (this.deadline > now) return this.exceeds;
      this.deadline = undefined;
    }

    // Buckets that fell out of the window are skipped, not evicted; only capacity evicts.
    const exceeds = this.totalSpent(now) > this.config.allowedBudget;

    if (exceeds !== this.exceeds) {
      this.exceeds = exceeds;
      this.deadline = now + this.config.backoffMs;
    }

    return this.exceeds;
  }
}
