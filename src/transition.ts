/**
 * BudgetTransition is the structured record emitted whenever a tracked project
 * flips between "within budget" and "exceeds budget".
 *
 * - Small and stable, so it can be shipped to logs or an audit sink as-is.
 * - Times: `at` is wall-clock ISO for humans; `backoffDeadline` is on the
 *   config's clock timeline (monotonic milliseconds), like every tracker timestamp.
 */
export type BudgetTransition = {
  at: string;
  configName: string;
  projectId: string;
  exceedsBudget: boolean;
  /** The state holds at least until this instant. */
  backoffDeadline?: number;
  /** Spend inside the window at the moment of the flip. */
  totalSpent: number;
};
