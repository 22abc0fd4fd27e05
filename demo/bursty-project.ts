import { BudgetingConfig, ManualClock, ProjectBudgets, createLogger } from "../src/index.js";

/**
 * Drives one project through a bursty spend pattern on a manual clock and prints
 * every state flip. No waiting: time only moves when the script advances it.
 *
 *   tsx demo/bursty-project.ts
 */
const clock = new ManualClock(0);

const budgets = new ProjectBudgets({
  configs: {
    default: new BudgetingConfig({
      budgetingWindowMs: 10_000,
      bucketWidthMs: 1_000,
      backoffMs: 3_000,
      allowedBudget: 100,
      clock,
    }),
  },
  logger: createLogger({ level: "warn" }),
  onTransition: (record) => {
    // eslint-disable-next-line no-console
    console.log(`[bursty-project] transition=${JSON.stringify(record)}`);
  },
});

// Bursts of 30 every 500ms for 3s, then 12s of silence, twice.
for (let round = 0; round < 2; round += 1) {
  for (let i = 0; i < 6; i += 1) {
    const blocked = budgets.recordBudgetSpend("default", "42", 30);
    // eslint-disable-next-line no-console
    console.log(`[bursty-project] t=${clock.now()}ms spend=30 blocked=${blocked}`);
    clock.advance(500);
  }
  for (let i = 0; i < 12; i += 1) {
    clock.advance(1_000);
    const blocked = budgets.exceedsBudget("default", "42");
    // eslint-disable-next-line no-console
    console.log(`[bursty-project] t=${clock.now()}ms check blocked=${blocked}`);
  }
}

const evicted = budgets.sweep();
// eslint-disable-next-line no-console
console.log(`[bursty-project] swept=${evicted} remaining=${budgets.size}`);
