/**
 * Public library entrypoint.
 *
 * - `BudgetTracker` / `BudgetingConfig` for per-entity rolling budgets with hysteresis
 * - `ProjectBudgets` to hold one tracker per project and evict idle ones
 * - `Clock` / `ManualClock` to control time, `BudgetError` for failures
 * - `createApp` to expose a registry over HTTP
 */
export { BudgetTracker, type Bucket, type TrackerSnapshot } from "./budget/tracker.js";
export { BudgetingConfig, validateBudgetingOptions, type BudgetingOptions } from "./budget/config.js";
export { ManualClock, monotonicClock, type Clock } from "./budget/clock.js";
export { ProjectBudgets, type ProjectBudgetsConfig } from "./registry.js";
export { type BudgetTransition } from "./transition.js";
export { BudgetError, type BudgetErrorCode, type BudgetErrorReply } from "./utils/errors.js";
export { createLogger, type Logger } from "./utils/logger.js";
export { buildBudgetingConfigs, loadServiceConfig, type BudgetEntry, type ServiceConfig } from "./config/env.js";
export { createApp, handleExceedsBudget, handleRecordBudgetSpend, type ExceedsBudgetReply } from "./server.js";
