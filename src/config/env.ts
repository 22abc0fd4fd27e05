import { z } from "zod";

import type { Clock } from "../budget/clock.js";
import { BudgetingConfig } from "../budget/config.js";
import { BudgetError } from "../utils/errors.js";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const budgetEntrySchema = z.object({
  budgetingWindowMs: z.number().positive(),
  bucketWidthMs: z.number().positive(),
  backoffMs: z.number().nonnegative(),
  allowedBudget: z.number().nonnegative(),
  numBuckets: z.number().int().min(1).optional(),
});

const budgetEntriesSchema = z
  .record(z.string().min(1), budgetEntrySchema)
  .refine((entries) => Object.keys(entries).length > 0, { message: "at least one budget config is required" });

const rawEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: logLevelSchema.default("info"),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

export type BudgetEntry = z.infer<typeof budgetEntrySchema>;

export type ServiceConfig = {
  port: number;
  logLevel: z.infer<typeof logLevelSchema>;
  sweepIntervalMs: number;
  budgets: Record<string, BudgetEntry>;
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Reads service configuration from environment variables.
 *
 * `PROJECT_BUDGETS` is a JSON object of named budget configs, e.g.
 * `{"default":{"budgetingWindowMs":60000,"bucketWidthMs":5000,"backoffMs":10000,"allowedBudget":1000}}`.
 *
 * Invalid configuration throws `BudgetError("CONFIG_INVALID")` listing every issue.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw = rawEnvSchema.safeParse(env);
  if (!raw.success) {
    throw new BudgetError("CONFIG_INVALID", "Invalid environment.", { issues: formatIssues(raw.error) });
  }

  const budgetsJson = env.PROJECT_BUDGETS;
  if (!budgetsJson) {
    throw new BudgetError("CONFIG_INVALID", "Missing PROJECT_BUDGETS (JSON object of named budget configs).");
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(budgetsJson);
  } catch (e) {
    throw new BudgetError("CONFIG_INVALID", "PROJECT_BUDGETS is not valid JSON.", { error: String(e) });
  }

  const budgets = budgetEntriesSchema.safeParse(parsedJson);
  if (!budgets.success) {
    throw new BudgetError("CONFIG_INVALID", "Invalid PROJECT_BUDGETS.", { issues: formatIssues(budgets.error) });
  }

  return {
    port: raw.data.PORT,
    logLevel: raw.data.LOG_LEVEL,
    sweepIntervalMs: raw.data.SWEEP_INTERVAL_MS,
    budgets: budgets.data,
  };
}

/** Builds one shared BudgetingConfig per named entry. */
export function buildBudgetingConfigs(
  entries: Record<string, BudgetEntry>,
  clock?: Clock,
): Record<string, BudgetingConfig> {
  const configs: Record<string, BudgetingConfig> = {};
  for (const [name, entry] of Object.entries(entries)) {
    configs[name] = new BudgetingConfig({ ...entry, clock });
  }
  return configs;
}
