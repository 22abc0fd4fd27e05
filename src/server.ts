import express from "express";
import type { ErrorRequestHandler, Express, Request, Response } from "express";
import { z } from "zod";

import type { ProjectBudgets } from "./registry.js";
import { BudgetError } from "./utils/errors.js";
import type { Logger } from "./utils/logger.js";

const projectIdSchema = z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String);

const exceedsBudgetRequestSchema = z.object({
  configName: z.string().min(1),
  projectId: projectIdSchema,
});

const recordBudgetSpendRequestSchema = exceedsBudgetRequestSchema.extend({
  spentBudget: z.number(),
});

export type ExceedsBudgetReply = { exceedsBudget: boolean };

export type ErrorReply = {
  error: string;
  explanation: string;
  details?: Record<string, unknown>;
};

function parseBody<S extends z.ZodType>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BudgetError("REQUEST_INVALID", "Request body failed validation.", {
      issues: parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`),
    });
  }
  return parsed.data;
}

export function handleExceedsBudget(budgets: ProjectBudgets, body: unknown): ExceedsBudgetReply {
  const req = parseBody(exceedsBudgetRequestSchema, body);
  return { exceedsBudget: budgets.exceedsBudget(req.configName, req.projectId) };
}

export function handleRecordBudgetSpend(budgets: ProjectBudgets, body: unknown): ExceedsBudgetReply {
  const req = parseBody(recordBudgetSpendRequestSchema, body);
  return { exceedsBudget: budgets.recordBudgetSpend(req.configName, req.projectId, req.spentBudget) };
}

function clientErrorStatus(err: unknown): number | undefined {
  // body-parser rejects malformed or oversized JSON with a 4xx `status`.
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export function statusForError(err: unknown): number {
  if (!(err instanceof BudgetError)) return clientErrorStatus(err) ?? 500;
  switch (err.code) {
    case "UNKNOWN_CONFIG":
      return 404;
    case "REQUEST_INVALID":
    case "PROJECT_INVALID":
    case "SPEND_INVALID":
      return 400;
    default:
      return 500;
  }
}

export function errorReply(err: unknown): ErrorReply {
  if (err instanceof BudgetError) {
    return err.toJSON();
  }
  if (clientErrorStatus(err) !== undefined) {
    return { error: "REQUEST_INVALID", explanation: "Request body could not be read." };
  }
  return { error: "INTERNAL", explanation: "Internal error." };
}

/**
 * JSON-over-HTTP surface of the ProjectBudgets service:
 *
 * - `POST /v1/exceeds-budget`       `{ configName, projectId }`              → `{ exceedsBudget }`
 * - `POST /v1/record-budget-spend`  `{ configName, projectId, spentBudget }` → `{ exceedsBudget }`
 * - `GET  /healthz`
 *
 * Project ids may be sent as strings or unsigned integers; integers are normalized to decimal strings.
 * This only reports state. Throttling or rejecting the project's work is up to the caller.
 */
export function createApp(budgets: ProjectBudgets, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "16kb" }));

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true, trackers: budgets.size });
  });

  app.post("/v1/exceeds-budget", (req: Request, res: Response) => {
    res.json(handleExceedsBudget(budgets, req.body));
  });

  app.post("/v1/record-budget-spend", (req: Request, res: Response) => {
    res.json(handleRecordBudgetSpend(budgets, req.body));
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    const status = statusForError(err);
    if (status >= 500) {
      logger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
    } else {
      logger.debug({ status, method: req.method, url: req.originalUrl, error: errorReply(err) }, "Request rejected");
    }
    res.status(status).json(errorReply(err));
  };
  app.use(onError);

  return app;
}
