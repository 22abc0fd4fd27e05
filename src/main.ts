import { config as loadEnv } from "dotenv";

import { buildBudgetingConfigs, loadServiceConfig } from "./config/env.js";
import { ProjectBudgets } from "./registry.js";
import { createApp } from "./server.js";
import { createLogger } from "./utils/logger.js";

loadEnv();

const config = loadServiceConfig();
const logger = createLogger({ level: config.logLevel });

const budgets = new ProjectBudgets({
  configs: buildBudgetingConfigs(config.budgets),
  logger,
});
const stopSweeping = budgets.startSweeping(config.sweepIntervalMs);

const server = createApp(budgets, logger).listen(config.port, () => {
  logger.info(
    { port: config.port, configs: budgets.configNames(), sweepIntervalMs: config.sweepIntervalMs },
    "project-budgets listening",
  );
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "Shutting down");
  stopSweeping();
  server.close((err) => {
    if (err) {
      logger.error({ err }, "Server close failed");
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
