import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export type LoggerOptions = {
  level?: LevelWithSilent;
};

/** Structured JSON logger shared by the registry, the HTTP surface and the entrypoint. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: "project-budgets", level: options.level ?? "info" });
}

export const silentLogger: Logger = pino({ level: "silent" });
