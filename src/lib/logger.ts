import pino from "pino";
import type { Logger, LoggerOptions } from "pino";

export type { Logger };

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "project-sim",
    level: process.env.LOG_LEVEL ?? "info",
    ...options,
  });
}

let defaultLogger: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
