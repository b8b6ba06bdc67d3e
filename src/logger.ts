import pino, { type Logger } from "pino";

/** Standalone logger for code that runs outside the HTTP server. */
export function createLogger(name: string): Logger {
  return pino({
    name,
    level: process.env.LOG_LEVEL ?? "info",
  });
}
