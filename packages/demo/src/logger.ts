import pino from "pino";
import type { Logger } from "pino";
import type { DemoConfig } from "./config.js";

/**
 * JSON logs in production, pino-pretty in development.
 */
export function createLogger(config: Pick<DemoConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
