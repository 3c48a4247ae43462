/**
 * @flatchain/node — Logger factory.
 *
 * JSON lines by default; pretty-printed through pino-pretty in development.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
