/**
 * Structured logging.
 *
 * JSON lines through pino; pretty-printed through pino-pretty in
 * development.
 */

import { pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Build the root logger.
 *
 * An explicit `destination` bypasses the pretty transport, so tests can
 * capture the JSON lines.
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL, base: { service: "shareport" } }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    base: { service: "shareport" },
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
