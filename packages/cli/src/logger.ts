/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs on stderr; stdout is reserved
 * for the account table. Development mode pretty-prints through
 * pino-pretty, still on stderr.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

const STDERR = 2;

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR));
}
