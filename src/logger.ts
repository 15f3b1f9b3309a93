/**
 * Structured logging.
 *
 * stdout carries the MCP stdio protocol, so log lines go to stderr.
 */

import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";
import { SERVICE_NAME, VERSION } from "./version.js";

export type { Logger } from "pino";

/**
 * Create the root logger writing JSON lines to stderr.
 */
export const createLogger = (level: LogLevel = "info"): Logger =>
  pino(
    {
      name: SERVICE_NAME,
      level,
      base: { version: VERSION },
    },
    pino.destination(2),
  );

/**
 * Logger that discards everything. Used as the default for library classes
 * constructed without one (tests, scripts).
 */
export const silentLogger: Logger = pino({ level: "silent" });
