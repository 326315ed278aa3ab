/**
 * Peg Engine - Logger
 *
 * Structured JSON logging via winston. Console output is silenced under
 * NODE_ENV=test so Jest output stays readable.
 */

import { createLogger, format, transports, type Logger } from "winston";

export function createModuleLogger(module: string): Logger {
  return createLogger({
    level: process.env.LOG_LEVEL || "info",
    defaultMeta: { module },
    format: format.combine(format.timestamp(), format.json()),
    transports: [new transports.Console({ silent: process.env.NODE_ENV === "test" })],
  });
}
